// Ledger Store - typed views over the governed CSV tables

import { parseCsv, addedRows, field, type ParsedTable } from './csv.js';
import type { RevisionSource } from '../revision/index.js';
import type { GovernorConfig } from '../config/index.js';
import { ConfigurationError } from '../errors.js';
import type {
  LedgerRow,
  HandoffRecord,
  DecisionRecord,
  ChangeRequestRecord,
  Run,
  RunModeRecord,
  BudgetEnvelope,
  ReleaseGateRecord,
  GateException,
  TeamPhase
} from '../types/governance.js';

export interface TypedRow<T> {
  line: number;
  record: T;
}

function optional(row: LedgerRow, column: string): string | undefined {
  return field(row, column) || undefined;
}

export function toHandoff(row: LedgerRow): HandoffRecord | null {
  const run_id = field(row, 'run_id');
  const from_team = field(row, 'from_team');
  const to_team = field(row, 'to_team');
  if (!run_id || !from_team || !to_team) {
    return null;
  }
  return {
    run_id,
    from_team,
    to_team,
    timestamp_utc: field(row, 'timestamp_utc'),
    entry_id: optional(row, 'entry_id'),
    blocking_flags: optional(row, 'blocking_flags'),
    supersedes_ref: optional(row, 'supersedes_entry_id') ?? optional(row, 'supersedes_ref')
  };
}

export function toDecision(row: LedgerRow): DecisionRecord {
  return {
    run_id: field(row, 'run_id'),
    decision_text: field(row, 'decision_text') || field(row, 'decision'),
    timestamp_utc: field(row, 'timestamp_utc'),
    decision_id: optional(row, 'decision_id')
  };
}

export function toChangeRequest(row: LedgerRow): ChangeRequestRecord {
  return {
    request_id: field(row, 'request_id'),
    source_team: field(row, 'source_team'),
    run_id: optional(row, 'run_id'),
    status: optional(row, 'status'),
    supersedes_request_id: optional(row, 'supersedes_request_id')
  };
}

export function toRun(row: LedgerRow): Run {
  return {
    run_id: field(row, 'run_id'),
    current_phase: field(row, 'current_phase'),
    status: field(row, 'status'),
    pipeline_mode: optional(row, 'pipeline_mode'),
    created_utc: optional(row, 'created_utc'),
    supersedes_run_id: optional(row, 'supersedes_run_id')
  };
}

function mapValues(values: Record<string, string>, fn: (value: string) => string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    out[key] = fn(value);
  }
  return out;
}

export class LedgerStore {
  constructor(
    private source: RevisionSource,
    private config: GovernorConfig
  ) {}

  get revisionSource(): RevisionSource {
    return this.source;
  }

  // Working tree when ref is omitted
  readTable(path: string, ref?: string): ParsedTable | null {
    const content = ref === undefined ? this.source.readWorking(path) : this.source.readAt(ref, path);
    return content === null ? null : parseCsv(content);
  }

  requireTable(ruleId: string, path: string): ParsedTable {
    const table = this.readTable(path);
    if (!table) {
      throw new ConfigurationError(ruleId, `missing ledger: ${path}`);
    }
    return table;
  }

  // Rows present in the working tree that were not in baseRef
  appendedRows(path: string, baseRef: string): LedgerRow[] {
    const after = this.readTable(path);
    if (!after) {
      return [];
    }
    return addedRows(this.readTable(path, baseRef), after);
  }

  loadPhases(ruleId: string): TeamPhase[] {
    const table = this.requireTable(ruleId, this.config.ledgers.teamRegistry);
    const phases: TeamPhase[] = [];
    for (const row of table.rows) {
      const team_id = field(row, 'team_id');
      const raw = field(row, 'phase_order');
      if (!team_id || !raw) continue;
      const phase_order = Number(raw);
      if (!Number.isInteger(phase_order)) {
        throw new ConfigurationError(
          ruleId,
          `team_registry line ${row.line} has non-integer phase_order '${raw}' for team ${team_id}`
        );
      }
      phases.push({ team_id, phase_order });
    }
    return phases;
  }

  loadHandoffs(ruleId: string): TypedRow<HandoffRecord>[] {
    return this.requireTable(ruleId, this.config.ledgers.handoffLog).rows.flatMap(row => {
      const record = toHandoff(row);
      return record ? [{ line: row.line, record }] : [];
    });
  }

  // A missing decision log means no decisions were recorded
  loadDecisions(): DecisionRecord[] {
    const table = this.readTable(this.config.ledgers.decisionLog);
    return table ? table.rows.map(toDecision) : [];
  }

  loadChangeRequests(ruleId: string): TypedRow<ChangeRequestRecord>[] {
    return this.requireTable(ruleId, this.config.ledgers.changeRequestQueue).rows
      .map(row => ({ line: row.line, record: toChangeRequest(row) }));
  }

  loadRuns(ruleId: string): TypedRow<Run>[] {
    return this.requireTable(ruleId, this.config.ledgers.runRegistry).rows
      .map(row => ({ line: row.line, record: toRun(row) }))
      .filter(entry => entry.record.run_id !== '');
  }

  loadRunModes(ruleId: string): TypedRow<RunModeRecord>[] {
    return this.requireTable(ruleId, this.config.ledgers.runModeRegistry).rows.map(row => ({
      line: row.line,
      record: {
        run_id: field(row, 'run_id'),
        pipeline_mode: field(row, 'pipeline_mode'),
        declared_utc: field(row, 'declared_utc')
      }
    }));
  }

  loadBudgetEnvelopes(ruleId: string): BudgetEnvelope[] {
    return this.requireTable(ruleId, this.config.ledgers.budgetEnvelopes).rows.map(row => ({
      run_id: field(row, 'run_id'),
      fields: mapValues(row.values, v => v.trim())
    }));
  }

  loadReleaseGates(ruleId: string): ReleaseGateRecord[] {
    return this.requireTable(ruleId, this.config.ledgers.releaseGateLog).rows.map(row => ({
      release_id: field(row, 'release_id'),
      gates: mapValues(row.values, v => v.trim().toLowerCase())
    }));
  }

  // Optional ledger; no file means no exceptions granted
  loadGateExceptions(): GateException[] {
    const table = this.readTable(this.config.ledgers.gateExceptions);
    if (!table) {
      return [];
    }
    return table.rows.map(row => ({
      exception_id: field(row, 'exception_id'),
      release_id: field(row, 'release_id'),
      gate: field(row, 'gate'),
      approved_by_role: field(row, 'approved_by_role'),
      expires_utc: field(row, 'expires_utc')
    }));
  }
}
