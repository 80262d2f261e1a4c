// Pipeline mode registry - runs touched this cycle must declare full or lite

import { field } from '../ledger/csv.js';
import type { LedgerStore } from '../ledger/store.js';
import type { GovernorConfig } from '../config/index.js';
import type { PipelineMode, RunModeRecord } from '../types/governance.js';
import { ConfigurationError, EXIT_CODES, PolicyViolation } from '../errors.js';
import { passOutcome, type GateOutcome } from '../gate/outcome.js';

export const PIPELINE_MODE_RULE = 'PIPELINE-MODE';

const VALID_MODES: readonly string[] = ['full', 'lite'];

export function isPipelineMode(value: string): value is PipelineMode {
  return VALID_MODES.includes(value);
}

// Latest declaration per run; ties go to the later row
export function latestModes(rows: RunModeRecord[]): Map<string, RunModeRecord> {
  const latest = new Map<string, RunModeRecord>();
  for (const row of rows) {
    if (!row.run_id) continue;
    const prev = latest.get(row.run_id);
    if (!prev || row.declared_utc >= prev.declared_utc) {
      latest.set(row.run_id, row);
    }
  }
  return latest;
}

export class PipelineModeValidator {
  private ledgers: GovernorConfig['ledgers'];

  constructor(config: GovernorConfig, private store: LedgerStore) {
    this.ledgers = config.ledgers;
  }

  evaluate(baseRef: string): { impactedRuns: string[]; errors: string[] } {
    if (!this.store.revisionSource.verifyRef(baseRef)) {
      throw new ConfigurationError(PIPELINE_MODE_RULE, `invalid base ref: ${baseRef}`);
    }

    const modeRows = this.store.loadRunModes(PIPELINE_MODE_RULE);
    const errors: string[] = [];

    for (const row of this.store.appendedRows(this.ledgers.runModeRegistry, baseRef)) {
      const runId = field(row, 'run_id');
      const mode = field(row, 'pipeline_mode').toLowerCase();
      if (!runId) {
        errors.push(`run_mode_registry line ${row.line} missing run_id`);
      }
      if (!isPipelineMode(mode)) {
        errors.push(`run_mode_registry line ${row.line} has invalid pipeline_mode='${row.values.pipeline_mode ?? ''}'`);
      }
    }

    const impacted = new Set<string>();
    for (const path of [this.ledgers.runRegistry, this.ledgers.handoffLog]) {
      for (const row of this.store.appendedRows(path, baseRef)) {
        const runId = field(row, 'run_id');
        if (runId) impacted.add(runId);
      }
    }

    const latest = latestModes(modeRows.map(entry => entry.record));
    const impactedRuns = [...impacted].sort();
    for (const runId of impactedRuns) {
      const declaration = latest.get(runId);
      if (!declaration) {
        errors.push(`run_id=${runId} has no pipeline mode declaration in run_mode_registry`);
        continue;
      }
      const mode = declaration.pipeline_mode.toLowerCase();
      if (!isPipelineMode(mode)) {
        errors.push(`run_id=${runId} has invalid declared pipeline_mode='${mode}'`);
      }
    }

    return { impactedRuns, errors };
  }

  check(baseRef = 'HEAD'): GateOutcome {
    const { impactedRuns, errors } = this.evaluate(baseRef);
    if (errors.length > 0) {
      throw new PolicyViolation(
        PIPELINE_MODE_RULE,
        EXIT_CODES.pipelineMode,
        'run pipeline mode registry violations detected',
        errors
      );
    }
    if (impactedRuns.length === 0) {
      return passOutcome(PIPELINE_MODE_RULE, 'no new run/handoff rows added');
    }
    return passOutcome(
      PIPELINE_MODE_RULE,
      `validated pipeline mode declarations for ${impactedRuns.length} impacted run(s)`
    );
  }
}
