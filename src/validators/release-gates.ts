// Release gates - budget envelope completeness and mandatory gate colors for the active run

import type { LedgerStore } from '../ledger/store.js';
import type { GovernorConfig } from '../config/index.js';
import type { BudgetEnvelope, GateColor } from '../types/governance.js';
import { EXIT_CODES, PolicyViolation } from '../errors.js';
import { canPublish, isGateColor } from '../gate/status.js';
import { passOutcome, type GateOutcome } from '../gate/outcome.js';

export const RELEASE_GATES_RULE = 'RELEASE-GATES';

export const BUDGET_CAP_FIELDS = ['per_run_cap_usd', 'daily_cap_usd', 'monthly_cap_usd'];

// Problems with one envelope: missing required fields, then non-positive caps
export function envelopeProblems(envelope: BudgetEnvelope, requiredFields: string[]): string[] {
  const problems: string[] = [];
  for (const name of requiredFields) {
    if (!(envelope.fields[name] ?? '').trim()) {
      problems.push(`missing required budget field '${name}' for run_id=${envelope.run_id}`);
    }
  }
  for (const cap of BUDGET_CAP_FIELDS) {
    const raw = (envelope.fields[cap] ?? '').trim();
    if (!raw) continue;
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0) {
      problems.push(`non-positive cap '${cap}' for run_id=${envelope.run_id}`);
    }
  }
  return problems;
}

export class ReleaseGateValidator {
  private settings: GovernorConfig['releaseGates'];

  constructor(
    config: GovernorConfig,
    private store: LedgerStore,
    private clock: () => Date = () => new Date()
  ) {
    this.settings = config.releaseGates;
  }

  private fail(message: string, details: string[] = []): never {
    throw new PolicyViolation(RELEASE_GATES_RULE, EXIT_CODES.releaseGates, message, details);
  }

  // The active run is the last row of the run registry
  activeRunId(): string {
    const runs = this.store.loadRuns(RELEASE_GATES_RULE);
    if (runs.length === 0) {
      this.fail('no runs found in run_registry');
    }
    return runs[runs.length - 1].record.run_id;
  }

  check(): GateOutcome {
    const runId = this.activeRunId();

    const envelopes = this.store.loadBudgetEnvelopes(RELEASE_GATES_RULE);
    if (envelopes.length === 0) {
      this.fail('budget envelope file has no data rows');
    }
    const forRun = envelopes.filter(env => env.run_id === runId);
    if (forRun.length === 0) {
      this.fail(`missing budget envelope row for run_id=${runId}`);
    }
    const budgetProblems = forRun.flatMap(env => envelopeProblems(env, this.settings.budgetFields));
    if (budgetProblems.length > 0) {
      this.fail(`budget envelope incomplete for run_id=${runId}`, budgetProblems);
    }

    const gateRows = this.store.loadReleaseGates(RELEASE_GATES_RULE);
    if (gateRows.length === 0) {
      this.fail('release gate log has no rows');
    }
    const rowsForRun = gateRows.filter(row => row.release_id === runId);
    if (rowsForRun.length === 0) {
      this.fail(`no release gate row for run_id=${runId}`);
    }

    const exceptions = this.store.loadGateExceptions();
    const now = this.clock();
    const excepted = new Set<string>();

    for (const row of rowsForRun) {
      const colors: Record<string, GateColor> = {};
      for (const gate of this.settings.mandatoryGates) {
        const value = row.gates[gate] ?? '';
        if (!isGateColor(value)) {
          this.fail(`invalid gate value ${gate}='${value}' for run_id=${runId}`);
        }
        colors[gate] = value;
      }

      const decision = canPublish(runId, colors, exceptions, now, this.settings.exceptionApproverRoles);
      if (!decision.allowed) {
        this.fail(`publish blocked: ${decision.blocking.join(', ')} red for run_id=${runId}`);
      }
      decision.excepted.forEach(gate => excepted.add(gate));
    }

    const note = excepted.size > 0 ? `; active exceptions: ${[...excepted].sort().join(', ')}` : '';
    return passOutcome(RELEASE_GATES_RULE, `budget and release gates valid for run_id=${runId}${note}`);
  }
}
