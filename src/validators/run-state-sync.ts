// Run-state sync - every appended handoff needs an appended run-registry row for its run

import { toHandoff, toRun, type LedgerStore } from '../ledger/store.js';
import type { GovernorConfig } from '../config/index.js';
import type { Run } from '../types/governance.js';
import { ConfigurationError, EXIT_CODES, PolicyViolation } from '../errors.js';
import { passOutcome, type GateOutcome } from '../gate/outcome.js';

export const RUN_STATE_SYNC_RULE = 'RUN-STATE-SYNC';

export function hasBlockingFlags(flags: string | undefined): boolean {
  const value = (flags ?? '').trim();
  return value !== '' && value !== '[]';
}

export class RunStateSyncValidator {
  private handoffPath: string;
  private runPath: string;

  constructor(config: GovernorConfig, private store: LedgerStore) {
    this.handoffPath = config.ledgers.handoffLog;
    this.runPath = config.ledgers.runRegistry;
  }

  evaluate(baseRef: string): { handoffs: number; runStates: number; errors: string[] } {
    if (!this.store.revisionSource.verifyRef(baseRef)) {
      throw new ConfigurationError(RUN_STATE_SYNC_RULE, `invalid base ref: ${baseRef}`);
    }

    const handoffs = this.store.appendedRows(this.handoffPath, baseRef).flatMap(row => {
      const record = toHandoff(row);
      return record ? [{ line: row.line, record }] : [];
    });
    const runRows = this.store.appendedRows(this.runPath, baseRef).map(toRun).filter(run => run.run_id !== '');

    const runsById = new Map<string, Run[]>();
    for (const run of runRows) {
      const list = runsById.get(run.run_id) ?? [];
      list.push(run);
      runsById.set(run.run_id, list);
    }

    const errors: string[] = [];
    for (const { line, record } of handoffs) {
      const candidates = runsById.get(record.run_id) ?? [];
      if (candidates.length === 0) {
        errors.push(`handoff line ${line} run_id=${record.run_id} has no appended run_registry row in same cycle`);
        continue;
      }
      if (hasBlockingFlags(record.blocking_flags) && !candidates.some(run => run.status.toLowerCase() === 'blocked')) {
        errors.push(`handoff line ${line} run_id=${record.run_id} has blocking_flags but no appended blocked run state`);
      }
    }

    return { handoffs: handoffs.length, runStates: runRows.length, errors };
  }

  check(baseRef = 'HEAD'): GateOutcome {
    const { handoffs, runStates, errors } = this.evaluate(baseRef);
    if (errors.length > 0) {
      throw new PolicyViolation(
        RUN_STATE_SYNC_RULE,
        EXIT_CODES.runStateSync,
        'handoff/run-state synchronization violations detected',
        errors
      );
    }
    if (handoffs === 0) {
      return passOutcome(RUN_STATE_SYNC_RULE, 'no new handoff rows added');
    }
    return passOutcome(
      RUN_STATE_SYNC_RULE,
      `validated ${handoffs} added handoff row(s) with ${runStates} added run-state row(s)`
    );
  }
}
