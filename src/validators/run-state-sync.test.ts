import { describe, it, expect } from 'vitest';
import { RunStateSyncValidator, hasBlockingFlags } from './run-state-sync.js';
import { LedgerStore } from '../ledger/store.js';
import { MemoryRevisionSource } from '../revision/index.js';
import { DEFAULT_CONFIG } from '../config/index.js';
import { PolicyViolation } from '../errors.js';

const HANDOFFS = DEFAULT_CONFIG.ledgers.handoffLog;
const RUNS = DEFAULT_CONFIG.ledgers.runRegistry;
const HANDOFF_HEADER = 'run_id,from_team,to_team,timestamp_utc,blocking_flags\n';
const RUN_HEADER = 'run_id,current_phase,status,created_utc\n';

function validator(handoffs: string, runs: string): RunStateSyncValidator {
  const source = new MemoryRevisionSource({
    head: { [HANDOFFS]: HANDOFF_HEADER, [RUNS]: RUN_HEADER },
    working: { [HANDOFFS]: HANDOFF_HEADER + handoffs, [RUNS]: RUN_HEADER + runs }
  });
  const config = structuredClone(DEFAULT_CONFIG);
  return new RunStateSyncValidator(config, new LedgerStore(source, config));
}

describe('hasBlockingFlags', () => {
  it('ignores empty values and empty lists', () => {
    expect(hasBlockingFlags(undefined)).toBe(false);
    expect(hasBlockingFlags(' [] ')).toBe(false);
    expect(hasBlockingFlags('[evidence_missing]')).toBe(true);
  });
});

describe('RunStateSyncValidator', () => {
  it('passes when every handoff has a run-state row', () => {
    const outcome = validator(
      'R1,blue,red,2026-02-10T22:01:00Z,\n',
      'R1,red,active,2026-02-10T22:01:00Z\n'
    ).check('HEAD');
    expect(outcome.message).toBe('validated 1 added handoff row(s) with 1 added run-state row(s)');
  });

  it('reports handoffs without a run-state row', () => {
    expect(validator('R1,blue,red,2026-02-10T22:01:00Z,\n', '').evaluate('HEAD').errors).toEqual([
      'handoff line 2 run_id=R1 has no appended run_registry row in same cycle'
    ]);
  });

  it('requires a blocked state for a handoff with blocking flags', () => {
    const sync = validator(
      'R1,blue,red,2026-02-10T22:01:00Z,"[evidence_missing]"\n',
      'R1,red,active,2026-02-10T22:01:00Z\n'
    );
    expect(sync.evaluate('HEAD').errors).toEqual([
      'handoff line 2 run_id=R1 has blocking_flags but no appended blocked run state'
    ]);
    expect(() => sync.check('HEAD')).toThrow(PolicyViolation);
  });

  it('accepts a blocked state for a flagged handoff', () => {
    const sync = validator(
      'R1,blue,red,2026-02-10T22:01:00Z,[evidence_missing]\n',
      'R1,red,Blocked,2026-02-10T22:01:00Z\n'
    );
    expect(sync.evaluate('HEAD').errors).toEqual([]);
  });

  it('passes with a note when no handoffs were appended', () => {
    expect(validator('', '').check('HEAD').message).toBe('no new handoff rows added');
  });
});
