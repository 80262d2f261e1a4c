import { describe, it, expect } from 'vitest';
import { PhaseOrderValidator, PHASE_ORDER_RULE } from './pipeline-order.js';
import { PhaseRegistry } from '../ledger/registry.js';
import { LedgerStore } from '../ledger/store.js';
import { MemoryRevisionSource } from '../revision/index.js';
import { DEFAULT_CONFIG, type GovernorConfig } from '../config/index.js';
import { ConfigurationError, OrderingViolation, UnknownTeamError } from '../errors.js';
import type { DecisionRecord, HandoffRecord } from '../types/governance.js';

const TEAMS = ['blue', 'red', 'green', 'black', 'white', 'grey'];

function config(): GovernorConfig {
  return { ...structuredClone(DEFAULT_CONFIG), doctrineRef: 'doctrine.md' };
}

function registry(): PhaseRegistry {
  return new PhaseRegistry(TEAMS.map((team_id, idx) => ({ team_id, phase_order: idx + 1 })));
}

function handoff(run_id: string, from_team: string, to_team: string, minute: number): HandoffRecord {
  return { run_id, from_team, to_team, timestamp_utc: `2026-02-10T22:${String(minute).padStart(2, '0')}:00Z` };
}

const BLOCK: DecisionRecord = {
  run_id: 'R1',
  decision_text: 'hard_fail_pipeline_order_violation: white handed off out of order',
  timestamp_utc: '2026-02-10T22:30:00Z'
};

describe('PhaseOrderValidator', () => {
  const validator = new PhaseOrderValidator(config());

  it('accepts handoffs that advance one phase at a time', () => {
    const result = validator.evaluate([
      handoff('R1', 'blue', 'red', 1),
      handoff('R1', 'red', 'green', 2),
      handoff('R1', 'green', 'black', 3)
    ], registry(), []);

    expect(result.failure).toBeNull();
    expect(result.runs[0]).toMatchObject({ runId: 'R1', accepted: 3, duplicates: 0, trace: ['ordered'] });
    expect(result.runs[0].finalState).toEqual({ kind: 'ordered', latestPhase: 4 });
  });

  it('fails a skipped phase with expected and observed pairs', () => {
    const result = validator.evaluate([
      handoff('R1', 'blue', 'red', 1),
      handoff('R1', 'red', 'green', 2),
      handoff('R1', 'white', 'grey', 3)
    ], registry(), []);

    expect(result.failure).toMatchObject({
      kind: 'out_of_order',
      runId: 'R1',
      expectedPair: 'green->black',
      observedPair: 'white->grey',
      observedDelta: 1
    });
    expect(result.failure?.message).toBe(
      'run_id=R1 out-of-order handoff; expected_phase_delta=1; observed_phase_delta=1; ' +
      'expected_pair=green->black; observed=white->grey; block_decision_log=missing; doctrine=doctrine.md'
    );
    expect(() => validator.assertOrdered(result)).toThrow(OrderingViolation);
  });

  it('contains the anomaly when the run logged a block decision', () => {
    const result = validator.evaluate([
      handoff('R1', 'blue', 'red', 1),
      handoff('R1', 'red', 'green', 2),
      handoff('R1', 'white', 'grey', 3)
    ], registry(), [BLOCK]);

    expect(result.failure).toBeNull();
    const run = result.runs[0];
    expect(run.trace).toEqual(['ordered', 'anomaly_contained']);
    expect(run.contained).toEqual([{
      runId: 'R1',
      timestamp: '2026-02-10T22:03:00Z',
      expectedPair: 'green->black',
      observedPair: 'white->grey',
      observedDelta: 1
    }]);
    expect(run.finalState.latestPhase).toBe(3);
  });

  it('returns to ordered once the run resumes from the last accepted phase', () => {
    const result = validator.evaluate([
      handoff('R1', 'blue', 'red', 1),
      handoff('R1', 'white', 'grey', 2),
      handoff('R1', 'red', 'green', 3)
    ], registry(), [BLOCK]);

    expect(result.runs[0].trace).toEqual(['ordered', 'anomaly_contained', 'ordered']);
    expect(result.runs[0].finalState).toEqual({ kind: 'ordered', latestPhase: 3 });
  });

  // A single block decision also covers later, unrelated anomalies in the same run
  it('keeps containing every anomaly in a run that logged one block decision', () => {
    const result = validator.evaluate([
      handoff('R1', 'blue', 'red', 1),
      handoff('R1', 'white', 'grey', 2),
      handoff('R1', 'black', 'blue', 3)
    ], registry(), [BLOCK]);

    expect(result.failure).toBeNull();
    expect(result.runs[0].contained.map(a => a.observedPair)).toEqual(['white->grey', 'black->blue']);
  });

  it('does not let one run\'s block decision contain another run', () => {
    const result = validator.evaluate([
      handoff('R2', 'blue', 'red', 1),
      handoff('R2', 'green', 'black', 2)
    ], registry(), [BLOCK]);

    expect(result.failure?.kind).toBe('out_of_order');
  });

  it('skips a re-logged copy of the last accepted step', () => {
    const result = validator.evaluate([
      handoff('R1', 'blue', 'red', 1),
      handoff('R1', 'red', 'green', 2),
      handoff('R1', 'red', 'green', 3),
      handoff('R1', 'green', 'black', 4)
    ], registry(), []);

    expect(result.failure).toBeNull();
    expect(result.runs[0]).toMatchObject({ accepted: 3, duplicates: 1 });
  });

  it('orders each run by timestamp before checking', () => {
    const result = validator.evaluate([
      handoff('R1', 'red', 'green', 2),
      handoff('R1', 'blue', 'red', 1)
    ], registry(), []);

    expect(result.failure).toBeNull();
  });

  it('reports an unknown team as its own failure kind', () => {
    const result = validator.evaluate([handoff('R1', 'blue', 'purple', 1)], registry(), []);
    expect(result.failure).toMatchObject({ kind: 'unknown_team', team: 'purple' });
    expect(() => validator.assertOrdered(result)).toThrow(UnknownTeamError);
  });

  it('treats an empty registry as a configuration error', () => {
    expect(() => validator.evaluate([handoff('R1', 'blue', 'red', 1)], new PhaseRegistry([]), []))
      .toThrow(ConfigurationError);
  });

  it('fails when there are no handoffs at all', () => {
    const result = validator.evaluate([], registry(), []);
    expect(result.failure).toEqual({ kind: 'no_handoffs', message: 'no handoff rows found; doctrine=doctrine.md' });
    expect(() => validator.assertOrdered(result)).toThrow(OrderingViolation);
  });
});

describe('PhaseOrderValidator.check', () => {
  const cfg = config();
  const teamRegistry = 'team_id,phase_order\n' + TEAMS.map((team, idx) => `${team},${idx + 1}`).join('\n') + '\n';

  function storeWith(handoffCsv: string, decisionCsv?: string): LedgerStore {
    const head: Record<string, string> = {
      [cfg.ledgers.teamRegistry]: teamRegistry,
      [cfg.ledgers.handoffLog]: handoffCsv
    };
    if (decisionCsv !== undefined) {
      head[cfg.ledgers.decisionLog] = decisionCsv;
    }
    return new LedgerStore(new MemoryRevisionSource({ head }), cfg);
  }

  it('passes and lists contained anomalies from the ledgers', () => {
    const store = storeWith(
      'run_id,from_team,to_team,timestamp_utc\n' +
      'R1,blue,red,2026-02-10T22:01:00Z\n' +
      'R1,white,grey,2026-02-10T22:02:00Z\n',
      'decision_id,run_id,decision_text,timestamp_utc\n' +
      'D1,R1,hard_fail_pipeline_order_violation,2026-02-10T22:05:00Z\n'
    );

    const outcome = new PhaseOrderValidator(cfg).check(store);
    expect(outcome.passed).toBe(true);
    expect(outcome.ruleId).toBe(PHASE_ORDER_RULE);
    expect(outcome.message).toBe(
      'pipeline order valid via team registry phases; runs=1; contained_anomalies=1; doctrine=doctrine.md'
    );
    expect(outcome.details).toEqual([
      'run_id=R1 contained anomaly at 2026-02-10T22:02:00Z: expected_pair=red->green; observed=white->grey'
    ]);
  });

  it('throws a configuration error when the team registry is missing', () => {
    const store = new LedgerStore(new MemoryRevisionSource({ head: {} }), cfg);
    expect(() => new PhaseOrderValidator(cfg).check(store))
      .toThrow(`missing ledger: ${cfg.ledgers.teamRegistry}`);
  });

  it('rejects a non-integer phase order', () => {
    const store = new LedgerStore(new MemoryRevisionSource({
      head: { [cfg.ledgers.teamRegistry]: 'team_id,phase_order\nblue,first\n' }
    }), cfg);
    expect(() => new PhaseOrderValidator(cfg).check(store))
      .toThrow("team_registry line 2 has non-integer phase_order 'first' for team blue");
  });
});
