import { describe, it, expect } from 'vitest';
import { LedgerStore, toHandoff } from './store.js';
import { MemoryRevisionSource } from '../revision/index.js';
import { DEFAULT_CONFIG } from '../config/index.js';

const L = DEFAULT_CONFIG.ledgers;

describe('toHandoff', () => {
  it('drops rows without run or team columns and reads either supersedes column', () => {
    expect(toHandoff({ line: 2, values: { run_id: 'R1', from_team: 'blue', to_team: '' } })).toBeNull();
    expect(toHandoff({
      line: 3,
      values: { run_id: 'R1', from_team: 'blue', to_team: 'red', timestamp_utc: 't', supersedes_ref: 'H-1' }
    })).toEqual({
      run_id: 'R1',
      from_team: 'blue',
      to_team: 'red',
      timestamp_utc: 't',
      entry_id: undefined,
      blocking_flags: undefined,
      supersedes_ref: 'H-1'
    });
  });
});

describe('LedgerStore', () => {
  it('returns only rows appended since the base ref', () => {
    const head = { [L.runRegistry]: 'run_id,current_phase,status\nR1,blue,active\n' };
    const store = new LedgerStore(new MemoryRevisionSource({
      head,
      working: { [L.runRegistry]: head[L.runRegistry] + 'R1,red,active\n' }
    }), structuredClone(DEFAULT_CONFIG));

    expect(store.appendedRows(L.runRegistry, 'HEAD')).toEqual([
      { line: 3, values: { run_id: 'R1', current_phase: 'red', status: 'active' } }
    ]);
    expect(store.loadRuns('TEST').map(row => row.record.current_phase)).toEqual(['blue', 'red']);
  });

  it('treats absent optional ledgers as empty', () => {
    const store = new LedgerStore(new MemoryRevisionSource({ head: {} }), structuredClone(DEFAULT_CONFIG));
    expect(store.loadDecisions()).toEqual([]);
    expect(store.loadGateExceptions()).toEqual([]);
    expect(() => store.loadRuns('TEST')).toThrow(`missing ledger: ${L.runRegistry}`);
  });

  it('normalises release gate colors to lower case', () => {
    const store = new LedgerStore(new MemoryRevisionSource({
      head: { [L.releaseGateLog]: 'release_id,security_gate\nR1, Red \n' }
    }), structuredClone(DEFAULT_CONFIG));
    expect(store.loadReleaseGates('TEST')).toEqual([{ release_id: 'R1', gates: { release_id: 'r1', security_gate: 'red' } }]);
  });
});
