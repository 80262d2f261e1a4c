import { describe, it, expect } from 'vitest';
import { PipelineModeValidator, latestModes, isPipelineMode, PIPELINE_MODE_RULE } from './pipeline-mode.js';
import { LedgerStore } from '../ledger/store.js';
import { MemoryRevisionSource, type FileTree } from '../revision/index.js';
import { DEFAULT_CONFIG } from '../config/index.js';
import { ConfigurationError, PolicyViolation } from '../errors.js';

const { runModeRegistry: MODES, runRegistry: RUNS, handoffLog: HANDOFFS } = DEFAULT_CONFIG.ledgers;
const MODE_HEADER = 'run_id,pipeline_mode,declared_utc\n';
const RUN_HEADER = 'run_id,current_phase,status\n';
const HANDOFF_HEADER = 'run_id,from_team,to_team,timestamp_utc\n';

function validator(head: FileTree, working: FileTree): PipelineModeValidator {
  const config = structuredClone(DEFAULT_CONFIG);
  return new PipelineModeValidator(config, new LedgerStore(new MemoryRevisionSource({ head, working }), config));
}

describe('latestModes', () => {
  it('keeps the latest declaration per run, later rows winning ties', () => {
    const latest = latestModes([
      { run_id: 'R1', pipeline_mode: 'full', declared_utc: '2026-02-02' },
      { run_id: 'R1', pipeline_mode: 'lite', declared_utc: '2026-02-01' },
      { run_id: 'R2', pipeline_mode: 'full', declared_utc: '2026-02-01' },
      { run_id: 'R2', pipeline_mode: 'lite', declared_utc: '2026-02-01' }
    ]);
    expect(latest.get('R1')?.pipeline_mode).toBe('full');
    expect(latest.get('R2')?.pipeline_mode).toBe('lite');
  });

  it('recognises only full and lite', () => {
    expect(isPipelineMode('full')).toBe(true);
    expect(isPipelineMode('FULL')).toBe(false);
  });
});

describe('PipelineModeValidator', () => {
  const head: FileTree = {
    [MODES]: MODE_HEADER + 'R1,full,2026-02-01T00:00:00Z\n',
    [RUNS]: RUN_HEADER,
    [HANDOFFS]: HANDOFF_HEADER
  };

  it('passes when every impacted run declares a valid mode', () => {
    const outcome = validator(head, { ...head, [RUNS]: RUN_HEADER + 'R1,red,active\n' }).check('HEAD');
    expect(outcome).toMatchObject({
      passed: true,
      ruleId: PIPELINE_MODE_RULE,
      message: 'validated pipeline mode declarations for 1 impacted run(s)'
    });
  });

  it('passes with a note when no run or handoff rows were appended', () => {
    expect(validator(head, head).check('HEAD').message).toBe('no new run/handoff rows added');
  });

  it('reports invalid declarations and undeclared runs', () => {
    const checker = validator(head, {
      [MODES]: head[MODES] + 'R2,turbo,2026-02-03T00:00:00Z\n',
      [RUNS]: RUN_HEADER + 'R2,blue,active\n',
      [HANDOFFS]: HANDOFF_HEADER + 'R3,blue,red,2026-02-03T00:00:00Z\n'
    });

    expect(checker.evaluate('HEAD')).toEqual({
      impactedRuns: ['R2', 'R3'],
      errors: [
        "run_mode_registry line 3 has invalid pipeline_mode='turbo'",
        "run_id=R2 has invalid declared pipeline_mode='turbo'",
        'run_id=R3 has no pipeline mode declaration in run_mode_registry'
      ]
    });
    expect(() => checker.check('HEAD')).toThrow(PolicyViolation);
  });

  it('treats a missing mode registry as a configuration error', () => {
    const bare: FileTree = { [RUNS]: RUN_HEADER, [HANDOFFS]: HANDOFF_HEADER };
    expect(() => validator(bare, bare).check('HEAD')).toThrow(ConfigurationError);
  });
});
