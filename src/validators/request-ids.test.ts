import { describe, it, expect } from 'vitest';
import {
  RequestIdPolicyValidator,
  RequestIdUniquenessValidator,
  evaluateUniqueness,
  requestIdPattern,
  REQUEST_ID_UNIQUE_RULE
} from './request-ids.js';
import { LedgerStore, toChangeRequest } from '../ledger/store.js';
import { parseCsv } from '../ledger/csv.js';
import { MemoryRevisionSource, type FileTree } from '../revision/index.js';
import { DEFAULT_CONFIG } from '../config/index.js';
import { ConfigurationError, PolicyViolation } from '../errors.js';

const QUEUE = DEFAULT_CONFIG.ledgers.changeRequestQueue;
const HEADER = 'request_id,source_team,run_id,status';

function store(head: FileTree, working?: FileTree): LedgerStore {
  return new LedgerStore(new MemoryRevisionSource({ head, working }), structuredClone(DEFAULT_CONFIG));
}

describe('requestIdPattern', () => {
  it('accepts configured team codes with four digits', () => {
    const pattern = requestIdPattern(['BLUE', 'RED']);
    expect(pattern.test('CR-BLUE-0042')).toBe(true);
    expect(pattern.test('CR-GREEN-0042')).toBe(false);
    expect(pattern.test('CR-RED-42')).toBe(false);
  });
});

describe('RequestIdPolicyValidator', () => {
  const base = `${HEADER}\nCR-BLUE-0001,blue,R1,open\n`;

  it('passes when nothing was appended', () => {
    const outcome = new RequestIdPolicyValidator(structuredClone(DEFAULT_CONFIG), store({ [QUEUE]: base })).check('HEAD');
    expect(outcome.message).toBe('no new change-request rows added');
  });

  it('validates each appended row', () => {
    const working = base +
      'CR-BLUE-0002,blue,R1,open\n' +
      'CR-RED-0003,green,R1,open\n' +
      'cr-9,blue,R1,open\n' +
      'CR-BLUE-0001,blue,R2,open\n';
    const validator = new RequestIdPolicyValidator(structuredClone(DEFAULT_CONFIG), store({ [QUEUE]: base }, { [QUEUE]: working }));

    expect(validator.evaluate('HEAD')).toEqual({
      added: 4,
      errors: [
        "line 4: request_id team 'red' does not match source_team 'green'",
        "line 5: request_id 'cr-9' must match CR-<TEAM>-NNNN (TEAM in BLUE|RED|GREEN|BLACK|WHITE|GREY)",
        "line 6: request_id 'CR-BLUE-0001' is not unique in queue (count=2)"
      ]
    });
    expect(() => validator.check('HEAD')).toThrow(PolicyViolation);
  });

  it('counts clean appended rows', () => {
    const working = base + 'CR-GREEN-0002,Green,R1,open\n';
    const outcome = new RequestIdPolicyValidator(structuredClone(DEFAULT_CONFIG), store({ [QUEUE]: base }, { [QUEUE]: working }))
      .check('HEAD');
    expect(outcome.message).toBe('validated 1 new change-request row(s)');
  });

  it('requires the request_id and source_team headers', () => {
    const validator = new RequestIdPolicyValidator(
      structuredClone(DEFAULT_CONFIG),
      store({ [QUEUE]: 'request_id\nCR-BLUE-0001\n' }, { [QUEUE]: 'request_id\nCR-BLUE-0001\nCR-BLUE-0002\n' })
    );
    expect(() => validator.evaluate('HEAD')).toThrow('change request queue missing required header: source_team');
  });

  it('rejects an unknown base ref', () => {
    const validator = new RequestIdPolicyValidator(structuredClone(DEFAULT_CONFIG), store({ [QUEUE]: base }));
    expect(() => validator.evaluate('v9')).toThrow(ConfigurationError);
  });
});

describe('evaluateUniqueness', () => {
  const header = 'request_id,source_team,status,supersedes_request_id';

  function rows(text: string) {
    return parseCsv(`${header}\n${text}`).rows.map(row => ({ line: row.line, record: toChangeRequest(row) }));
  }

  it('resolves a duplicate whose latest row is closed and superseding', () => {
    expect(evaluateUniqueness(rows(
      'CR-BLUE-0001,blue,open,\n' +
      'CR-BLUE-0001,blue,closed,CR-BLUE-0001\n'
    ))).toEqual({ duplicateIds: 1, resolvedViaSupersedes: 1, violations: [] });
  });

  it('flags an open latest duplicate and a missing supersedes reference', () => {
    expect(evaluateUniqueness(rows(
      'CR-RED-0002,red,closed,\n' +
      'CR-RED-0002,red,open,\n' +
      'CR-GREY-0003,grey,open,\n' +
      'CR-GREY-0003,grey,closed,\n'
    )).violations).toEqual([
      'request_id=CR-RED-0002 line=3 latest duplicate row is open; expected closed lifecycle',
      'request_id=CR-GREY-0003 line=5 missing supersedes_request_id on latest duplicate row'
    ]);
  });
});

describe('RequestIdUniquenessValidator', () => {
  it('fails an empty queue', () => {
    const validator = new RequestIdUniquenessValidator(structuredClone(DEFAULT_CONFIG), store({ [QUEUE]: `${HEADER}\n` }));
    expect(() => validator.check()).toThrow(`empty queue: ${QUEUE}`);
  });

  it('reports duplicate and resolved counts', () => {
    const validator = new RequestIdUniquenessValidator(
      structuredClone(DEFAULT_CONFIG),
      store({ [QUEUE]: `${HEADER}\nCR-BLUE-0001,blue,R1,open\n` })
    );
    expect(validator.check()).toMatchObject({
      passed: true,
      ruleId: REQUEST_ID_UNIQUE_RULE,
      message: `duplicate_ids=0; resolved_via_supersedes=0; queue=${QUEUE}`
    });
  });
});
