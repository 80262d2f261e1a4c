// Request-ID policy and global uniqueness for the change-request queue

import { field } from '../ledger/csv.js';
import type { LedgerStore, TypedRow } from '../ledger/store.js';
import type { GovernorConfig } from '../config/index.js';
import type { ChangeRequestRecord } from '../types/governance.js';
import { ConfigurationError, EXIT_CODES, PolicyViolation } from '../errors.js';
import { passOutcome, type GateOutcome } from '../gate/outcome.js';

export const REQUEST_ID_POLICY_RULE = 'REQUEST-ID-POLICY';
export const REQUEST_ID_UNIQUE_RULE = 'REQUEST-ID-UNIQUE';

export function requestIdPattern(teamCodes: string[]): RegExp {
  return new RegExp(`^CR-(${teamCodes.join('|')})-([0-9]{4})$`);
}

export class RequestIdPolicyValidator {
  private pattern: RegExp;
  private teamCodes: string[];
  private queuePath: string;

  constructor(config: GovernorConfig, private store: LedgerStore) {
    this.teamCodes = config.requestIds.teamCodes;
    this.pattern = requestIdPattern(this.teamCodes);
    this.queuePath = config.ledgers.changeRequestQueue;
  }

  // Problems in the rows appended since baseRef
  evaluate(baseRef: string): { added: number; errors: string[] } {
    if (!this.store.revisionSource.verifyRef(baseRef)) {
      throw new ConfigurationError(REQUEST_ID_POLICY_RULE, `invalid base ref: ${baseRef}`);
    }

    const appended = this.store.appendedRows(this.queuePath, baseRef);
    if (appended.length === 0) {
      return { added: 0, errors: [] };
    }

    const queue = this.store.requireTable(REQUEST_ID_POLICY_RULE, this.queuePath);
    for (const column of ['request_id', 'source_team']) {
      if (!queue.header.includes(column)) {
        throw new ConfigurationError(REQUEST_ID_POLICY_RULE, `change request queue missing required header: ${column}`);
      }
    }

    const occurrences = new Map<string, number>();
    for (const row of queue.rows) {
      const id = field(row, 'request_id');
      if (id) occurrences.set(id, (occurrences.get(id) ?? 0) + 1);
    }

    const errors: string[] = [];
    for (const row of appended) {
      const requestId = field(row, 'request_id');
      const sourceTeam = field(row, 'source_team').toLowerCase();
      const match = this.pattern.exec(requestId);
      if (!match) {
        errors.push(
          `line ${row.line}: request_id '${requestId}' must match CR-<TEAM>-NNNN (TEAM in ${this.teamCodes.join('|')})`
        );
        continue;
      }
      const idTeam = match[1].toLowerCase();
      if (idTeam !== sourceTeam) {
        errors.push(`line ${row.line}: request_id team '${idTeam}' does not match source_team '${sourceTeam}'`);
        continue;
      }
      const count = occurrences.get(requestId) ?? 0;
      if (count > 1) {
        errors.push(`line ${row.line}: request_id '${requestId}' is not unique in queue (count=${count})`);
      }
    }

    return { added: appended.length, errors };
  }

  check(baseRef = 'HEAD'): GateOutcome {
    const { added, errors } = this.evaluate(baseRef);
    if (errors.length > 0) {
      throw new PolicyViolation(
        REQUEST_ID_POLICY_RULE,
        EXIT_CODES.requestIdPolicy,
        'request-id policy violations in newly added change requests',
        errors
      );
    }
    return passOutcome(
      REQUEST_ID_POLICY_RULE,
      added === 0 ? 'no new change-request rows added' : `validated ${added} new change-request row(s)`
    );
  }
}

export interface UniquenessSummary {
  duplicateIds: number;
  resolvedViaSupersedes: number;
  violations: string[];
}

// A duplicated id is resolved when its latest row is closed and names what it supersedes
export function evaluateUniqueness(rows: TypedRow<ChangeRequestRecord>[]): UniquenessSummary {
  const byId = new Map<string, TypedRow<ChangeRequestRecord>[]>();
  for (const row of rows) {
    const id = row.record.request_id;
    if (!id) continue;
    const group = byId.get(id) ?? [];
    group.push(row);
    byId.set(id, group);
  }

  const summary: UniquenessSummary = { duplicateIds: 0, resolvedViaSupersedes: 0, violations: [] };
  for (const [id, group] of byId) {
    if (group.length === 1) continue;
    summary.duplicateIds++;
    const latest = group.reduce((a, b) => (b.line > a.line ? b : a));
    const status = (latest.record.status ?? '').toLowerCase();
    if (status === 'open') {
      summary.violations.push(`request_id=${id} line=${latest.line} latest duplicate row is open; expected closed lifecycle`);
      continue;
    }
    if (!latest.record.supersedes_request_id) {
      summary.violations.push(`request_id=${id} line=${latest.line} missing supersedes_request_id on latest duplicate row`);
      continue;
    }
    summary.resolvedViaSupersedes++;
  }
  return summary;
}

export class RequestIdUniquenessValidator {
  private queuePath: string;

  constructor(config: GovernorConfig, private store: LedgerStore) {
    this.queuePath = config.ledgers.changeRequestQueue;
  }

  check(): GateOutcome {
    const rows = this.store.loadChangeRequests(REQUEST_ID_UNIQUE_RULE);
    if (rows.length === 0) {
      throw new PolicyViolation(REQUEST_ID_UNIQUE_RULE, EXIT_CODES.requestIdUniqueness, `empty queue: ${this.queuePath}`);
    }
    const summary = evaluateUniqueness(rows);
    if (summary.violations.length > 0) {
      throw new PolicyViolation(
        REQUEST_ID_UNIQUE_RULE,
        EXIT_CODES.requestIdUniqueness,
        'unresolved duplicate request_id values detected',
        summary.violations
      );
    }
    return passOutcome(
      REQUEST_ID_UNIQUE_RULE,
      `duplicate_ids=${summary.duplicateIds}; resolved_via_supersedes=${summary.resolvedViaSupersedes}; queue=${this.queuePath}`
    );
  }
}
