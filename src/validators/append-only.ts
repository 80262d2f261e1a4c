// Append-Only Integrity Checker - governed ledgers may only grow

import { basename } from 'path';
import { parseCsv, type ParsedTable } from '../ledger/csv.js';
import { matchesAny } from '../revision/glob.js';
import type { RevisionSource } from '../revision/index.js';
import type { GovernorConfig } from '../config/index.js';
import type { LedgerRow } from '../types/governance.js';
import { ConfigurationError, IntegrityViolation } from '../errors.js';
import { passOutcome, type GateOutcome } from '../gate/outcome.js';

export const APPEND_ONLY_RULE = 'APPEND-ONLY';

export type IntegrityFindingKind = 'deleted_file' | 'header_changed' | 'row_removed' | 'row_mutated' | 'line_removed';

export interface IntegrityFinding {
  file: string;
  kind: IntegrityFindingKind;
  line?: number;
  key?: string;
  detail: string;
}

const SUPERSEDES_PREFIX = 'supersedes_';

function splitLines(text: string): string[] {
  const normalized = text.replace(/\r\n/g, '\n');
  const body = normalized.endsWith('\n') ? normalized.slice(0, -1) : normalized;
  return body === '' ? [] : body.split('\n');
}

export class AppendOnlyChecker {
  private scopes: string[];
  private rowKeys: Record<string, string[]>;

  constructor(config: GovernorConfig, private source?: RevisionSource) {
    this.scopes = config.appendOnly.scopes;
    this.rowKeys = config.appendOnly.rowKeys;
  }

  inScope(path: string): boolean {
    return matchesAny(path, this.scopes);
  }

  // Explicit snapshots: path -> content; paths outside the governed scopes are ignored
  compareSnapshots(before: Record<string, string>, after: Record<string, string>): IntegrityFinding[] {
    const findings: IntegrityFinding[] = [];
    for (const path of Object.keys(before).sort()) {
      if (!this.inScope(path)) continue;
      const next = after[path];
      if (next === undefined) {
        findings.push({ file: path, kind: 'deleted_file', detail: `${path} deleted; governed ledgers are append-only` });
        continue;
      }
      findings.push(...this.compareFile(path, before[path], next));
    }
    return findings;
  }

  compareFile(path: string, before: string, after: string): IntegrityFinding[] {
    return path.endsWith('.csv')
      ? this.compareTable(path, parseCsv(before), parseCsv(after))
      : this.compareLines(path, before, after);
  }

  // Every previous line must survive, in order
  compareLines(path: string, before: string, after: string): IntegrityFinding[] {
    const oldLines = splitLines(before);
    const newLines = splitLines(after);
    const findings: IntegrityFinding[] = [];
    let cursor = 0;

    oldLines.forEach((text, idx) => {
      let k = cursor;
      while (k < newLines.length && newLines[k] !== text) k++;
      if (k === newLines.length) {
        findings.push({
          file: path,
          kind: 'line_removed',
          line: idx + 1,
          detail: `${path} line ${idx + 1} removed or rewritten: ${JSON.stringify(text)}`
        });
      } else {
        cursor = k + 1;
      }
    });

    return findings;
  }

  compareTable(path: string, before: ParsedTable, after: ParsedTable): IntegrityFinding[] {
    const findings: IntegrityFinding[] = [];
    if (before.header.join(',') !== after.header.join(',')) {
      findings.push({
        file: path,
        kind: 'header_changed',
        line: 1,
        detail: `${path} header changed from [${before.header.join(',')}] to [${after.header.join(',')}]`
      });
    }

    const configured = this.rowKeys[basename(path)] ?? [];
    const keyColumns = configured.filter(col => before.header.includes(col));
    const keyOf = (row: LedgerRow): string[] =>
      keyColumns.length > 0 ? keyColumns.map(col => (row.values[col] ?? '').trim()) : before.header.map(col => row.values[col] ?? '');
    const sameRow = (a: LedgerRow, b: LedgerRow): boolean =>
      before.header.every(col => (a.values[col] ?? '') === (b.values[col] ?? ''));

    // Pass 1: consume identical rows
    const unconsumed = [...after.rows];
    const unmatched: LedgerRow[] = [];
    for (const row of before.rows) {
      const idx = unconsumed.findIndex(candidate => sameRow(row, candidate));
      if (idx >= 0) {
        unconsumed.splice(idx, 1);
      } else {
        unmatched.push(row);
      }
    }
    const newRows = [...unconsumed];

    // Pass 2: classify the rest as mutated in place or removed
    for (const row of unmatched) {
      const key = keyOf(row);
      if (this.isSuperseded(row, key, newRows, keyOf)) continue;

      const formatted = `(${key.join(', ')})`;
      const idx = unconsumed.findIndex(candidate => keyOf(candidate).join('\u0000') === key.join('\u0000'));
      if (idx >= 0) {
        unconsumed.splice(idx, 1);
        findings.push({
          file: path,
          kind: 'row_mutated',
          line: row.line,
          key: formatted,
          detail: `${path} row ${formatted} changed in place; append a superseding row instead`
        });
      } else {
        findings.push({
          file: path,
          kind: 'row_removed',
          line: row.line,
          key: formatted,
          detail: `${path} row ${formatted} removed without a superseding row`
        });
      }
    }

    return findings;
  }

  // A distinct new row with supersedes_<col> naming the old row's <col> value or its composite key
  private isSuperseded(
    row: LedgerRow,
    key: string[],
    newRows: LedgerRow[],
    keyOf: (row: LedgerRow) => string[]
  ): boolean {
    const composite = key.join('|');
    const ownKey = key.join('\u0000');
    return newRows.some(candidate =>
      keyOf(candidate).join('\u0000') !== ownKey &&
      Object.entries(candidate.values).some(([column, raw]) => {
        if (!column.startsWith(SUPERSEDES_PREFIX)) return false;
        const ref = raw.trim();
        if (!ref) return false;
        const target = column.slice(SUPERSEDES_PREFIX.length);
        const own = row.values[target];
        return own !== undefined ? own.trim() === ref : composite === ref;
      })
    );
  }

  evaluate(baseRef: string): IntegrityFinding[] {
    const source = this.requireSource();
    if (!source.verifyRef(baseRef)) {
      throw new ConfigurationError(APPEND_ONLY_RULE, `invalid base ref: ${baseRef}`);
    }

    const findings: IntegrityFinding[] = [];
    for (const change of source.changedPaths(baseRef)) {
      if (!this.inScope(change.path) || change.status === 'added') continue;
      if (change.status === 'deleted') {
        findings.push({ file: change.path, kind: 'deleted_file', detail: `${change.path} deleted; governed ledgers are append-only` });
        continue;
      }
      const before = source.readAt(baseRef, change.path) ?? '';
      const after = source.readWorking(change.path) ?? '';
      findings.push(...this.compareFile(change.path, before, after));
    }
    return findings;
  }

  check(baseRef = 'HEAD'): GateOutcome {
    const findings = this.evaluate(baseRef);
    if (findings.length > 0) {
      const files = new Set(findings.map(f => f.file));
      throw new IntegrityViolation(
        APPEND_ONLY_RULE,
        `append-only violations in ${files.size} governed file(s) against ${baseRef}`,
        findings.map(f => f.detail)
      );
    }
    return passOutcome(APPEND_ONLY_RULE, `governed ledgers are append-only against ${baseRef}`);
  }

  private requireSource(): RevisionSource {
    if (!this.source) {
      throw new ConfigurationError(APPEND_ONLY_RULE, 'no revision source configured for base-ref comparison');
    }
    return this.source;
  }
}
