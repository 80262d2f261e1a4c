// CSV Ledger Parsing - quote-aware parsing of governed tables

import type { LedgerRow } from '../types/governance.js';

export interface ParsedTable {
  header: string[];
  rows: LedgerRow[];
}

interface RawRecord {
  line: number;
  fields: string[];
}

// Splits text into records; quoted fields may contain commas, newlines and "" escapes
function readRecords(text: string): RawRecord[] {
  const records: RawRecord[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  let sawContent = false;

  const endRecord = (): void => {
    fields.push(field);
    if (sawContent || fields.length > 1 || field !== '') {
      records.push({ line: recordLine, fields });
    }
    fields = [];
    field = '';
    sawContent = false;
  };

  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  for (let i = 0; i < body.length; i++) {
    const ch = body[i];

    if (inQuotes) {
      if (ch === '"') {
        if (body[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      sawContent = true;
    } else if (ch === ',') {
      fields.push(field);
      field = '';
      sawContent = true;
    } else if (ch === '\r') {
      // CRLF line endings
      continue;
    } else if (ch === '\n') {
      endRecord();
      line++;
      recordLine = line;
    } else {
      field += ch;
      sawContent = true;
    }
  }

  if (sawContent || field !== '' || fields.length > 0) {
    endRecord();
  }

  return records;
}

export function parseCsv(text: string): ParsedTable {
  const records = readRecords(text);
  if (records.length === 0) {
    return { header: [], rows: [] };
  }

  const header = records[0].fields.map(h => h.trim());
  const rows: LedgerRow[] = records.slice(1).map(record => {
    const values: Record<string, string> = {};
    header.forEach((column, idx) => {
      values[column] = record.fields[idx] ?? '';
    });
    return { line: record.line, values };
  });

  return { header, rows };
}

// Trimmed column value, empty when absent
export function field(row: LedgerRow, column: string): string {
  return (row.values[column] ?? '').trim();
}

function rowSignature(header: string[], row: LedgerRow): string {
  return JSON.stringify(header.map(column => row.values[column] ?? ''));
}

// Rows of `after` not present in `before`, compared as a multiset
export function addedRows(before: ParsedTable | null, after: ParsedTable): LedgerRow[] {
  const remaining = new Map<string, number>();
  if (before) {
    for (const row of before.rows) {
      const sig = rowSignature(after.header, row);
      remaining.set(sig, (remaining.get(sig) ?? 0) + 1);
    }
  }

  const added: LedgerRow[] = [];
  for (const row of after.rows) {
    const sig = rowSignature(after.header, row);
    const count = remaining.get(sig) ?? 0;
    if (count > 0) {
      remaining.set(sig, count - 1);
    } else {
      added.push(row);
    }
  }
  return added;
}

function escapeCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(header: string[], rows: Array<Record<string, string>>): string {
  const lines = [header.map(escapeCell).join(',')];
  for (const row of rows) {
    lines.push(header.map(column => escapeCell(row[column] ?? '')).join(','));
  }
  return lines.join('\n') + '\n';
}
