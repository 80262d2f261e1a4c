/**
 * SQLite history for gate reports
 *
 * Stores every harness report so repeated failures can be traced:
 * - One row per run with its base ref and pass/fail totals
 * - One row per check result
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { existsSync, mkdirSync } from 'fs';
import type { CheckResult, GateReport } from '../types/governance.js';

// ============ TYPES ============

export interface GateRunRecord {
  id: number;
  timestamp: string;
  base_ref: string | null;
  overall: 'pass' | 'fail';
  passed: number;
  failed: number;
  checks: CheckResult[];
}

export interface FailureCount {
  check_id: string;
  failures: number;
  last_failed: string;
}

interface RunRow {
  id: number;
  timestamp: string;
  base_ref: string | null;
  overall: string;
  passed: number;
  failed: number;
}

interface CheckRow {
  check_id: string;
  status: string;
  message: string;
}

export const IN_MEMORY = ':memory:';

export class GateHistoryDatabase {
  private db: Database.Database;

  constructor(dbPath: string = IN_MEMORY) {
    if (dbPath !== IN_MEMORY) {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.initTables();

    console.log(`[DB] gate history opened at: ${dbPath}`);
  }

  private initTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS gate_runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        base_ref TEXT,
        overall TEXT NOT NULL CHECK (overall IN ('pass', 'fail')),
        passed INTEGER NOT NULL DEFAULT 0,
        failed INTEGER NOT NULL DEFAULT 0
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS gate_checks (
        run_id INTEGER NOT NULL,
        position INTEGER NOT NULL,
        check_id TEXT NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('pass', 'fail')),
        message TEXT NOT NULL,
        PRIMARY KEY (run_id, position),
        FOREIGN KEY (run_id) REFERENCES gate_runs(id)
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_gate_runs_timestamp ON gate_runs(timestamp DESC);
      CREATE INDEX IF NOT EXISTS idx_gate_checks_check ON gate_checks(check_id, status);
    `);
  }

  // ============ RUN METHODS ============

  saveReport(report: GateReport, recordedAt: Date = new Date()): number {
    const timestamp = report.generated_at_utc ?? recordedAt.toISOString();
    const failed = report.checks.filter(check => check.status === 'fail').length;

    const insertRun = this.db.prepare<[string, string | null, string, number, number]>(`
      INSERT INTO gate_runs (timestamp, base_ref, overall, passed, failed)
      VALUES (?, ?, ?, ?, ?)
    `);
    const insertCheck = this.db.prepare<[number, number, string, string, string]>(`
      INSERT INTO gate_checks (run_id, position, check_id, status, message)
      VALUES (?, ?, ?, ?, ?)
    `);

    const save = this.db.transaction((): number => {
      const result = insertRun.run(
        timestamp,
        report.base_ref ?? null,
        report.overall,
        report.checks.length - failed,
        failed
      );
      const runId = Number(result.lastInsertRowid);
      report.checks.forEach((check, position) => {
        insertCheck.run(runId, position, check.id, check.status, check.message);
      });
      return runId;
    });

    const id = save();
    console.log(`[DB] saved gate run ${id} (${report.overall})`);
    return id;
  }

  getRun(id: number): GateRunRecord | null {
    const row = this.db.prepare<[number], RunRow>(`
      SELECT id, timestamp, base_ref, overall, passed, failed
      FROM gate_runs WHERE id = ?
    `).get(id);

    return row ? this.toRecord(row) : null;
  }

  getRuns(limit = 20): GateRunRecord[] {
    const rows = this.db.prepare<[number], RunRow>(`
      SELECT id, timestamp, base_ref, overall, passed, failed
      FROM gate_runs ORDER BY id DESC LIMIT ?
    `).all(limit);

    return rows.map(row => this.toRecord(row));
  }

  getRunCount(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM gate_runs').get();
    return row ? row.count : 0;
  }

  // ============ STATISTICS ============

  getFailureCounts(): FailureCount[] {
    return this.db.prepare<[], FailureCount>(`
      SELECT c.check_id AS check_id, COUNT(*) AS failures, MAX(r.timestamp) AS last_failed
      FROM gate_checks c JOIN gate_runs r ON r.id = c.run_id
      WHERE c.status = 'fail'
      GROUP BY c.check_id
      ORDER BY failures DESC, c.check_id ASC
    `).all();
  }

  private toRecord(row: RunRow): GateRunRecord {
    const checks = this.db.prepare<[number], CheckRow>(`
      SELECT check_id, status, message FROM gate_checks
      WHERE run_id = ? ORDER BY position ASC
    `).all(row.id);

    return {
      id: row.id,
      timestamp: row.timestamp,
      base_ref: row.base_ref,
      overall: row.overall === 'pass' ? 'pass' : 'fail',
      passed: row.passed,
      failed: row.failed,
      checks: checks.map(check => ({
        id: check.check_id,
        status: check.status === 'pass' ? 'pass' : 'fail',
        message: check.message
      }))
    };
  }

  // ============ CLEANUP ============

  close(): void {
    this.db.close();
  }
}
