// Gate Harness - runs every check, one result slot per check, then aggregates

import { writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { GateCheck } from './checks.js';
import type { CheckResult, GateReport } from '../types/governance.js';
import { outcomeFromError, type GateOutcome } from '../gate/outcome.js';
import { SchemaValidator } from '../gate/validator.js';
import { EXIT_CODES } from '../errors.js';

export const HARNESS_RULE = 'VALIDATION-HARNESS';

export interface HarnessResult {
  check: GateCheck;
  outcome: GateOutcome;
  durationMs: number;
}

export interface HarnessRun {
  results: HarnessResult[];
  passed: boolean;
  exitCode: number;
}

export interface ReportOptions {
  baseRef?: string;
  generatedAt?: Date;
}

async function runOne(check: GateCheck): Promise<HarnessResult> {
  const started = Date.now();
  let outcome: GateOutcome;
  try {
    outcome = await check.run();
  } catch (err) {
    outcome = outcomeFromError(check.id, err);
  }
  return { check, outcome, durationMs: Date.now() - started };
}

export class GateHarness {
  private validator: SchemaValidator = new SchemaValidator();

  constructor(private checks: GateCheck[]) {}

  // Every check runs regardless of earlier failures
  async run(): Promise<HarnessRun> {
    const slots: Array<HarnessResult | undefined> = new Array(this.checks.length).fill(undefined);
    await Promise.all(
      this.checks.map(async (check, idx) => {
        slots[idx] = await runOne(check);
      })
    );

    const results = slots.flatMap(slot => (slot ? [slot] : []));
    const passed = results.length === this.checks.length && results.every(r => r.outcome.passed);
    for (const result of results) {
      console.log(`[HARNESS] ${result.check.id} ${result.outcome.passed ? 'pass' : 'fail'} (${result.durationMs}ms)`);
    }

    return { results, passed, exitCode: passed ? 0 : EXIT_CODES.harness };
  }

  toReport(run: HarnessRun, options: ReportOptions = {}): GateReport {
    const checks: CheckResult[] = run.results.map(({ check, outcome }) => ({
      id: check.id,
      status: outcome.passed ? 'pass' : 'fail',
      message: outcome.details.length > 0 && !outcome.passed
        ? `${outcome.message} | ${outcome.details.join('; ')}`
        : outcome.message
    }));

    const report: GateReport = { checks, overall: run.passed ? 'pass' : 'fail' };
    if (options.baseRef) {
      report.base_ref = options.baseRef;
    }
    if (options.generatedAt) {
      report.generated_at_utc = options.generatedAt.toISOString();
    }
    this.validator.assertValidReport(report);
    return report;
  }

  writeReport(path: string, report: GateReport): void {
    this.validator.assertValidReport(report);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(report, null, 2) + '\n');
    console.log(`[HARNESS] report written: ${path}`);
  }
}
