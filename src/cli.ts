#!/usr/bin/env node
/**
 * pipeline-governor CLI
 *
 * Runs the process-integrity gates against a repository working copy.
 *
 * Usage:
 *   pipeline-governor <check> [arg]     Run one gate and exit with its code
 *   pipeline-governor run-all [base]    Run every gate and write the report
 *   pipeline-governor summary           Write the cycle health summary
 *   pipeline-governor history           Show recent gate runs
 *   pipeline-governor init              Write a starter config file
 */

import { writeFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { loadConfig, resolveRepoPath, writeStarterConfig, type GovernorConfig } from './config/index.js';
import { GitRevisionSource, GitSandbox } from './revision/index.js';
import { parseSecretScope } from './validators/secret-scan.js';
import { LedgerStore } from './ledger/store.js';
import { buildEnforcementChecks, type CheckContext, type GateCheck } from './harness/checks.js';
import { GateHarness } from './harness/runner.js';
import { GateHistoryDatabase } from './database/index.js';
import { buildCycleSummary, writeCycleSummary, SUMMARY_RULE } from './summary.js';
import { formatOutcome, failOutcome, outcomeFromError, passOutcome, type GateOutcome } from './gate/outcome.js';
import { toJUnit, toSARIF, renderConsole, TOOL_NAME, TOOL_VERSION } from './output/index.js';
import { GovernanceError, ConfigurationError, EXIT_CODES } from './errors.js';
import type { GateReport, SecretScope } from './types/governance.js';

// ANSI colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

function c(color: keyof typeof colors, text: string): string {
  return `${colors[color]}${text}${colors.reset}`;
}

type OutputFormat = 'json' | 'junit' | 'sarif' | 'console';

interface CliOptions {
  positional: string[];
  editorRole?: string;
  format: OutputFormat;
  output?: string;
  root: string;
  history: boolean;
  gitSandbox: boolean;
}

const CLI_RULE = 'CLI';

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'junit' || value === 'sarif' || value === 'console';
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { positional: [], format: 'json', root: process.cwd(), history: true, gitSandbox: false };

  const valueFor = (flag: string, idx: number): string => {
    const value = args[idx + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(CLI_RULE, `${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--editor-role':
        options.editorRole = valueFor(arg, i);
        i++;
        break;
      case '--format':
      case '-f': {
        const format = valueFor(arg, i);
        if (!isOutputFormat(format)) {
          throw new ConfigurationError(CLI_RULE, `unknown format '${format}'; expected json, junit, sarif or console`);
        }
        options.format = format;
        i++;
        break;
      }
      case '--output':
      case '-o':
        options.output = valueFor(arg, i);
        i++;
        break;
      case '--root':
        options.root = resolve(valueFor(arg, i));
        i++;
        break;
      case '--no-history':
        options.history = false;
        break;
      case '--git-sandbox':
        options.gitSandbox = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new ConfigurationError(CLI_RULE, `unknown option ${arg}`);
        }
        options.positional.push(arg);
    }
  }
  return options;
}

function emit(outcome: GateOutcome): number {
  const { stdout, stderr } = formatOutcome(outcome);
  for (const line of stdout) console.log(line);
  for (const line of stderr) console.error(line);
  return outcome.exitCode;
}

function checkContext(config: GovernorConfig, options: CliOptions, baseRef: string, secretScope?: SecretScope): CheckContext {
  return {
    config,
    source: new GitRevisionSource(config.rootDir),
    baseRef,
    editorRole: options.editorRole,
    secretScope,
    catalog: options.gitSandbox ? { createSandbox: () => new GitSandbox() } : undefined
  };
}

// ============ SINGLE CHECK ============

async function runSingle(name: string, options: CliOptions): Promise<number> {
  const config = loadConfig(options.root);
  const arg = options.positional[1];
  const scope = name === 'secret-scan' ? parseSecretScope(arg) : undefined;
  const baseRef = name === 'secret-scan' || arg === undefined ? 'HEAD' : arg;

  const checks = buildEnforcementChecks(checkContext(config, options, baseRef, scope));
  const check = checks.find(candidate => candidate.name === name);
  if (!check) {
    throw new ConfigurationError(CLI_RULE, `unknown check ${name}`);
  }

  let outcome: GateOutcome;
  try {
    outcome = await check.run();
  } catch (err) {
    outcome = outcomeFromError(check.id, err);
  }
  return emit(outcome);
}

// ============ RUN-ALL ============

function render(report: GateReport, format: OutputFormat, checks: GateCheck[], informationUri?: string): string {
  switch (format) {
    case 'junit':
      return toJUnit(report) + '\n';
    case 'sarif': {
      const refs: Record<string, string> = {};
      for (const check of checks) refs[check.id] = check.ruleRef;
      return JSON.stringify(toSARIF(report, refs, informationUri), null, 2) + '\n';
    }
    case 'console':
      return renderConsole(report, c).join('\n') + '\n';
    case 'json':
      return JSON.stringify(report, null, 2) + '\n';
  }
}

async function runAll(options: CliOptions): Promise<number> {
  const config = loadConfig(options.root);
  const baseRef = options.positional[1] ?? 'HEAD';
  const checks = buildEnforcementChecks({
    ...checkContext(config, options, baseRef, 'tracked'),
    summaryPath: resolveRepoPath(config, config.summaryPath)
  });
  const harness = new GateHarness(checks);

  const run = await harness.run();
  const report = harness.toReport(run, { baseRef, generatedAt: new Date() });
  harness.writeReport(resolveRepoPath(config, config.reportPath), report);

  if (options.history) {
    const db = new GateHistoryDatabase(resolveRepoPath(config, config.databasePath));
    try {
      db.saveReport(report);
    } finally {
      db.close();
    }
  }

  for (const result of run.results) {
    emit(result.outcome);
  }

  const rendered = render(report, options.format, checks, config.informationUri);
  if (options.output) {
    mkdirSync(dirname(resolve(options.output)), { recursive: true });
    writeFileSync(options.output, rendered);
    console.log(c('dim', `Report saved to: ${options.output}`));
  } else if (options.format !== 'json') {
    process.stdout.write(rendered);
  }

  const failed = run.results.filter(result => !result.outcome.passed).length;
  return emit(run.passed
    ? passOutcome('VALIDATION-HARNESS', `all ${run.results.length} checks passed`)
    : failOutcome(new GovernanceError(
      'VALIDATION-HARNESS',
      run.exitCode,
      `${failed} of ${run.results.length} checks failed`
    )));
}

// ============ SUMMARY ============

function runSummary(options: CliOptions): number {
  const config = loadConfig(options.root);
  const store = new LedgerStore(new GitRevisionSource(config.rootDir), config);
  const summary = buildCycleSummary(store);
  const target = options.output ?? resolveRepoPath(config, config.summaryPath);
  writeCycleSummary(target, summary);
  return emit(passOutcome(
    SUMMARY_RULE,
    `cycle health summary written to ${target}; runs=${summary.runs.length}; unresolved_requests=${summary.unresolved_request_count}`
  ));
}

// ============ HISTORY ============

function runHistory(options: CliOptions): number {
  const config = loadConfig(options.root);
  const limitArg = options.positional[1];
  const limit = limitArg === undefined ? 10 : Number(limitArg);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConfigurationError(CLI_RULE, `history limit must be a positive integer, got '${limitArg}'`);
  }

  const db = new GateHistoryDatabase(resolveRepoPath(config, config.databasePath));
  try {
    const runs = db.getRuns(limit);
    if (options.format === 'json') {
      console.log(JSON.stringify({ runs, failure_counts: db.getFailureCounts() }, null, 2));
      return 0;
    }

    console.log('');
    console.log(c('bold', 'Recent gate runs'));
    if (runs.length === 0) {
      console.log(c('dim', '  no runs recorded'));
    }
    for (const run of runs) {
      const status = run.overall === 'pass' ? c('green', 'PASS') : c('red', 'FAIL');
      console.log(`  #${run.id}  ${status}  ${run.timestamp}  base=${run.base_ref ?? '-'}  ${run.passed} passed, ${run.failed} failed`);
    }

    const failures = db.getFailureCounts();
    if (failures.length > 0) {
      console.log('');
      console.log(c('bold', 'Most frequent failures'));
      for (const failure of failures) {
        console.log(`  ${c('yellow', failure.check_id.padEnd(24))} ${failure.failures}x  last ${failure.last_failed}`);
      }
    }
    console.log('');
    return 0;
  } finally {
    db.close();
  }
}

// ============ INIT ============

function runInit(options: CliOptions): number {
  const target = writeStarterConfig(options.root);
  console.log(c('green', `Created ${target}`));
  console.log(c('dim', 'Edit ledger paths and role sets, then run: pipeline-governor run-all'));
  return 0;
}

const SINGLE_CHECKS = [
  'pipeline-order',
  'append-only',
  'edit-authority',
  'secret-scan',
  'request-id-policy',
  'request-id-uniqueness',
  'run-state-sync',
  'stage-output',
  'pipeline-mode',
  'release-gates',
  'invariant-self-test'
];

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`${TOOL_NAME} v${TOOL_VERSION}`);
    return 0;
  }

  const options = parseArgs(args);
  const command = options.positional[0];

  if (!command || command === 'help' || args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  switch (command) {
    case 'run-all':
      return runAll(options);
    case 'summary':
      return runSummary(options);
    case 'history':
      return runHistory(options);
    case 'init':
      return runInit(options);
    case 'self-test':
      return runSingle('invariant-self-test', options);
    default:
      if (SINGLE_CHECKS.includes(command)) {
        return runSingle(command, options);
      }
      console.error(c('red', `Unknown command: ${command}`));
      console.log(`Run ${TOOL_NAME} --help for usage information.`);
      return 1;
  }
}

function showHelp() {
  console.log(`
${c('cyan', 'pipeline-governor')} - Process-integrity gates for multi-team pipelines
${c('dim', `Version ${TOOL_VERSION}`)}

${c('bold', 'USAGE:')}
  pipeline-governor <command> [arg] [options]

${c('bold', 'GATES:')}
  ${c('green', 'pipeline-order')}               Handoffs advance one phase at a time
  ${c('green', 'append-only')} [base]           Governed ledgers only grow
  ${c('green', 'edit-authority')} [base]        Executable assets edited by the authorised role
  ${c('green', 'secret-scan')} [tracked|staged] Credential patterns in content (default tracked)
  ${c('green', 'request-id-policy')} [base]     Appended change-request ids follow policy
  ${c('green', 'request-id-uniqueness')}        Duplicate request ids are superseded
  ${c('green', 'run-state-sync')} [base]        Handoffs carry matching run states
  ${c('green', 'stage-output')}                 Team output files carry the required sections
  ${c('green', 'pipeline-mode')} [base]         Runs declare a full or lite mode
  ${c('green', 'release-gates')}                Budget envelope and release gates
  ${c('green', 'self-test')}                    Invariant catalog rejects its fixtures

${c('bold', 'COMMANDS:')}
  ${c('green', 'run-all')} [base]               Run every gate, write the report and cycle summary
  ${c('green', 'summary')}                      Write the cycle health summary
  ${c('green', 'history')} [limit]              Show recent gate runs
  ${c('green', 'init')}                         Write governor.config.json

${c('bold', 'OPTIONS:')}
  --editor-role <role>   Role claimed by the editor (or EDITOR_ROLE)
  -f, --format           Report format: json (default), junit, sarif, console
  -o, --output           Save the rendered report to a file
  --root <path>          Repository root (default: current directory)
  --no-history           Do not record the run in the history database
  --git-sandbox          Run the secret-scan self-test in a temporary git repository

${c('bold', 'ENVIRONMENT:')}
  GOVERNOR_ROOT      Repository root
  GOVERNOR_REPORT    Report path
  GOVERNOR_DB        History database path
  EDITOR_ROLE        Editor role claim

${c('bold', 'EXIT CODES:')}
  0    Pass
  ${EXIT_CODES.configuration}    Configuration error
  ${EXIT_CODES.unknownTeam}   Unknown team
  ${EXIT_CODES.ordering}   Phase order violation
  ${EXIT_CODES.integrity}   Append-only violation
  ${EXIT_CODES.authority}   Edit authority violation
  ${EXIT_CODES.harness}   Harness aggregate failure
  ${EXIT_CODES.secret}   Secret exposure
  ${EXIT_CODES.requestIdPolicy}   Request-id policy
  ${EXIT_CODES.requestIdUniqueness}   Request-id uniqueness
  ${EXIT_CODES.runStateSync}   Run-state sync
  ${EXIT_CODES.releaseGates}   Release gates
  ${EXIT_CODES.invariant}   Invariant self-test
  ${EXIT_CODES.pipelineMode}   Pipeline mode
  ${EXIT_CODES.stageOutput}   Stage output format
`);
}

main()
  .then(code => process.exit(code))
  .catch((err: unknown) => {
    if (err instanceof GovernanceError) {
      process.exit(emit(failOutcome(err)));
    }
    console.error(c('red', 'Error:'), err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
