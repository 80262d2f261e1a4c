// Configuration System - Load and validate governor configuration
// Supports: JSON config files and environment variables

import { readFileSync, existsSync, writeFileSync } from 'fs';
import { join, resolve, isAbsolute } from 'path';
import { SchemaValidator, SchemaValidationError } from '../gate/validator.js';
import { ConfigurationError } from '../errors.js';

export interface LedgerPaths {
  teamRegistry: string;
  handoffLog: string;
  decisionLog: string;
  changeRequestQueue: string;
  runRegistry: string;
  runModeRegistry: string;
  budgetEnvelopes: string;
  releaseGateLog: string;
  gateExceptions: string;
}

export interface GovernorConfig {
  version: string;
  name?: string;

  // Repository root every ledger path is relative to
  rootDir: string;
  reportPath: string;
  summaryPath: string;
  databasePath: string;
  doctrineRef: string;
  // Project home written into SARIF output
  informationUri?: string;

  // Claimed per invocation (EDITOR_ROLE); never taken from a config file
  editorRole?: string;

  ledgers: LedgerPaths;

  phaseOrder: {
    blockDecisionMarker: string;
  };

  appendOnly: {
    scopes: string[];
    // Natural key columns per ledger file name
    rowKeys: Record<string, string[]>;
  };

  editAuthority: {
    authorizedRole: string;
    governedPaths: string[];
    executableExtensions: string[];
    executablePaths: string[];
    exemptPaths: string[];
    provenancePattern: string;
  };

  secrets: {
    allowPatterns: string[];
    maxFileBytes: number;
  };

  requestIds: {
    teamCodes: string[];
  };

  stageOutput: {
    // Team registry column naming each team's stage output file
    outputColumn: string;
    requiredSections: string[];
  };

  releaseGates: {
    mandatoryGates: string[];
    exceptionApproverRoles: string[];
    budgetFields: string[];
  };

  invariants: {
    escalationSlaHours: number;
    containmentSlaMinutes: number;
    decisionOwnerRoles: string[];
    signoffRoles: string[];
    safeModeRestrictedActions: string[];
    lineageDimensions: string[];
  };
}

export type GovernorConfigOverrides = {
  [K in keyof GovernorConfig]?: GovernorConfig[K] extends string[] | string | number | undefined
    ? GovernorConfig[K]
    : Partial<GovernorConfig[K]>;
};

export const CONFIG_FILES = ['governor.config.json', '.governorrc.json'];

export const DEFAULT_CONFIG: GovernorConfig = {
  version: '1.0',
  rootDir: '.',
  reportPath: 'teams/_validation/validation_report.json',
  summaryPath: 'teams/_validation/cycle_health_summary.json',
  databasePath: '.pipeline-governor/history.db',
  doctrineRef: 'teams/shared/OPERATING_DOCTRINE.md',
  ledgers: {
    teamRegistry: 'data/team_ops/team_registry.csv',
    handoffLog: 'data/team_ops/handoff_log.csv',
    decisionLog: 'data/team_ops/decision_log.csv',
    changeRequestQueue: 'data/team_ops/change_request_queue.csv',
    runRegistry: 'data/team_ops/run_registry.csv',
    runModeRegistry: 'teams/shared/run_mode_registry.csv',
    budgetEnvelopes: 'data/team_ops/budget_envelopes.csv',
    releaseGateLog: 'planning/reports/RELEASE_GATE_LOG.csv',
    gateExceptions: 'planning/reports/gate_exceptions.csv'
  },
  phaseOrder: {
    blockDecisionMarker: 'hard_fail_pipeline_order_violation'
  },
  appendOnly: {
    scopes: ['pipeline/*.md', 'data/team_ops/*.csv'],
    rowKeys: {
      'handoff_log.csv': ['run_id', 'timestamp_utc'],
      'decision_log.csv': ['decision_id'],
      'change_request_queue.csv': ['request_id', 'run_id'],
      'run_registry.csv': ['run_id', 'created_utc']
    }
  },
  editAuthority: {
    authorizedRole: 'qa_fixer',
    governedPaths: [
      'teams/**',
      'pipeline/**',
      'data/team_ops/**',
      'scripts/**',
      'planning/**',
      '.github/workflows/**',
      '.githooks/**',
      'src/**',
      'src-tauri/**'
    ],
    executableExtensions: ['.rs', '.py', '.sh', '.ts', '.js', '.mjs', '.yml', '.yaml', '.json', '.toml', '.sql', '.hook'],
    executablePaths: ['.githooks/**'],
    exemptPaths: [
      'teams/_validation/validation_report.json',
      'teams/_validation/cycle_health_summary.json'
    ],
    provenancePattern: 'decision_id|change_request_id'
  },
  secrets: {
    allowPatterns: [
      'YOUR_[A-Z0-9_]+',
      'EXAMPLE',
      'PLACEHOLDER',
      'DUMMY',
      'CHANGEME',
      'REPLACE_ME',
      'NOT_A_REAL_KEY',
      '<token>',
      '<secret>'
    ],
    maxFileBytes: 2 * 1024 * 1024
  },
  requestIds: {
    teamCodes: ['BLUE', 'RED', 'GREEN', 'BLACK', 'WHITE', 'GREY']
  },
  stageOutput: {
    outputColumn: 'output_file',
    requiredSections: [
      '1. Summary (<= 300 words).',
      '2. Numbered findings.',
      '3. Open questions (if any).',
      '4. Explicit non-goals.'
    ]
  },
  releaseGates: {
    mandatoryGates: ['security_gate', 'budget_gate', 'evidence_gate', 'role_gate', 'change_gate'],
    exceptionApproverRoles: ['release_manager', 'security_steward'],
    budgetFields: [
      'run_id', 'workflow_id', 'subsystem', 'per_run_cap_usd',
      'daily_cap_usd', 'monthly_cap_usd', 'fallback_mode', 'owner_role'
    ]
  },
  invariants: {
    escalationSlaHours: 24,
    containmentSlaMinutes: 60,
    decisionOwnerRoles: [
      'team_lead', 'product_steward', 'security_steward', 'platform_architect', 'tool_engineer', 'qa_validation'
    ],
    signoffRoles: ['technical_owner', 'business_owner'],
    safeModeRestrictedActions: ['external_publish', 'approve_budget_exception', 'approve_security_exception'],
    lineageDimensions: ['inputs', 'spec', 'run_metadata', 'decision']
  }
};

function cloneDefaults(): GovernorConfig {
  return structuredClone(DEFAULT_CONFIG);
}

export class ConfigLoader {
  private config: GovernorConfig;
  private validator: SchemaValidator = new SchemaValidator();

  constructor() {
    this.config = cloneDefaults();
  }

  // Load from file
  loadFromFile(filePath: string): GovernorConfig {
    if (!existsSync(filePath)) {
      console.warn(`[CONFIG] File not found: ${filePath}, using defaults`);
      return this.config;
    }

    const ext = filePath.split('.').pop()?.toLowerCase();
    if (ext !== 'json') {
      throw new ConfigurationError('CONFIG', `Unsupported config format: ${ext ?? filePath}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError('CONFIG', `invalid JSON in ${filePath}: ${reason}`);
    }

    assertOverrides(parsed, filePath);
    this.config = this.mergeConfig(this.config, parsed);
    return this.config;
  }

  // Load from environment variables
  loadFromEnv(env: NodeJS.ProcessEnv = process.env): GovernorConfig {
    if (env.GOVERNOR_ROOT) {
      this.config.rootDir = env.GOVERNOR_ROOT;
    }
    if (env.GOVERNOR_REPORT) {
      this.config.reportPath = env.GOVERNOR_REPORT;
    }
    if (env.GOVERNOR_DB) {
      this.config.databasePath = env.GOVERNOR_DB;
    }
    if (env.EDITOR_ROLE !== undefined) {
      this.config.editorRole = env.EDITOR_ROLE.trim();
    }

    return this.config;
  }

  // Auto-detect and load config
  autoLoad(basePath: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): GovernorConfig {
    this.config.rootDir = basePath;

    for (const file of CONFIG_FILES) {
      const fullPath = join(basePath, file);
      if (existsSync(fullPath)) {
        console.log(`[CONFIG] Loading from ${file}`);
        this.loadFromFile(fullPath);
        if (!isAbsolute(this.config.rootDir)) {
          this.config.rootDir = resolve(basePath, this.config.rootDir);
        }
        break;
      }
    }

    // Override with env vars
    this.loadFromEnv(env);

    return this.config;
  }

  getConfig(): GovernorConfig {
    return this.config;
  }

  // Schema check plus semantic checks; throws ConfigurationError listing every problem
  assertValid(): GovernorConfig {
    try {
      this.validator.assertValidConfig(this.config);
    } catch (err) {
      if (err instanceof SchemaValidationError) {
        throw new ConfigurationError('CONFIG', err.message, err.describe());
      }
      throw err;
    }

    const errors = this.validate();
    if (errors.length > 0) {
      throw new ConfigurationError('CONFIG', 'Configuration validation failed', errors);
    }
    return this.config;
  }

  // Validate configuration
  validate(): string[] {
    const errors: string[] = [];

    if (!this.config.editAuthority.authorizedRole.trim()) {
      errors.push('editAuthority.authorizedRole is required');
    }
    if (!compiles(this.config.editAuthority.provenancePattern)) {
      errors.push(`editAuthority.provenancePattern is not a valid regular expression: ${this.config.editAuthority.provenancePattern}`);
    }
    for (const pattern of this.config.secrets.allowPatterns) {
      if (!compiles(pattern)) {
        errors.push(`secrets.allowPatterns entry is not a valid regular expression: ${pattern}`);
      }
    }
    if (this.config.requestIds.teamCodes.length === 0) {
      errors.push('At least one request-id team code must be configured');
    }
    if (new Set(this.config.invariants.signoffRoles).size < 2) {
      errors.push('invariants.signoffRoles must name two distinct roles');
    }

    return errors;
  }

  private mergeConfig(base: GovernorConfig, override: GovernorConfigOverrides): GovernorConfig {
    return {
      version: override.version || base.version,
      name: override.name || base.name,
      rootDir: override.rootDir || base.rootDir,
      reportPath: override.reportPath || base.reportPath,
      summaryPath: override.summaryPath || base.summaryPath,
      databasePath: override.databasePath || base.databasePath,
      doctrineRef: override.doctrineRef || base.doctrineRef,
      informationUri: override.informationUri || base.informationUri,
      editorRole: base.editorRole,
      ledgers: { ...base.ledgers, ...override.ledgers },
      phaseOrder: { ...base.phaseOrder, ...override.phaseOrder },
      appendOnly: {
        scopes: override.appendOnly?.scopes || base.appendOnly.scopes,
        rowKeys: { ...base.appendOnly.rowKeys, ...override.appendOnly?.rowKeys }
      },
      editAuthority: { ...base.editAuthority, ...override.editAuthority },
      secrets: { ...base.secrets, ...override.secrets },
      requestIds: { ...base.requestIds, ...override.requestIds },
      stageOutput: { ...base.stageOutput, ...override.stageOutput },
      releaseGates: { ...base.releaseGates, ...override.releaseGates },
      invariants: { ...base.invariants, ...override.invariants }
    };
  }
}

const SECTION_KEYS = [
  'ledgers', 'phaseOrder', 'appendOnly', 'editAuthority', 'secrets', 'requestIds', 'stageOutput', 'releaseGates',
  'invariants'
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Shape check before merging; value types are checked by the schema afterwards
function assertOverrides(value: unknown, filePath: string): asserts value is GovernorConfigOverrides {
  if (!isRecord(value)) {
    throw new ConfigurationError('CONFIG', `config file ${filePath} must contain a JSON object`);
  }
  const misshapen = SECTION_KEYS.filter(key => key in value && !isRecord(value[key]));
  if (misshapen.length > 0) {
    throw new ConfigurationError('CONFIG', `config file ${filePath} has non-object sections`, misshapen);
  }
  const appendOnly = value.appendOnly;
  if (isRecord(appendOnly) && 'rowKeys' in appendOnly && !isRecord(appendOnly.rowKeys)) {
    throw new ConfigurationError('CONFIG', `config file ${filePath} has non-object sections`, ['appendOnly.rowKeys']);
  }
}

function compiles(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

// Load, validate and return the configuration for a repository root
export function loadConfig(basePath: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): GovernorConfig {
  const loader = new ConfigLoader();
  loader.autoLoad(basePath, env);
  return loader.assertValid();
}

export function resolveRepoPath(config: GovernorConfig, relPath: string): string {
  return isAbsolute(relPath) ? relPath : join(config.rootDir, relPath);
}

// Starter config file for `init`
export function writeStarterConfig(basePath: string): string {
  const target = join(basePath, CONFIG_FILES[0]);
  if (existsSync(target)) {
    throw new ConfigurationError('CONFIG', `${CONFIG_FILES[0]} already exists`);
  }
  const { rootDir: _rootDir, editorRole: _editorRole, ...starter } = cloneDefaults();
  writeFileSync(target, JSON.stringify({ ...starter, name: 'my-pipeline' }, null, 2) + '\n');
  return target;
}

