// pipeline-governor - library entry point

export * from './types/governance.js';
export * from './errors.js';
export {
  ConfigLoader,
  DEFAULT_CONFIG,
  CONFIG_FILES,
  loadConfig,
  resolveRepoPath,
  writeStarterConfig,
  type GovernorConfig,
  type GovernorConfigOverrides,
  type LedgerPaths
} from './config/index.js';
export { SchemaValidator, SchemaValidationError } from './gate/validator.js';
export * from './gate/outcome.js';
export * from './gate/status.js';
export { parseCsv, field, addedRows, toCsv, type ParsedTable } from './ledger/csv.js';
export { LedgerStore, type TypedRow } from './ledger/store.js';
export { PhaseRegistry } from './ledger/registry.js';
export * from './revision/index.js';
export { globToRegExp, matchesAny } from './revision/glob.js';
export * from './validators/pipeline-order.js';
export * from './validators/append-only.js';
export * from './validators/edit-authority.js';
export * from './validators/secret-scan.js';
export * from './validators/request-ids.js';
export * from './validators/run-state-sync.js';
export * from './validators/pipeline-mode.js';
export * from './validators/release-gates.js';
export * from './validators/stage-output.js';
export * from './harness/policies.js';
export * from './harness/catalog.js';
export * from './harness/checks.js';
export * from './harness/runner.js';
export * from './summary.js';
export * from './output/index.js';
export { GateHistoryDatabase, IN_MEMORY, type GateRunRecord, type FailureCount } from './database/index.js';
