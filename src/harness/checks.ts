// Enforcement checks - each validator wrapped as a harness check over repository state

import type { GovernorConfig } from '../config/index.js';
import type { RevisionSource } from '../revision/index.js';
import { LedgerStore } from '../ledger/store.js';
import { PhaseOrderValidator, PHASE_ORDER_RULE } from '../validators/pipeline-order.js';
import { AppendOnlyChecker, APPEND_ONLY_RULE } from '../validators/append-only.js';
import { EditAuthorityEnforcer, EDIT_AUTHORITY_RULE } from '../validators/edit-authority.js';
import { SecretScanner, SECRET_SCAN_RULE } from '../validators/secret-scan.js';
import {
  RequestIdPolicyValidator,
  RequestIdUniquenessValidator,
  REQUEST_ID_POLICY_RULE,
  REQUEST_ID_UNIQUE_RULE
} from '../validators/request-ids.js';
import { RunStateSyncValidator, RUN_STATE_SYNC_RULE } from '../validators/run-state-sync.js';
import { PipelineModeValidator, PIPELINE_MODE_RULE } from '../validators/pipeline-mode.js';
import { ReleaseGateValidator, RELEASE_GATES_RULE } from '../validators/release-gates.js';
import { StageOutputValidator, STAGE_OUTPUT_RULE } from '../validators/stage-output.js';
import { buildCycleSummary, writeCycleSummary, SUMMARY_RULE } from '../summary.js';
import { createCatalog, type CatalogOptions, type Invariant } from './catalog.js';
import { InvariantFailure } from '../errors.js';
import { passOutcome, type GateOutcome } from '../gate/outcome.js';
import type { SecretScope } from '../types/governance.js';

export const SELF_TEST_RULE = 'INVARIANT-SELF-TEST';

export interface GateCheck {
  id: string;
  name: string;
  ruleRef: string;
  run(): GateOutcome | Promise<GateOutcome>;
}

export interface CheckContext {
  config: GovernorConfig;
  source: RevisionSource;
  baseRef: string;
  editorRole?: string;
  secretScope?: SecretScope;
  now?: () => Date;
  catalog?: CatalogOptions;
  // Where the cycle-summary check writes its JSON; built but not written when unset
  summaryPath?: string;
}

// Runs every catalog self-test; fails listing each invariant that misbehaved
export function runSelfTests(catalog: Invariant[]): GateOutcome {
  const results = catalog.map(invariant => invariant.selfTest());
  const failed = results.filter(result => !result.passed);
  if (failed.length > 0) {
    throw new InvariantFailure(
      SELF_TEST_RULE,
      `invariant self-test failed for ${failed.length} of ${results.length} invariant(s)`,
      failed.flatMap(result => result.problems.map(problem => `${result.id}: ${problem}`))
    );
  }
  return passOutcome(
    SELF_TEST_RULE,
    `all ${results.length} invariants rejected their negative fixtures and accepted their positive fixtures`,
    results.map(result => `${result.id}: ${result.diagnostics.length} rejection(s) observed`)
  );
}

export function buildEnforcementChecks(ctx: CheckContext): GateCheck[] {
  const { config, source, baseRef } = ctx;
  const store = new LedgerStore(source, config);
  const doctrine = config.doctrineRef;

  return [
    {
      id: PHASE_ORDER_RULE,
      name: 'pipeline-order',
      ruleRef: doctrine,
      run: () => new PhaseOrderValidator(config).check(store)
    },
    {
      id: APPEND_ONLY_RULE,
      name: 'append-only',
      ruleRef: doctrine,
      run: () => new AppendOnlyChecker(config, source).check(baseRef)
    },
    {
      id: EDIT_AUTHORITY_RULE,
      name: 'edit-authority',
      ruleRef: doctrine,
      run: () => new EditAuthorityEnforcer(config, source).check(baseRef, ctx.editorRole ?? config.editorRole)
    },
    {
      id: SECRET_SCAN_RULE,
      name: 'secret-scan',
      ruleRef: doctrine,
      run: () => new SecretScanner(config, source).check(ctx.secretScope ?? 'tracked')
    },
    {
      id: REQUEST_ID_POLICY_RULE,
      name: 'request-id-policy',
      ruleRef: config.ledgers.changeRequestQueue,
      run: () => new RequestIdPolicyValidator(config, store).check(baseRef)
    },
    {
      id: REQUEST_ID_UNIQUE_RULE,
      name: 'request-id-uniqueness',
      ruleRef: config.ledgers.changeRequestQueue,
      run: () => new RequestIdUniquenessValidator(config, store).check()
    },
    {
      id: RUN_STATE_SYNC_RULE,
      name: 'run-state-sync',
      ruleRef: config.ledgers.runRegistry,
      run: () => new RunStateSyncValidator(config, store).check(baseRef)
    },
    {
      id: STAGE_OUTPUT_RULE,
      name: 'stage-output',
      ruleRef: config.ledgers.teamRegistry,
      run: () => new StageOutputValidator(config, store).check()
    },
    {
      id: SUMMARY_RULE,
      name: 'cycle-summary',
      ruleRef: config.summaryPath,
      run: () => {
        const summary = buildCycleSummary(store, ctx.now?.());
        if (ctx.summaryPath) {
          writeCycleSummary(ctx.summaryPath, summary);
        }
        return passOutcome(
          SUMMARY_RULE,
          `cycle health summary ${ctx.summaryPath ? `written to ${ctx.summaryPath}` : 'built'}; ` +
          `runs=${summary.runs.length}; unresolved_requests=${summary.unresolved_request_count}`
        );
      }
    },
    {
      id: PIPELINE_MODE_RULE,
      name: 'pipeline-mode',
      ruleRef: config.ledgers.runModeRegistry,
      run: () => new PipelineModeValidator(config, store).check(baseRef)
    },
    {
      id: RELEASE_GATES_RULE,
      name: 'release-gates',
      ruleRef: config.ledgers.releaseGateLog,
      run: () => new ReleaseGateValidator(config, store, ctx.now).check()
    },
    {
      id: SELF_TEST_RULE,
      name: 'invariant-self-test',
      ruleRef: doctrine,
      run: () => runSelfTests(createCatalog(config, ctx.catalog))
    }
  ];
}
