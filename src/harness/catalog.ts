// Invariant Catalog - each invariant proves its test rejects known-bad and accepts known-good fixtures

import type { GovernorConfig } from '../config/index.js';
import type {
  BudgetEnvelope,
  DecisionRecord,
  GateColor,
  HandoffRecord,
  InvariantVerdict,
  SecretScope
} from '../types/governance.js';
import { PhaseRegistry } from '../ledger/registry.js';
import { PhaseOrderValidator } from '../validators/pipeline-order.js';
import { AppendOnlyChecker } from '../validators/append-only.js';
import { EditAuthorityEnforcer } from '../validators/edit-authority.js';
import { SecretScanner } from '../validators/secret-scan.js';
import { envelopeProblems } from '../validators/release-gates.js';
import { MemoryRevisionSource, MemorySandbox, type FileTree, type Sandbox } from '../revision/index.js';
import { canPublish } from '../gate/status.js';
import {
  lineageComplete,
  singleAuthorizedOwner,
  escalationWithinSla,
  untrustedPromotion,
  twoRoleSignoff,
  budgetCapRespected,
  adrPresent,
  safeModeAllows,
  containmentWithinSla,
  type DecisionAuthority,
  type RoleConflict,
  type PromotionRequest,
  type SpendState,
  type ArchitectureChange
} from './policies.js';

export interface InvariantDefinition<F> {
  id: string;
  statement: string;
  ownerRole: string;
  test: (fixture: F) => InvariantVerdict;
  // Fixtures the test must reject
  negative: F[];
  // Fixtures the test must accept
  positive: F[];
}

export interface InvariantSelfTest {
  id: string;
  passed: boolean;
  // Expected rejections, then any problems
  diagnostics: string[];
  problems: string[];
}

export interface Invariant {
  id: string;
  statement: string;
  ownerRole: string;
  selfTest(): InvariantSelfTest;
}

function safely<F>(test: (fixture: F) => InvariantVerdict, fixture: F): InvariantVerdict {
  try {
    return test(fixture);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { passed: false, diagnostic: `threw: ${message}` };
  }
}

export function defineInvariant<F>(def: InvariantDefinition<F>): Invariant {
  return {
    id: def.id,
    statement: def.statement,
    ownerRole: def.ownerRole,
    selfTest(): InvariantSelfTest {
      const diagnostics: string[] = [];
      const problems: string[] = [];

      def.negative.forEach((fixture, idx) => {
        const verdict = safely(def.test, fixture);
        if (verdict.passed) {
          problems.push(`negative fixture #${idx + 1} unexpectedly passed`);
        } else {
          diagnostics.push(verdict.diagnostic);
        }
      });
      def.positive.forEach((fixture, idx) => {
        const verdict = safely(def.test, fixture);
        if (!verdict.passed) {
          problems.push(`positive fixture #${idx + 1} failed: ${verdict.diagnostic}`);
        }
      });

      return { id: def.id, passed: problems.length === 0, diagnostics, problems };
    }
  };
}

export interface CatalogOptions {
  createSandbox?: () => Sandbox;
}

const FIXTURE_PHASES = ['blue', 'red', 'green', 'black', 'white', 'grey'].map((team_id, idx) => ({
  team_id,
  phase_order: idx + 1
}));

function handoff(from_team: string, to_team: string, minute: number): HandoffRecord {
  return { run_id: 'RUN-FIXTURE', from_team, to_team, timestamp_utc: `2026-01-01T00:${String(minute).padStart(2, '0')}:00Z` };
}

interface OrderFixture {
  handoffs: HandoffRecord[];
  decisions: DecisionRecord[];
}

interface LedgerChangeFixture {
  before: string;
  after: string;
}

interface EditFixture {
  changes: FileTree;
  editorRole?: string;
}

interface SecretFixture {
  scope: SecretScope;
  prepare: (sandbox: Sandbox) => void;
}

const HANDOFF_HEADER = 'entry_id,run_id,from_team,to_team,timestamp_utc,supersedes_entry_id';
const HANDOFF_ROWS = [
  'H-1,RUN-FIXTURE,blue,red,2026-01-01T00:01:00Z,',
  'H-2,RUN-FIXTURE,red,green,2026-01-01T00:02:00Z,'
];

// Credential-shaped line assembled at run time
const LEAKED_LINE = 'api_key = "' + 'test_secret_'.repeat(2) + '"\n';

export function createCatalog(config: GovernorConfig, options: CatalogOptions = {}): Invariant[] {
  const createSandbox = options.createSandbox ?? (() => new MemorySandbox());
  const limits = config.invariants;
  const marker = config.phaseOrder.blockDecisionMarker;
  const handoffPath = config.ledgers.handoffLog;
  const authorizedRole = config.editAuthority.authorizedRole;

  const order = defineInvariant<OrderFixture>({
    id: 'INV-GLOBAL-ORD-001',
    statement: 'Handoffs advance the canonical team order one phase at a time unless the run logged a block decision',
    ownerRole: 'qa_validation',
    test: fixture => {
      const validator = new PhaseOrderValidator(config);
      const result = validator.evaluate(fixture.handoffs, new PhaseRegistry(FIXTURE_PHASES), fixture.decisions);
      return result.failure ? { passed: false, diagnostic: result.failure.message } : { passed: true, diagnostic: 'ordered' };
    },
    negative: [
      { handoffs: [handoff('blue', 'red', 1), handoff('red', 'green', 2), handoff('white', 'grey', 3)], decisions: [] }
    ],
    positive: [
      { handoffs: [handoff('blue', 'red', 1), handoff('red', 'green', 2), handoff('green', 'black', 3)], decisions: [] },
      {
        handoffs: [handoff('blue', 'red', 1), handoff('red', 'green', 2), handoff('white', 'grey', 3)],
        decisions: [{ run_id: 'RUN-FIXTURE', decision_text: `${marker}: held for review`, timestamp_utc: '2026-01-01T00:04:00Z' }]
      }
    ]
  });

  const appendOnly = defineInvariant<LedgerChangeFixture>({
    id: 'INV-GLOBAL-AUD-001',
    statement: 'Governed ledgers only grow; corrections are appended rows that supersede earlier ones',
    ownerRole: 'qa_validation',
    test: fixture => {
      const findings = new AppendOnlyChecker(config).compareFile(handoffPath, fixture.before, fixture.after);
      return findings.length > 0
        ? { passed: false, diagnostic: findings.map(f => f.detail).join('; ') }
        : { passed: true, diagnostic: 'append-only' };
    },
    negative: [
      {
        before: [HANDOFF_HEADER, ...HANDOFF_ROWS].join('\n'),
        after: [HANDOFF_HEADER, HANDOFF_ROWS[0]].join('\n')
      },
      {
        before: [HANDOFF_HEADER, ...HANDOFF_ROWS].join('\n'),
        after: [HANDOFF_HEADER, HANDOFF_ROWS[0], 'H-2,RUN-FIXTURE,red,black,2026-01-01T00:02:00Z,'].join('\n')
      }
    ],
    positive: [
      {
        before: [HANDOFF_HEADER, ...HANDOFF_ROWS].join('\n'),
        after: [HANDOFF_HEADER, ...HANDOFF_ROWS, 'H-3,RUN-FIXTURE,green,black,2026-01-01T00:03:00Z,'].join('\n')
      },
      {
        before: [HANDOFF_HEADER, ...HANDOFF_ROWS].join('\n'),
        after: [HANDOFF_HEADER, HANDOFF_ROWS[0], 'H-4,RUN-FIXTURE,red,green,2026-01-01T00:02:30Z,H-2'].join('\n')
      }
    ]
  });

  const completeLineage: Record<string, string> = {};
  for (const dim of limits.lineageDimensions) {
    completeLineage[dim] = 'ok';
  }

  const lineage = defineInvariant<Record<string, string>>({
    id: 'INV-GLOBAL-AUD-002',
    statement: 'Every published artifact records complete lineage',
    ownerRole: 'qa_validation',
    test: fixture => lineageComplete(fixture, limits.lineageDimensions),
    negative: [{ ...completeLineage, [limits.lineageDimensions[limits.lineageDimensions.length - 1]]: '' }],
    positive: [completeLineage]
  });

  const decisionOwner = defineInvariant<DecisionAuthority>({
    id: 'INV-GLOBAL-ROL-001',
    statement: 'Each decision has exactly one authorized owner role',
    ownerRole: 'team_lead',
    test: fixture => singleAuthorizedOwner(fixture, limits.decisionOwnerRoles),
    negative: [
      { decision_id: 'DEC-FIXTURE-1', authority_owners: limits.decisionOwnerRoles.slice(0, 2) },
      { decision_id: 'DEC-FIXTURE-2', authority_owners: ['unlisted_role'] }
    ],
    positive: [{ decision_id: 'DEC-FIXTURE-3', authority_owners: [limits.decisionOwnerRoles[0]] }]
  });

  const escalation = defineInvariant<RoleConflict>({
    id: 'INV-GLOBAL-ROL-002',
    statement: 'Role conflicts unresolved past the escalation SLA block progress',
    ownerRole: 'team_lead',
    test: fixture => escalationWithinSla(fixture, limits.escalationSlaHours),
    negative: [{ hours_open: limits.escalationSlaHours + 1, resolved: false, escalation_ref: 'ROLE_ESCALATION_PROTOCOL' }],
    positive: [{ hours_open: Math.max(0, limits.escalationSlaHours - 1), resolved: true }]
  });

  const editAuthority = defineInvariant<EditFixture>({
    id: 'INV-GLOBAL-AUT-001',
    statement: 'Only the authorized editor role may change executable assets, and each change cites provenance',
    ownerRole: 'qa_validation',
    test: fixture => {
      const source = new MemoryRevisionSource({ head: {}, working: fixture.changes });
      const result = new EditAuthorityEnforcer(config, source).evaluate('HEAD', fixture.editorRole);
      return result.violation
        ? { passed: false, diagnostic: result.violation.message }
        : { passed: true, diagnostic: 'authorized' };
    },
    negative: [
      { changes: { 'scripts/deploy.sh': 'echo deploy # decision_id=DEC-1\n' }, editorRole: 'content_writer' },
      { changes: { 'scripts/deploy.sh': 'echo deploy\n' }, editorRole: authorizedRole },
      { changes: { 'scripts/deploy.sh': 'echo deploy # decision_id=DEC-1\n' } }
    ],
    positive: [
      { changes: { 'scripts/deploy.sh': 'echo deploy # decision_id=DEC-1\n' }, editorRole: authorizedRole },
      { changes: { 'docs/notes.md': 'free text\n' }, editorRole: 'content_writer' }
    ]
  });

  const secretScan = defineInvariant<SecretFixture>({
    id: 'INV-GLOBAL-SEC-001',
    statement: 'Staged and tracked content never carries credentials',
    ownerRole: 'security_steward',
    test: fixture => {
      const sandbox = createSandbox();
      try {
        sandbox.write('README.md', 'seed\n');
        sandbox.stage('README.md');
        sandbox.commit('seed');
        fixture.prepare(sandbox);
        const result = new SecretScanner(config, sandbox.source).scan(fixture.scope);
        return result.findings.length > 0
          ? { passed: false, diagnostic: `${fixture.scope}: ${result.findings.map(f => `${f.file}:${f.line} ${f.matched_pattern}`).join(', ')}` }
          : { passed: true, diagnostic: `${fixture.scope}: clean` };
      } finally {
        sandbox.destroy();
      }
    },
    negative: [
      {
        scope: 'staged',
        prepare: sandbox => {
          sandbox.write('config/app.env', LEAKED_LINE);
          sandbox.stage('config/app.env');
        }
      },
      {
        scope: 'tracked',
        prepare: sandbox => {
          sandbox.write('config/app.env', LEAKED_LINE);
          sandbox.stage('config/app.env');
          sandbox.commit('tracked leak');
        }
      }
    ],
    positive: [
      {
        scope: 'staged',
        prepare: sandbox => {
          sandbox.write('config/app.env', 'api_key = "YOUR_API_KEY_HERE_PLEASE_SET"\n');
          sandbox.stage('config/app.env');
        }
      },
      {
        scope: 'staged',
        prepare: sandbox => {
          sandbox.write('config/app.env', LEAKED_LINE);
          sandbox.stage('config/app.env');
          sandbox.unstage('config/app.env');
        }
      },
      {
        scope: 'tracked',
        prepare: sandbox => {
          sandbox.write('config/app.env', LEAKED_LINE);
          sandbox.stage('config/app.env');
          sandbox.commit('tracked leak');
          sandbox.remove('config/app.env');
          sandbox.stage('config/app.env');
          sandbox.commit('remove leak');
        }
      }
    ]
  });

  const promotion = defineInvariant<PromotionRequest>({
    id: 'INV-GLOBAL-SEC-002',
    statement: 'Untrusted content is promoted only when evidence-bound or caveated, never by bypass',
    ownerRole: 'security_steward',
    test: untrustedPromotion,
    negative: [
      { untrusted_source: true, evidence_bound: false, caveated: false, bypass: false },
      { untrusted_source: true, evidence_bound: false, caveated: false, bypass: true }
    ],
    positive: [
      { untrusted_source: true, evidence_bound: true, caveated: false, bypass: false },
      { untrusted_source: true, evidence_bound: false, caveated: true, bypass: false }
    ]
  });

  const gateSet = (colorAt: (idx: number) => GateColor): Record<string, GateColor> => {
    const gates: Record<string, GateColor> = {};
    config.releaseGates.mandatoryGates.forEach((gate, idx) => {
      gates[gate] = colorAt(idx);
    });
    return gates;
  };

  const redGate = defineInvariant<Record<string, GateColor>>({
    id: 'INV-GLOBAL-GOV-001',
    statement: 'A red mandatory release gate blocks publish',
    ownerRole: 'release_manager',
    test: gates => {
      const decision = canPublish('REL-FIXTURE', gates, [], new Date('2026-01-01T00:00:00Z'), config.releaseGates.exceptionApproverRoles);
      return decision.allowed
        ? { passed: true, diagnostic: 'ALLOWED all_gates_non_red' }
        : { passed: false, diagnostic: `BLOCKED gate=${decision.blocking[0]}` };
    },
    negative: [gateSet(idx => (idx === 0 ? 'red' : 'green'))],
    positive: [gateSet(() => 'green'), gateSet(() => 'yellow')]
  });

  const signoff = defineInvariant<string[]>({
    id: 'INV-GLOBAL-GOV-002',
    statement: 'Release sign-off requires both required roles',
    ownerRole: 'release_manager',
    test: signoffs => twoRoleSignoff(signoffs, limits.signoffRoles),
    negative: [[limits.signoffRoles[0]], []],
    positive: [[...limits.signoffRoles]]
  });

  const completeEnvelope: BudgetEnvelope = {
    run_id: 'RUN-FIXTURE',
    fields: {
      run_id: 'RUN-FIXTURE',
      workflow_id: 'WF-1',
      subsystem: 'campaign',
      per_run_cap_usd: '25',
      daily_cap_usd: '100',
      monthly_cap_usd: '1000',
      fallback_mode: 'pause',
      owner_role: 'team_lead'
    }
  };

  const envelope = defineInvariant<BudgetEnvelope>({
    id: 'INV-GLOBAL-BUD-001',
    statement: 'Every run has a complete budget envelope with positive caps',
    ownerRole: 'team_lead',
    test: env => {
      const problems = envelopeProblems(env, config.releaseGates.budgetFields);
      return problems.length > 0 ? { passed: false, diagnostic: problems.join('; ') } : { passed: true, diagnostic: 'complete' };
    },
    negative: [
      { ...completeEnvelope, fields: { ...completeEnvelope.fields, fallback_mode: '' } },
      { ...completeEnvelope, fields: { ...completeEnvelope.fields, daily_cap_usd: '0' } }
    ],
    positive: [completeEnvelope]
  });

  const now = '2026-01-01T12:00:00Z';
  const budgetCap = defineInvariant<SpendState>({
    id: 'INV-GLOBAL-BUD-002',
    statement: 'Spend over cap blocks the run unless an unexpired exception exists',
    ownerRole: 'team_lead',
    test: budgetCapRespected,
    negative: [
      { spend_usd: 120, cap_usd: 100, now_utc: now },
      { spend_usd: 120, cap_usd: 100, exception_expires_utc: '2026-01-01T10:00:00Z', now_utc: now }
    ],
    positive: [
      { spend_usd: 80, cap_usd: 100, now_utc: now },
      { spend_usd: 120, cap_usd: 100, exception_expires_utc: '2026-01-01T14:00:00Z', now_utc: now }
    ]
  });

  const adr = defineInvariant<ArchitectureChange>({
    id: 'INV-GLOBAL-CHG-001',
    statement: 'Architecture-impacting changes reference an ADR',
    ownerRole: 'platform_architect',
    test: adrPresent,
    negative: [{ architecture_impact: true, adr_ref: '' }],
    positive: [
      { architecture_impact: true, adr_ref: 'planning/adrs/ADR-0001.md' },
      { architecture_impact: false }
    ]
  });

  const safeMode = defineInvariant<{ safeMode: boolean; action: string }>({
    id: 'INV-GLOBAL-OPS-001',
    statement: 'Safe mode blocks restricted actions',
    ownerRole: 'security_steward',
    test: fixture => safeModeAllows(fixture.safeMode, fixture.action, limits.safeModeRestrictedActions),
    negative: limits.safeModeRestrictedActions.map(action => ({ safeMode: true, action })),
    positive: [
      ...limits.safeModeRestrictedActions.map(action => ({ safeMode: false, action })),
      { safeMode: true, action: 'read_report' }
    ]
  });

  const containment = defineInvariant<number>({
    id: 'INV-GLOBAL-OPS-002',
    statement: 'Incidents are contained within the containment SLA',
    ownerRole: 'security_steward',
    test: elapsed => containmentWithinSla(elapsed, limits.containmentSlaMinutes),
    negative: [limits.containmentSlaMinutes + 15],
    positive: [Math.max(0, limits.containmentSlaMinutes - 15), limits.containmentSlaMinutes]
  });

  return [
    order, appendOnly, lineage, decisionOwner, escalation, editAuthority, secretScan,
    promotion, redGate, signoff, envelope, budgetCap, adr, safeMode, containment
  ];
}
