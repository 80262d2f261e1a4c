// Phase-Order Validator - handoffs must advance the canonical team order one phase at a time

import { PhaseRegistry } from '../ledger/registry.js';
import type { LedgerStore } from '../ledger/store.js';
import type { GovernorConfig } from '../config/index.js';
import type { HandoffRecord, DecisionRecord } from '../types/governance.js';
import { ConfigurationError, OrderingViolation, UnknownTeamError } from '../errors.js';
import { passOutcome, type GateOutcome } from '../gate/outcome.js';

export const PHASE_ORDER_RULE = 'PHASE-ORDER';

export interface ContainedAnomaly {
  runId: string;
  timestamp: string;
  expectedPair: string;
  observedPair: string;
  observedDelta: number;
}

export type OrderState =
  | { kind: 'ordered'; latestPhase: number | null }
  | { kind: 'anomaly_contained'; latestPhase: number; anomaly: ContainedAnomaly };

export type OrderFailure =
  | { kind: 'no_handoffs'; message: string }
  | { kind: 'unknown_team'; runId: string; team: string; message: string }
  | {
      kind: 'out_of_order';
      runId: string;
      expectedPair: string;
      observedPair: string;
      observedDelta: number;
      blockDecisionLogged: false;
      message: string;
    };

export interface RunOrderReport {
  runId: string;
  accepted: number;
  duplicates: number;
  contained: ContainedAnomaly[];
  // State kinds visited, starting with 'ordered'
  trace: OrderState['kind'][];
  finalState: OrderState;
}

export interface PhaseOrderResult {
  runs: RunOrderReport[];
  failure: OrderFailure | null;
}

function sortByTimestamp(rows: HandoffRecord[]): HandoffRecord[] {
  return [...rows].sort((a, b) => (a.timestamp_utc < b.timestamp_utc ? -1 : a.timestamp_utc > b.timestamp_utc ? 1 : 0));
}

function groupByRun(handoffs: HandoffRecord[]): Map<string, HandoffRecord[]> {
  const runs = new Map<string, HandoffRecord[]>();
  for (const handoff of handoffs) {
    const rows = runs.get(handoff.run_id) ?? [];
    rows.push(handoff);
    runs.set(handoff.run_id, rows);
  }
  return runs;
}

export class PhaseOrderValidator {
  private marker: string;
  private doctrineRef: string;

  constructor(config: GovernorConfig) {
    this.marker = config.phaseOrder.blockDecisionMarker;
    this.doctrineRef = config.doctrineRef;
  }

  evaluate(handoffs: HandoffRecord[], registry: PhaseRegistry, decisions: DecisionRecord[]): PhaseOrderResult {
    if (registry.isEmpty) {
      throw new ConfigurationError(PHASE_ORDER_RULE, `team registry has no phase rows; doctrine=${this.doctrineRef}`);
    }
    if (handoffs.length === 0) {
      return {
        runs: [],
        failure: { kind: 'no_handoffs', message: `no handoff rows found; doctrine=${this.doctrineRef}` }
      };
    }

    const reports: RunOrderReport[] = [];
    for (const [runId, rows] of groupByRun(handoffs)) {
      const { report, failure } = this.evaluateRun(runId, sortByTimestamp(rows), registry, decisions);
      reports.push(report);
      if (failure) {
        return { runs: reports, failure };
      }
    }
    return { runs: reports, failure: null };
  }

  private evaluateRun(
    runId: string,
    rows: HandoffRecord[],
    registry: PhaseRegistry,
    decisions: DecisionRecord[]
  ): { report: RunOrderReport; failure: OrderFailure | null } {
    const report: RunOrderReport = {
      runId,
      accepted: 0,
      duplicates: 0,
      contained: [],
      trace: ['ordered'],
      finalState: { kind: 'ordered', latestPhase: null }
    };

    const moveTo = (next: OrderState): void => {
      if (next.kind !== report.finalState.kind) {
        report.trace.push(next.kind);
      }
      report.finalState = next;
    };

    for (const handoff of rows) {
      const fromPhase = registry.phaseOf(handoff.from_team);
      const toPhase = registry.phaseOf(handoff.to_team);
      if (fromPhase === undefined || toPhase === undefined) {
        const team = fromPhase === undefined ? handoff.from_team : handoff.to_team;
        return {
          report,
          failure: {
            kind: 'unknown_team',
            runId,
            team,
            message: `run_id=${runId} unknown team '${team}' in handoff ${handoff.from_team}->${handoff.to_team}; doctrine=${this.doctrineRef}`
          }
        };
      }

      const latest = report.finalState.latestPhase;

      // First handoff sets the baseline
      if (latest === null) {
        report.accepted++;
        moveTo({ kind: 'ordered', latestPhase: toPhase });
        continue;
      }

      // Re-logged or corrected copy of the last accepted step
      if (fromPhase === latest - 1 && toPhase === latest) {
        report.duplicates++;
        continue;
      }

      if (fromPhase === latest && toPhase - fromPhase === 1) {
        report.accepted++;
        moveTo({ kind: 'ordered', latestPhase: toPhase });
        continue;
      }

      const expectedPair = `${registry.teamAt(latest) ?? '?'}->${registry.teamAt(latest + 1) ?? '?'}`;
      const observedPair = `${handoff.from_team}->${handoff.to_team}`;
      const observedDelta = toPhase - fromPhase;
      const blockLogged = decisions.some(
        decision => decision.run_id === runId && decision.decision_text.includes(this.marker)
      );

      if (blockLogged) {
        const anomaly: ContainedAnomaly = { runId, timestamp: handoff.timestamp_utc, expectedPair, observedPair, observedDelta };
        report.contained.push(anomaly);
        moveTo({ kind: 'anomaly_contained', latestPhase: latest, anomaly });
        continue;
      }

      return {
        report,
        failure: {
          kind: 'out_of_order',
          runId,
          expectedPair,
          observedPair,
          observedDelta,
          blockDecisionLogged: false,
          message:
            `run_id=${runId} out-of-order handoff; expected_phase_delta=1; observed_phase_delta=${observedDelta}; ` +
            `expected_pair=${expectedPair}; observed=${observedPair}; block_decision_log=missing; doctrine=${this.doctrineRef}`
        }
      };
    }

    return { report, failure: null };
  }

  // Throws the failure as its rule-family error
  assertOrdered(result: PhaseOrderResult): void {
    const failure = result.failure;
    if (!failure) return;
    if (failure.kind === 'unknown_team') {
      throw new UnknownTeamError(PHASE_ORDER_RULE, failure.message);
    }
    throw new OrderingViolation(PHASE_ORDER_RULE, failure.message);
  }

  check(store: LedgerStore): GateOutcome {
    const registry = new PhaseRegistry(store.loadPhases(PHASE_ORDER_RULE));
    const handoffs = store.loadHandoffs(PHASE_ORDER_RULE).map(row => row.record);
    const result = this.evaluate(handoffs, registry, store.loadDecisions());
    this.assertOrdered(result);

    const contained = result.runs.flatMap(run => run.contained);
    return passOutcome(
      PHASE_ORDER_RULE,
      `pipeline order valid via team registry phases; runs=${result.runs.length}; contained_anomalies=${contained.length}; doctrine=${this.doctrineRef}`,
      contained.map(a => `run_id=${a.runId} contained anomaly at ${a.timestamp}: expected_pair=${a.expectedPair}; observed=${a.observedPair}`)
    );
  }
}
