// Cycle Health Summary - request backlog and per-run progress derived from the ledgers

import { writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { LedgerStore } from './ledger/store.js';
import { hasBlockingFlags } from './validators/run-state-sync.js';

export const SUMMARY_RULE = 'CYCLE-SUMMARY';

export interface RunHealth {
  run_id: string;
  status: string;
  current_phase: string;
  stage_completion_map: Record<string, number>;
  block_reasons: string[];
}

export interface CycleHealthSummary {
  schema_version: '1';
  generated_at_utc: string;
  duplicate_request_id_count: number;
  unresolved_request_count: number;
  unresolved_request_ids: string[];
  runs: RunHealth[];
}

function sortedRecord(entries: Map<string, number>): Record<string, number> {
  return Object.fromEntries([...entries.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function buildCycleSummary(store: LedgerStore, now: Date = new Date()): CycleHealthSummary {
  const requests = store.loadChangeRequests(SUMMARY_RULE).map(row => row.record);
  const handoffs = store.loadHandoffs(SUMMARY_RULE).map(row => row.record);
  const runs = store.loadRuns(SUMMARY_RULE).map(row => row.record);

  const counts = new Map<string, number>();
  const latestRequest = new Map<string, string>();
  for (const request of requests) {
    if (!request.request_id) continue;
    counts.set(request.request_id, (counts.get(request.request_id) ?? 0) + 1);
    latestRequest.set(request.request_id, (request.status ?? '').toLowerCase());
  }
  const openIds = [...latestRequest.entries()].filter(([, status]) => status === 'open').map(([id]) => id).sort();

  const latestRun = new Map(runs.map(run => [run.run_id, run]));
  const stages = new Map<string, Map<string, number>>();
  const blocks = new Map<string, string[]>();
  for (const handoff of handoffs) {
    const pair = `${handoff.from_team}->${handoff.to_team}`;
    const map = stages.get(handoff.run_id) ?? new Map<string, number>();
    map.set(pair, (map.get(pair) ?? 0) + 1);
    stages.set(handoff.run_id, map);
    if (hasBlockingFlags(handoff.blocking_flags)) {
      const reasons = blocks.get(handoff.run_id) ?? [];
      reasons.push((handoff.blocking_flags ?? '').trim());
      blocks.set(handoff.run_id, reasons);
    }
  }

  return {
    schema_version: '1',
    generated_at_utc: now.toISOString().replace(/\.\d{3}Z$/, 'Z'),
    duplicate_request_id_count: [...counts.values()].filter(count => count > 1).length,
    unresolved_request_count: openIds.length,
    unresolved_request_ids: openIds,
    runs: [...latestRun.keys()].sort().map(runId => {
      const run = latestRun.get(runId);
      return {
        run_id: runId,
        status: run?.status ?? '',
        current_phase: run?.current_phase ?? '',
        stage_completion_map: sortedRecord(stages.get(runId) ?? new Map<string, number>()),
        block_reasons: blocks.get(runId) ?? []
      };
    })
  };
}

export function writeCycleSummary(path: string, summary: CycleHealthSummary): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(summary, null, 2) + '\n');
  console.log(`[HARNESS] wrote cycle summary: ${path}`);
}
