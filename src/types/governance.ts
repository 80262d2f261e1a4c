// Governance Types - Typed ledger rows, findings and gate reports

export type RunStatus = 'active' | 'blocked' | 'completed';
export type PipelineMode = 'full' | 'lite';
export type SecretScope = 'staged' | 'tracked';
export type CheckStatus = 'pass' | 'fail';
export type GateColor = 'green' | 'yellow' | 'red';

export interface Run {
  run_id: string;
  current_phase: string;
  status: RunStatus | string;
  pipeline_mode?: PipelineMode | string;
  created_utc?: string;
  supersedes_run_id?: string;
}

export interface TeamPhase {
  team_id: string;
  phase_order: number;
}

export interface HandoffRecord {
  run_id: string;
  from_team: string;
  to_team: string;
  timestamp_utc: string;
  entry_id?: string;
  blocking_flags?: string;
  supersedes_ref?: string;
}

export interface DecisionRecord {
  run_id: string;
  decision_text: string;
  timestamp_utc: string;
  decision_id?: string;
}

export interface ChangeRequestRecord {
  request_id: string;
  source_team: string;
  run_id?: string;
  status?: string;
  supersedes_request_id?: string;
}

export interface RunModeRecord {
  run_id: string;
  pipeline_mode: string;
  declared_utc: string;
}

export interface BudgetEnvelope {
  run_id: string;
  fields: Record<string, string>;
}

export interface ReleaseGateRecord {
  release_id: string;
  gates: Record<string, string>;
}

export interface GateException {
  exception_id: string;
  release_id: string;
  gate: string;
  approved_by_role: string;
  expires_utc: string;
}

// Any row of an append-only table, in header order
export interface LedgerRow {
  line: number;
  values: Record<string, string>;
}

export interface ExecutableAssetEdit {
  path: string;
  editor_role: string;
  has_provenance_reference: boolean;
}

export interface SecretFinding {
  scope: SecretScope;
  file: string;
  line: number;
  matched_pattern: string;
  snippet: string;
}

export interface InvariantVerdict {
  passed: boolean;
  diagnostic: string;
}

export interface CheckResult {
  id: string;
  status: CheckStatus;
  message: string;
}

export interface GateReport {
  checks: CheckResult[];
  overall: CheckStatus;
  generated_at_utc?: string;
  base_ref?: string;
}
