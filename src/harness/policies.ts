// Governance policy rules exercised by the invariant catalog

import type { InvariantVerdict } from '../types/governance.js';

const ok = (diagnostic = 'ok'): InvariantVerdict => ({ passed: true, diagnostic });
const fail = (diagnostic: string): InvariantVerdict => ({ passed: false, diagnostic });

export function lineageComplete(lineage: Record<string, string>, dimensions: string[]): InvariantVerdict {
  const missing = dimensions.filter(dim => !(lineage[dim] ?? '').trim());
  return missing.length > 0 ? fail(`MISSING_LINEAGE_DIMENSIONS ${missing.join(',')}`) : ok();
}

export interface DecisionAuthority {
  decision_id: string;
  authority_owners: string[];
}

export function singleAuthorizedOwner(record: DecisionAuthority, authorizedRoles: string[]): InvariantVerdict {
  if (record.authority_owners.length !== 1) {
    return fail(`ambiguous_owner: ${record.decision_id} expected exactly one authority owner, found ${record.authority_owners.length}`);
  }
  const [owner] = record.authority_owners;
  if (!authorizedRoles.includes(owner)) {
    return fail(`role_authority_mismatch: ${record.decision_id} unauthorized owner role ${owner}`);
  }
  return ok();
}

export interface RoleConflict {
  hours_open: number;
  resolved: boolean;
  escalation_ref?: string;
}

export type ConflictState = 'allow_progress' | 'in_review' | 'blocked';

export function conflictState(conflict: RoleConflict, slaHours: number): ConflictState {
  if (conflict.resolved && conflict.hours_open <= slaHours) return 'allow_progress';
  if (!conflict.resolved && conflict.hours_open > slaHours) return 'blocked';
  return 'in_review';
}

// A breached conflict must be blocked and carry an escalation reference
export function escalationWithinSla(conflict: RoleConflict, slaHours: number): InvariantVerdict {
  const state = conflictState(conflict, slaHours);
  if (state === 'blocked') {
    return conflict.escalation_ref
      ? fail(`SLA_BREACH blocked after ${conflict.hours_open}h; escalation=${conflict.escalation_ref}`)
      : fail(`SLA_BREACH blocked after ${conflict.hours_open}h; missing escalation reference`);
  }
  return ok(state);
}

export interface PromotionRequest {
  untrusted_source: boolean;
  evidence_bound: boolean;
  caveated: boolean;
  bypass: boolean;
}

export function untrustedPromotion(request: PromotionRequest): InvariantVerdict {
  if (request.bypass) return fail('BYPASS_REJECTED');
  if (request.untrusted_source && !(request.evidence_bound || request.caveated)) {
    return fail('EVIDENCE_BINDING_REQUIRED');
  }
  return ok('ALLOWED');
}

export function twoRoleSignoff(signoffs: string[], requiredRoles: string[]): InvariantVerdict {
  const missing = requiredRoles.filter(role => !signoffs.includes(role)).sort();
  return missing.length > 0 ? fail(`missing_required_role=${missing[0]}`) : ok();
}

export interface SpendState {
  spend_usd: number;
  cap_usd: number;
  exception_expires_utc?: string;
  now_utc: string;
}

export type BudgetRunState = 'allowed' | 'temporarily_unblocked_by_exception' | 'blocked_budget_cap_exceeded';

export function budgetRunState(state: SpendState): BudgetRunState {
  if (state.spend_usd <= state.cap_usd) return 'allowed';
  if (state.exception_expires_utc && Date.parse(state.exception_expires_utc) > Date.parse(state.now_utc)) {
    return 'temporarily_unblocked_by_exception';
  }
  return 'blocked_budget_cap_exceeded';
}

export function budgetCapRespected(state: SpendState): InvariantVerdict {
  const result = budgetRunState(state);
  return result === 'blocked_budget_cap_exceeded'
    ? fail(`${result} spend=${state.spend_usd} cap=${state.cap_usd}`)
    : ok(result);
}

export interface ArchitectureChange {
  architecture_impact: boolean;
  adr_ref?: string;
}

export function adrPresent(change: ArchitectureChange): InvariantVerdict {
  if (change.architecture_impact && !(change.adr_ref ?? '').trim()) {
    return fail('missing ADR path/id for architecture-impacting change');
  }
  return ok();
}

export function safeModeAllows(safeMode: boolean, action: string, restricted: string[]): InvariantVerdict {
  return safeMode && restricted.includes(action) ? fail(`SAFE_MODE_BLOCKED action=${action}`) : ok('ALLOWED');
}

export function containmentWithinSla(elapsedMinutes: number, slaMinutes: number): InvariantVerdict {
  return elapsedMinutes <= slaMinutes
    ? ok(`SLA_OK elapsed_minutes=${elapsedMinutes}`)
    : fail(`SLA_BREACH elapsed_minutes=${elapsedMinutes} sla_minutes=${slaMinutes}`);
}
