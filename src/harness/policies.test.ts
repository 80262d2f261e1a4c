import { describe, it, expect } from 'vitest';
import {
  conflictState,
  escalationWithinSla,
  untrustedPromotion,
  twoRoleSignoff,
  budgetRunState,
  safeModeAllows,
  containmentWithinSla,
  singleAuthorizedOwner
} from './policies.js';

describe('role conflicts', () => {
  it('moves from review to blocked once the SLA passes unresolved', () => {
    expect(conflictState({ hours_open: 2, resolved: true }, 24)).toBe('allow_progress');
    expect(conflictState({ hours_open: 30, resolved: true }, 24)).toBe('in_review');
    expect(conflictState({ hours_open: 30, resolved: false }, 24)).toBe('blocked');
  });

  it('names the escalation reference on a breach', () => {
    expect(escalationWithinSla({ hours_open: 30, resolved: false }, 24)).toEqual({
      passed: false,
      diagnostic: 'SLA_BREACH blocked after 30h; missing escalation reference'
    });
  });
});

describe('decision ownership', () => {
  it('requires exactly one owner from the authorized roles', () => {
    expect(singleAuthorizedOwner({ decision_id: 'D1', authority_owners: ['a', 'b'] }, ['a']).diagnostic)
      .toBe('ambiguous_owner: D1 expected exactly one authority owner, found 2');
    expect(singleAuthorizedOwner({ decision_id: 'D2', authority_owners: ['a'] }, ['a']).passed).toBe(true);
  });
});

describe('untrustedPromotion', () => {
  it('rejects a bypass before checking evidence', () => {
    expect(untrustedPromotion({ untrusted_source: false, evidence_bound: true, caveated: true, bypass: true }).diagnostic)
      .toBe('BYPASS_REJECTED');
    expect(untrustedPromotion({ untrusted_source: false, evidence_bound: false, caveated: false, bypass: false }).passed)
      .toBe(true);
  });
});

describe('sign-off, budget, safe mode and containment', () => {
  it('names the first missing sign-off role', () => {
    expect(twoRoleSignoff([], ['technical_owner', 'business_owner']).diagnostic).toBe('missing_required_role=business_owner');
  });

  it('unblocks an over-cap run only while its exception is unexpired', () => {
    const base = { spend_usd: 150, cap_usd: 100, now_utc: '2026-01-01T12:00:00Z' };
    expect(budgetRunState(base)).toBe('blocked_budget_cap_exceeded');
    expect(budgetRunState({ ...base, exception_expires_utc: '2026-01-02T00:00:00Z' })).toBe('temporarily_unblocked_by_exception');
    expect(budgetRunState({ ...base, spend_usd: 100 })).toBe('allowed');
  });

  it('blocks restricted actions only in safe mode', () => {
    expect(safeModeAllows(true, 'external_publish', ['external_publish']).diagnostic).toBe('SAFE_MODE_BLOCKED action=external_publish');
    expect(safeModeAllows(false, 'external_publish', ['external_publish']).passed).toBe(true);
  });

  it('accepts containment exactly at the SLA', () => {
    expect(containmentWithinSla(60, 60)).toEqual({ passed: true, diagnostic: 'SLA_OK elapsed_minutes=60' });
  });
});
