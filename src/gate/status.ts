// Release Gate Status - green/yellow/red transitions and the publish decision

import type { GateColor, GateException } from '../types/governance.js';

export type GateEvent =
  | { type: 'warning' }
  | { type: 'critical_failure' }
  | { type: 'warning_unmitigated' }
  | { type: 'remediated'; evidenceRef: string };

export interface GateTransition {
  from: GateColor;
  to: GateColor;
  event: GateEvent['type'];
  evidenceRef?: string;
}

const GATE_COLORS: readonly string[] = ['green', 'yellow', 'red'];

export function isGateColor(value: string): value is GateColor {
  return GATE_COLORS.includes(value);
}

export function nextColor(current: GateColor, event: GateEvent): GateColor {
  switch (event.type) {
    case 'warning':
      return current === 'green' ? 'yellow' : current;
    case 'critical_failure':
      return 'red';
    case 'warning_unmitigated':
      return current === 'yellow' ? 'red' : current;
    case 'remediated':
      // Leaving red requires recorded evidence
      return event.evidenceRef.trim() ? 'green' : current;
  }
}

export class GateStatusMachine {
  private current: GateColor;
  private transitions: GateTransition[] = [];

  constructor(initial: GateColor = 'green') {
    this.current = initial;
  }

  get color(): GateColor {
    return this.current;
  }

  get history(): readonly GateTransition[] {
    return this.transitions;
  }

  apply(event: GateEvent): GateColor {
    const next = nextColor(this.current, event);
    if (next !== this.current) {
      this.transitions.push({
        from: this.current,
        to: next,
        event: event.type,
        evidenceRef: event.type === 'remediated' ? event.evidenceRef : undefined
      });
      this.current = next;
    }
    return this.current;
  }
}

export interface PublishDecision {
  allowed: boolean;
  blocking: string[];
  excepted: string[];
}

export function isActiveException(exception: GateException, now: Date, approverRoles: string[]): boolean {
  const expires = Date.parse(exception.expires_utc);
  return !Number.isNaN(expires)
    && expires > now.getTime()
    && approverRoles.includes(exception.approved_by_role);
}

// A red mandatory gate blocks publish unless an active, role-approved exception covers it
export function canPublish(
  releaseId: string,
  gates: Record<string, GateColor>,
  exceptions: GateException[],
  now: Date,
  approverRoles: string[]
): PublishDecision {
  const blocking: string[] = [];
  const excepted: string[] = [];

  for (const [gate, color] of Object.entries(gates)) {
    if (color !== 'red') continue;
    const covered = exceptions.some(ex =>
      ex.release_id === releaseId && ex.gate === gate && isActiveException(ex, now, approverRoles)
    );
    (covered ? excepted : blocking).push(gate);
  }

  return { allowed: blocking.length === 0, blocking, excepted };
}
