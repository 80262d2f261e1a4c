// Phase Registry - team to phase-order lookups

import type { TeamPhase } from '../types/governance.js';

export class PhaseRegistry {
  private byTeam = new Map<string, number>();
  private byPhase = new Map<number, string>();

  constructor(phases: TeamPhase[]) {
    for (const { team_id, phase_order } of phases) {
      const team = team_id.trim().toLowerCase();
      if (!team) continue;
      this.byTeam.set(team, phase_order);
      // First team registered at a phase names it
      if (!this.byPhase.has(phase_order)) {
        this.byPhase.set(phase_order, team);
      }
    }
  }

  get size(): number {
    return this.byTeam.size;
  }

  get isEmpty(): boolean {
    return this.byTeam.size === 0;
  }

  phaseOf(team: string): number | undefined {
    return this.byTeam.get(team.trim().toLowerCase());
  }

  teamAt(phase: number): string | undefined {
    return this.byPhase.get(phase);
  }
}
