import { describe, it, expect } from 'vitest';
import { PhaseRegistry } from './registry.js';

describe('PhaseRegistry', () => {
  it('looks teams up case-insensitively', () => {
    const registry = new PhaseRegistry([
      { team_id: 'Blue', phase_order: 1 },
      { team_id: 'red', phase_order: 2 }
    ]);
    expect(registry.size).toBe(2);
    expect(registry.phaseOf(' BLUE ')).toBe(1);
    expect(registry.phaseOf('green')).toBeUndefined();
  });

  it('names a phase after the first team registered at it', () => {
    const registry = new PhaseRegistry([
      { team_id: 'red', phase_order: 2 },
      { team_id: 'crimson', phase_order: 2 }
    ]);
    expect(registry.teamAt(2)).toBe('red');
    expect(registry.phaseOf('crimson')).toBe(2);
  });

  it('is empty when every team id is blank', () => {
    expect(new PhaseRegistry([{ team_id: '  ', phase_order: 1 }]).isEmpty).toBe(true);
  });
});
