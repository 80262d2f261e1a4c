import { describe, it, expect } from 'vitest';
import * as governor from './index.js';

describe('library entry', () => {
  it('exposes the loader class without constructing a shared instance', () => {
    expect(typeof governor.ConfigLoader).toBe('function');
    expect(governor).not.toHaveProperty('configLoader');
  });
});
