import { describe, it, expect } from 'vitest';
import { name, ConfigSchema, createEvent } from './index';

describe('shared package', () => {
  it('exports name', () => {
    expect(name).toBe('@gitremap/shared');
  });

  it('exposes the config schema and event helpers', () => {
    expect(ConfigSchema.safeParse({}).success).toBe(false);
    expect(
      createEvent('run-1', { type: 'RunFinished', payload: { files: 0, failed: 0, unmapped: 0 } })
        .type,
    ).toBe('RunFinished');
  });
});
