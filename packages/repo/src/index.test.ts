import { describe, it, expect } from 'vitest';
import { name, GitConfigScanner } from './index';

describe('repo package', () => {
  it('exports name', () => {
    expect(name).toBe('@gitremap/repo');
  });

  it('exports the scanner', () => {
    expect(new GitConfigScanner()).toBeInstanceOf(GitConfigScanner);
  });
});
