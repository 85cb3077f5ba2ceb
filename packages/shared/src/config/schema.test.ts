import { describe, it, expect } from 'vitest';
import { ConfigSchema, PROTOCOLS } from './schema';

const valid = {
  search: { hostname: 'oldgit|oldgit\\.example\\.org', path: '/+(?:var|srv)/+git' },
  replace: {
    hostname: 'newgit.example.com',
    username: 'git',
    protocol: 'ssh-colon',
    substitutions: { oldproject1: 'new/path/project1' },
  },
};

describe('ConfigSchema', () => {
  it('accepts a complete configuration', () => {
    const result = ConfigSchema.safeParse(valid);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.replace.protocol).toBe('ssh-colon');
      expect(result.data.replace.substitutions).toEqual({ oldproject1: 'new/path/project1' });
    }
  });

  it('accepts every known protocol', () => {
    for (const protocol of PROTOCOLS) {
      const result = ConfigSchema.safeParse({ ...valid, replace: { ...valid.replace, protocol } });
      expect(result.success).toBe(true);
    }
  });

  it('defaults the protocol to ssh', () => {
    const { protocol: _omitted, ...replace } = valid.replace;
    const result = ConfigSchema.parse({ ...valid, replace });
    expect(result.replace.protocol).toBe('ssh');
  });

  it('rejects an unknown protocol with the list of valid ones', () => {
    const result = ConfigSchema.safeParse({
      ...valid,
      replace: { ...valid.replace, protocol: 'svn' },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['replace', 'protocol']);
      expect(result.error.issues[0].message).toBe(
        'replace/protocol "svn" is invalid (valid protocols: git, ssh, http, https, ssh-colon, file, relative)',
      );
    }
  });

  it('requires the search section and the substitution table', () => {
    const result = ConfigSchema.safeParse({ replace: { hostname: 'h' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      const paths = result.error.issues.map((i) => i.path.join('.'));
      expect(paths).toContain('search');
      expect(paths).toContain('replace.substitutions');
    }
  });

  it('rejects non-string substitution targets', () => {
    const result = ConfigSchema.safeParse({
      ...valid,
      replace: { ...valid.replace, substitutions: { a: 1 } },
    });
    expect(result.success).toBe(false);
  });
});
