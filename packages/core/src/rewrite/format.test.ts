import { describe, it, expect } from 'vitest';
import { formatUri } from './format';

describe('formatUri', () => {
  it('formats SCP-style URIs with and without a user', () => {
    expect(
      formatUri({ protocol: 'ssh-colon', hostname: 'newgit.example.com', username: 'git' }, 'a/b'),
    ).toBe('git@newgit.example.com:a/b');
    expect(formatUri({ protocol: 'ssh-colon', hostname: 'newgit.example.com' }, 'a/b')).toBe(
      'newgit.example.com:a/b',
    );
  });

  it('formats relative URIs and ignores the user', () => {
    expect(formatUri({ protocol: 'relative', hostname: '../..', username: 'git' }, 'a/b')).toBe(
      '../../a/b',
    );
  });

  it('formats scheme URIs', () => {
    expect(formatUri({ protocol: 'https', hostname: 'h.example.com' }, 'a/b')).toBe(
      'https://h.example.com/a/b',
    );
    expect(formatUri({ protocol: 'ssh', hostname: 'h', username: 'git' }, 'p')).toBe(
      'ssh://git@h/p',
    );
    expect(formatUri({ protocol: 'git', hostname: 'h' }, 'p')).toBe('git://h/p');
    expect(formatUri({ protocol: 'http', hostname: 'h', username: 'me' }, 'p')).toBe(
      'http://me@h/p',
    );
    expect(formatUri({ protocol: 'file', hostname: '/srv/git' }, 'p')).toBe('file:///srv/git/p');
  });
});
