import type { UriTarget } from './types';

/**
 * Formats the URI that replaces a matched one.
 *
 * - `ssh-colon`: `user@host:path` (SCP style)
 * - `relative`: `host/path`, where host is usually a prefix such as `../..`
 * - anything else: `proto://user@host/path`
 */
export function formatUri(target: UriTarget, newPath: string): string {
  const user = target.username !== undefined ? `${target.username}@` : '';

  switch (target.protocol) {
    case 'ssh-colon':
      return `${user}${target.hostname}:${newPath}`;
    case 'relative':
      return `${target.hostname}/${newPath}`;
    default:
      return `${target.protocol}://${user}${target.hostname}/${newPath}`;
  }
}
