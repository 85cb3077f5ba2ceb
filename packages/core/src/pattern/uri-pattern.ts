import { PatternCompileError, type SearchConfig } from '@gitremap/shared';
import type { UriMatch } from '../rewrite/types';
import {
  alt,
  capture,
  fragment,
  literal,
  oneOrMore,
  optional,
  raw,
  render,
  seq,
  type RegexNode,
} from './regex-ast';

export const KEY_GROUP = 'key';
export const PROJECT_GROUP = 'project';

export const URI_SCHEMES = ['file', 'ssh', 'git', 'http', 'https'] as const;

const RESERVED_GROUPS = [KEY_GROUP, PROJECT_GROUP];

// Whitespace that never crosses a line ending.
const BLANK = raw('[^\\S\\r\\n]*');

/**
 * A compiled composite pattern. Immutable: every scan uses its own RegExp,
 * so one instance can be shared across files.
 */
export class UriPattern {
  constructor(
    readonly source: string,
    readonly flags: string = 'gm',
  ) {}

  *matches(text: string): Generator<UriMatch> {
    const regex = new RegExp(this.source, this.flags);
    for (const match of text.matchAll(regex)) {
      const keyText = match.groups?.[KEY_GROUP];
      const projectName = match.groups?.[PROJECT_GROUP];
      const index = match.index;
      if (keyText === undefined || projectName === undefined || index === undefined) {
        continue;
      }
      yield { keyText, projectName, text: match[0], index };
    }
  }

  test(text: string): boolean {
    return new RegExp(this.source, this.flags.replace('g', '')).test(text);
  }
}

/**
 * Tree of the composite pattern for one search rule:
 *
 *   <blank>url<blank>=<blank>
 *   ( [scheme://] [user@] <hostname> [:] <path>  |  .. )
 *   /+ <project> [.git] <blank> end-of-line
 */
export function uriPatternTree(search: SearchConfig): RegexNode {
  const hostname = fragment('search.hostname', search.hostname, RESERVED_GROUPS);
  const path = fragment('search.path', search.path, RESERVED_GROUPS);

  const remote = seq(
    optional(seq(alt(...URI_SCHEMES.map((scheme) => literal(scheme))), literal('://'))),
    optional(seq(raw('[a-z_][a-z0-9_-]*[$]?'), literal('@')), { lazy: true }),
    hostname,
    optional(literal(':')),
    path,
  );

  return seq(
    raw('^'),
    capture(KEY_GROUP, seq(BLANK, literal('url'), BLANK, literal('='), BLANK)),
    alt(remote, literal('..')),
    oneOrMore(literal('/')),
    capture(PROJECT_GROUP, raw('[^.\\r\\n]+')),
    optional(literal('.git'), { lazy: true }),
    BLANK,
    raw('$'),
  );
}

/**
 * Builds the composite pattern for a search rule.
 * Throws PatternCompileError when a fragment is unusable on its own or
 * breaks the assembled pattern (e.g. a named backreference to a missing group).
 */
export function buildUriPattern(search: SearchConfig): UriPattern {
  const source = render(uriPatternTree(search));
  try {
    new RegExp(source, 'gm');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PatternCompileError('search', source, reason, { cause: error });
  }
  return new UriPattern(source);
}
