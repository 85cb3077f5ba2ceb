import type { UriPattern } from '../pattern/uri-pattern';
import { formatUri } from './format';
import type { RewriteResult, SubstitutionTable, UriTarget } from './types';

export interface RewriteOptions {
  substitutions: SubstitutionTable;
  target: UriTarget;
}

/**
 * Replaces every matched URI whose project has a substitution with a URI built
 * from `target`. Spans of unmapped projects are copied unchanged and reported
 * in `warnings`. Text between matches is copied byte for byte.
 */
export function rewrite(text: string, pattern: UriPattern, options: RewriteOptions): RewriteResult {
  const parts: string[] = [];
  const warnings: string[] = [];
  let cursor = 0;
  let matches = 0;
  let replaced = 0;

  for (const match of pattern.matches(text)) {
    matches++;
    parts.push(text.slice(cursor, match.index));
    cursor = match.index + match.text.length;

    const newPath = options.substitutions.get(match.projectName);
    if (newPath === undefined) {
      warnings.push(match.projectName);
      parts.push(match.text);
      continue;
    }

    parts.push(match.keyText + formatUri(options.target, newPath));
    replaced++;
  }
  parts.push(text.slice(cursor));

  return { outputText: parts.join(''), warnings, matches, replaced };
}
