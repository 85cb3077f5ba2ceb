import type { UriPattern } from '../pattern/uri-pattern';
import type { ProjectListing, SubstitutionTable } from './types';

/**
 * Lists matched projects in file order with their new paths, without changing anything.
 */
export function listProjects(
  text: string,
  pattern: UriPattern,
  substitutions: SubstitutionTable,
): ProjectListing {
  const listing: ProjectListing = { entries: [], warnings: [] };

  for (const { projectName } of pattern.matches(text)) {
    const newPath = substitutions.get(projectName);
    if (newPath === undefined) {
      listing.warnings.push(projectName);
      listing.entries.push({ projectName });
    } else {
      listing.entries.push({ projectName, newPath });
    }
  }

  return listing;
}

export function containsUri(text: string, pattern: UriPattern): boolean {
  return pattern.test(text);
}
