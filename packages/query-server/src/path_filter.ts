import { PatternError } from './errors';

export type PathFilterSet =
  | { mode: 'none' }
  | { mode: 'literal'; prefixes: readonly string[] }
  | { mode: 'regex'; patterns: readonly RegExp[] };

export const NO_PATH_FILTERS: PathFilterSet = { mode: 'none' };

/** Throws PatternError for a malformed pattern in regex mode. */
export function buildPathFilterSet(sources: readonly string[], asRegex: boolean): PathFilterSet {
  if (!sources.length) return NO_PATH_FILTERS;
  if (!asRegex) return { mode: 'literal', prefixes: Array.from(new Set(sources)) };
  const patterns = sources.map(src => {
    try {
      return new RegExp(src);
    } catch (err) {
      throw new PatternError(src, err);
    }
  });
  return { mode: 'regex', patterns };
}

export function matchesPathFilter(filters: PathFilterSet, candidate: string): boolean {
  switch (filters.mode) {
    case 'none':
      return true;
    case 'literal':
      return filters.prefixes.some(prefix => candidate.startsWith(prefix));
    case 'regex':
      return filters.patterns.some(re => re.test(candidate));
  }
}
