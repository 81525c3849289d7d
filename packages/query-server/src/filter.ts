import { matchesPathFilter, NO_PATH_FILTERS, PathFilterSet } from './path_filter';
import { isSystemPath, SystemPathClassifier } from './system_path';

export interface FilterOptions {
  pathFilters?: PathFilterSet;
  filterSystemIncludes?: boolean;
  isSystemPath?: SystemPathClassifier;
}

const LEADING_SPACE = /^[ \t\n\v\f\r]+/;

/** Decides whether a candidate result line is emitted. Stateless. */
export class FilterPredicate {
  readonly pathFilters: PathFilterSet;
  private readonly filterSystemIncludes: boolean;
  private readonly isSystem: SystemPathClassifier;

  constructor(options: FilterOptions = {}) {
    this.pathFilters = options.pathFilters ?? NO_PATH_FILTERS;
    this.filterSystemIncludes = options.filterSystemIncludes ?? false;
    this.isSystem = options.isSystemPath ?? isSystemPath;
  }

  accept(candidate: string): boolean {
    const hasPathFilters = this.pathFilters.mode !== 'none';
    if (!hasPathFilters && !this.filterSystemIncludes) return true;
    const normalized = candidate.replace(LEADING_SPACE, '');
    if (this.filterSystemIncludes && this.isSystem(normalized)) return false;
    if (!hasPathFilters) return true;
    return matchesPathFilter(this.pathFilters, normalized);
  }
}
