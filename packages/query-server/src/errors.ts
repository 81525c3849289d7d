/** Misuse of the job API by a query implementation. Never caught by the core. */
export class ContractViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolation';
  }
}

export class PatternError extends Error {
  readonly source: string;
  constructor(source: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Invalid path filter pattern "${source}": ${reason}`);
    this.name = 'PatternError';
    this.source = source;
  }
}

export class QueryError extends Error {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`Invalid query: ${issues.join('; ')}`);
    this.name = 'QueryError';
    this.issues = issues;
  }
}
