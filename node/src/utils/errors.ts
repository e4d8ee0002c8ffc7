// Client-facing failures. Infrastructure failures are absorbed where they happen and never
// surface as one of these.
import type { ZodIssue } from 'zod';

export interface FieldIssue {
  path: string;
  message: string;
}

export class SearchValidationError extends Error {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly issues: FieldIssue[] = [],
  ) {
    super(message);
    this.name = 'SearchValidationError';
  }

  static fromZod(issues: readonly ZodIssue[]): SearchValidationError {
    return new SearchValidationError(
      'Invalid search parameters',
      issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    );
  }
}

export class QueryNotUnderstoodError extends Error {
  readonly code = 'QUERY_NOT_UNDERSTOOD';

  constructor(detail: string) {
    super(`Could not understand query: ${detail}`);
    this.name = 'QueryNotUnderstoodError';
  }
}
