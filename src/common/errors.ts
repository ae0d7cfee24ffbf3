export type ErrorKind = 'adapter' | 'persistence' | 'validation' | 'export';

export type AdapterFailureReason = 'unavailable' | 'permission_denied' | 'timeout';

export abstract class DomainError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The radio stack could not complete a scan. Always retryable.
 */
export class AdapterError extends DomainError {
  readonly kind = 'adapter';

  constructor(
    readonly reason: AdapterFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class PersistenceError extends DomainError {
  readonly kind = 'persistence';
}

/**
 * Rejected input. `fields` names every offending field, sorted.
 */
export class ValidationError extends DomainError {
  readonly kind = 'validation';
  readonly fields: string[];

  constructor(fields: string[], details: string[] = []) {
    const unique = [...new Set(fields)].sort();
    const suffix = details.length > 0 ? ` (${details.join('; ')})` : '';
    super(`Invalid field(s): ${unique.join(', ')}${suffix}`);
    this.fields = unique;
  }
}

/**
 * A CSV export stream broke after it started. Rows already sent stay sent.
 */
export class ExportError extends DomainError {
  readonly kind = 'export';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
