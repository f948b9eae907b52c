import { ZodError, ZodIssue } from 'zod';

export type ProviderErrorKind = 'rate-limited' | 'http' | 'timeout' | 'network' | 'malformed';

/**
 * Raised by provider sources. The fetch helper turns these into
 * placeholder results instead of letting them reach a caller.
 */
export class ProviderError extends Error {
  constructor(
    public readonly provider: string,
    public readonly kind: ProviderErrorKind,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class RequestValidationError extends Error {
  public readonly issues: ZodIssue[];

  constructor(error: ZodError) {
    super(error.issues.map(issue => formatIssue(issue)).join('; '));
    this.name = 'RequestValidationError';
    this.issues = error.issues;
  }
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
