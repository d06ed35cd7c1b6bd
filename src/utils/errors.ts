/**
 * Error taxonomy for crawling and challenge resolution.
 *
 * Page-scoped failures are caught by the Page Navigator and turned into
 * navigation outcomes; none of these classes escape a target's crawl.
 */

/** A render-session operation (goto, click, setContent) failed at the transport level */
export class NavigationFailure extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NavigationFailure';
  }
}

export type ResolverErrorKind = 'unavailable' | 'timeout' | 'rejected';

export abstract class ResolverError extends Error {
  abstract readonly kind: ResolverErrorKind;

  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The resolver could not be reached, or its circuit breaker is open */
export class ResolverUnavailable extends ResolverError {
  readonly kind = 'unavailable' as const;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, url, options);
    this.name = 'ResolverUnavailable';
  }
}

export class ResolverTimeout extends ResolverError {
  readonly kind = 'timeout' as const;

  constructor(
    url: string,
    public readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(`Challenge resolution timed out after ${timeoutMs}ms`, url, options);
    this.name = 'ResolverTimeout';
  }
}

/** Non-2xx HTTP status, an `error` status in the body, or a malformed body */
export class ResolverRejected extends ResolverError {
  readonly kind = 'rejected' as const;

  constructor(
    message: string,
    url: string,
    public readonly httpStatus: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, url, options);
    this.name = 'ResolverRejected';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** A Supabase query failed; `code` is the PostgREST/Postgres error code when there is one */
export class StoreError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
    public readonly code: string | null = null
  ) {
    super(`${operation} failed: ${message}`);
    this.name = 'StoreError';
  }
}
