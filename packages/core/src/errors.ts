export type PatchpullErrorCode =
  | "TRANSPORT"
  | "AUTH"
  | "API"
  | "NOT_FOUND"
  | "INVALID_FILTER"
  | "INCOMPLETE_SERIES"
  | "AMBIGUOUS_MATCH"
  | "APPLY_CONFLICT"
  | "CONFIG";

export interface PatchpullErrorOptions {
  status?: number;
  details?: unknown;
  cause?: unknown;
}

export class PatchpullError extends Error {
  readonly code: PatchpullErrorCode;
  readonly status?: number;
  readonly details?: unknown;

  constructor(code: PatchpullErrorCode, message: string, opts: PatchpullErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "PatchpullError";
    this.code = code;
    this.status = opts.status;
    this.details = opts.details;
  }
}

/** Network, TLS, timeout, or a response that cannot be decoded. */
export class TransportError extends PatchpullError {
  readonly timedOut: boolean;

  constructor(message: string, opts: PatchpullErrorOptions & { timedOut?: boolean } = {}) {
    super("TRANSPORT", message, opts);
    this.name = "TransportError";
    this.timedOut = opts.timedOut ?? false;
  }

  static timeout(url: string, timeoutMs: number, cause?: unknown) {
    return new TransportError(`Request to ${url} timed out after ${timeoutMs}ms`, {
      timedOut: true,
      cause,
    });
  }

  static unparseable(url: string, cause?: unknown) {
    return new TransportError(`Unparseable response from ${url}`, { cause });
  }
}

/** Credentials missing or rejected (401/403). */
export class AuthError extends PatchpullError {
  constructor(message: string, opts: PatchpullErrorOptions = {}) {
    super("AUTH", message, opts);
    this.name = "AuthError";
  }
}

/** Non-2xx response that carried a decodable error body. */
export class ApiError extends PatchpullError {
  constructor(message: string, opts: PatchpullErrorOptions & { status: number }) {
    super("API", message, opts);
    this.name = "ApiError";
  }
}

export class NotFoundError extends PatchpullError {
  constructor(message: string, opts: PatchpullErrorOptions = {}) {
    super("NOT_FOUND", message, { status: 404, ...opts });
    this.name = "NotFoundError";
  }

  static resource(type: string, id: string, cause?: unknown) {
    return new NotFoundError(`No ${type} resource with id ${id}`, { cause });
  }
}

export class InvalidFilterError extends PatchpullError {
  constructor(message: string, opts: PatchpullErrorOptions = {}) {
    super("INVALID_FILTER", message, opts);
    this.name = "InvalidFilterError";
  }
}

export class IncompleteSeriesError extends PatchpullError {
  readonly seriesId: string;
  readonly received: number;
  readonly total: number;

  constructor(seriesId: string, received: number, total: number) {
    super(
      "INCOMPLETE_SERIES",
      `Series ${seriesId} is incomplete: received ${received} of ${total} patches`,
    );
    this.name = "IncompleteSeriesError";
    this.seriesId = seriesId;
    this.received = received;
    this.total = total;
  }
}

export class AmbiguousMatchError extends PatchpullError {
  constructor(what: string, query: string, count: number) {
    super("AMBIGUOUS_MATCH", `More than one ${what} found for "${query}" (${count} matches)`);
    this.name = "AmbiguousMatchError";
  }
}

/** The local apply tool refused the patch; carries the tool's own diagnostic. */
export class ApplyConflictError extends PatchpullError {
  constructor(message: string, opts: PatchpullErrorOptions = {}) {
    super("APPLY_CONFLICT", message, opts);
    this.name = "ApplyConflictError";
  }
}

export class ConfigError extends PatchpullError {
  constructor(message: string, opts: PatchpullErrorOptions = {}) {
    super("CONFIG", message, opts);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
