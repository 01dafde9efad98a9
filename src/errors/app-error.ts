/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    code = 'INTERNAL_ERROR',
    details: Record<string, unknown> = {},
    isOperational = true,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.code = code;
    this.details = Object.freeze({ ...details });
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid user input (URL, port, output path, CLI flags)
 */
export class ValidationError extends AppError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

/**
 * Unreadable or malformed config file
 */
export class ConfigError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', { path }, true, options);
    this.path = path;
  }
}

/**
 * Probe provider (hostname resolution API) failure
 */
export class ProviderError extends AppError {
  public readonly httpStatus?: number;

  constructor(
    message: string,
    httpStatus?: number,
    details: Record<string, unknown> = {},
    code = 'PROVIDER_ERROR'
  ) {
    super(message, code, { httpStatus, ...details });
    this.httpStatus = httpStatus;
  }
}

export class RateLimitError extends ProviderError {
  /** Seconds until the quota resets, when the provider reported it. */
  public readonly retryAfter?: number;

  constructor(retryAfter?: number) {
    super(
      retryAfter === undefined
        ? 'Too many requests'
        : `Too many requests, try again in ${retryAfter}s`,
      429,
      { retryAfter },
      'RATE_LIMITED'
    );
    this.retryAfter = retryAfter;
  }
}

// ---------------------------------------------------------------------------
// Per-attempt errors. These are recorded against one edge IP and never abort
// a race.
// ---------------------------------------------------------------------------

export class AttemptError extends AppError {
  public readonly ip: string;
  public readonly url: string;

  constructor(
    message: string,
    code: string,
    ip: string,
    url: string,
    details: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, code, { ip, url, ...details }, true, options);
    this.ip = ip;
    this.url = url;
  }
}

export class RequestConstructionError extends AttemptError {
  constructor(message: string, ip: string, url: string, options?: ErrorOptions) {
    super(message, 'REQUEST_CONSTRUCTION', ip, url, {}, options);
  }
}

export type ConnectionFailureReason =
  | 'refused'
  | 'reset'
  | 'unreachable'
  | 'dns'
  | 'tls'
  | 'timeout'
  | 'network';

export class ConnectionError extends AttemptError {
  public readonly reason: ConnectionFailureReason;

  constructor(
    message: string,
    reason: ConnectionFailureReason,
    ip: string,
    url: string,
    options?: ErrorOptions
  ) {
    super(message, 'CONNECTION_ERROR', ip, url, { reason }, options);
    this.reason = reason;
  }
}

export class AttemptTimeoutError extends ConnectionError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, ip: string, url: string) {
    super(`Request timeout after ${timeoutMs}ms`, 'timeout', ip, url);
    this.timeoutMs = timeoutMs;
  }
}

export class ResponseBodyError extends AttemptError {
  constructor(message: string, ip: string, url: string, options?: ErrorOptions) {
    super(message, 'RESPONSE_BODY_ERROR', ip, url, {}, options);
  }
}

export class AttemptCancelledError extends AttemptError {
  constructor(ip: string, url: string) {
    super('Request was canceled', 'ATTEMPT_CANCELLED', ip, url);
  }
}

// ---------------------------------------------------------------------------
// Hunt outcomes
// ---------------------------------------------------------------------------

export class AllVariantsExhaustedError extends AppError {
  public readonly variantsTried: number;
  public readonly candidateCount: number;

  constructor(variantsTried: number, candidateCount: number) {
    super(
      `All ${variantsTried} variant(s) failed across ${candidateCount} edge IP(s)`,
      'ALL_VARIANTS_EXHAUSTED',
      { variantsTried, candidateCount }
    );
    this.variantsTried = variantsTried;
    this.candidateCount = candidateCount;
  }
}

export class HuntAbortedError extends AppError {
  constructor() {
    super('Hunt was canceled', 'HUNT_ABORTED');
  }
}
