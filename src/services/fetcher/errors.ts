import {
  AttemptCancelledError,
  AttemptError,
  AttemptTimeoutError,
  type ConnectionFailureReason,
  ConnectionError,
  RequestConstructionError,
  ResponseBodyError,
} from '../../errors/app-error.js';
import { findErrorCode, getErrorMessage } from '../../utils/error-utils.js';

export type AttemptStage = 'request' | 'body';

export interface AttemptErrorContext {
  readonly ip: string;
  readonly url: string;
  readonly stage: AttemptStage;
  readonly timeoutMs: number;
  /** Fires when the per-attempt timeout elapsed. */
  readonly timeoutSignal?: AbortSignal;
  /** The race's cancellation signal. */
  readonly cancelSignal?: AbortSignal;
}

const CONNECTION_REASONS: Readonly<Record<string, ConnectionFailureReason>> = {
  ECONNREFUSED: 'refused',
  ECONNRESET: 'reset',
  EPIPE: 'reset',
  UND_ERR_SOCKET: 'reset',
  EHOSTUNREACH: 'unreachable',
  ENETUNREACH: 'unreachable',
  EADDRNOTAVAIL: 'unreachable',
  ENOTFOUND: 'dns',
  EAI_AGAIN: 'dns',
  ENODATA: 'dns',
  ETIMEDOUT: 'timeout',
  UND_ERR_CONNECT_TIMEOUT: 'timeout',
  UND_ERR_HEADERS_TIMEOUT: 'timeout',
  UND_ERR_BODY_TIMEOUT: 'timeout',
};

const CONSTRUCTION_CODES = new Set([
  'UND_ERR_INVALID_ARG',
  'UND_ERR_NOT_SUPPORTED',
  'ERR_INVALID_URL',
  'ERR_INVALID_HTTP_TOKEN',
  'ERR_INVALID_CHAR',
]);

function isTlsCode(code: string): boolean {
  return (
    code.startsWith('ERR_TLS_') ||
    code.startsWith('ERR_SSL_') ||
    code.includes('CERT') ||
    code === 'DEPTH_ZERO_SELF_SIGNED_CERT'
  );
}

function isAbortLike(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' ||
      error.name === 'TimeoutError' ||
      findErrorCode(error) === 'UND_ERR_ABORTED')
  );
}

function classifyConnection(code: string | undefined): ConnectionFailureReason {
  if (!code) return 'network';
  const reason = CONNECTION_REASONS[code];
  if (reason) return reason;
  return isTlsCode(code) ? 'tls' : 'network';
}

/**
 * Classifies whatever a transport threw into the attempt error taxonomy.
 * Abort reasons are resolved from the signals rather than the error name:
 * undici rejects with the signal's reason, and AbortSignal.any hides which
 * source fired.
 */
export function mapAttemptError(
  error: unknown,
  context: AttemptErrorContext
): AttemptError {
  if (error instanceof AttemptError) return error;

  const { ip, url, stage } = context;

  if (context.cancelSignal?.aborted) {
    return new AttemptCancelledError(ip, url);
  }
  if (context.timeoutSignal?.aborted) {
    return new AttemptTimeoutError(context.timeoutMs, ip, url);
  }
  if (isAbortLike(error)) {
    return error instanceof Error && error.name === 'TimeoutError'
      ? new AttemptTimeoutError(context.timeoutMs, ip, url)
      : new AttemptCancelledError(ip, url);
  }

  const code = findErrorCode(error);
  const message = getErrorMessage(error);
  const options = error instanceof Error ? { cause: error } : undefined;

  if (code && CONSTRUCTION_CODES.has(code)) {
    return new RequestConstructionError(
      `Failed to create request: ${message}`,
      ip,
      url,
      options
    );
  }

  const reason = classifyConnection(code);
  if (stage === 'body' && reason !== 'timeout') {
    return new ResponseBodyError(
      `Failed to read response body: ${message}`,
      ip,
      url,
      options
    );
  }

  return new ConnectionError(
    `Failed to send request: ${message}`,
    reason,
    ip,
    url,
    options
  );
}
