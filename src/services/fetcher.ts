import { isIP } from 'node:net';

import { type Dispatcher, request } from 'undici';

import { config } from '../config/index.js';
import { RequestConstructionError } from '../errors/app-error.js';
import { normalizeIp } from '../utils/ip-address.js';

import { createAttemptAgent, destroyAgent } from './fetcher/agents.js';
import { mapAttemptError } from './fetcher/errors.js';
import {
  buildRequestHeaders,
  getHeader,
  normalizeResponseHeaders,
  withHostHeader,
} from './fetcher/headers.js';
import { readResponseBody } from './fetcher/response.js';
import type { AttemptRequest, HttpReply } from './fetcher/types.js';
import { logDebug } from './logger.js';

export interface DirectFetchOptions {
  /** Per-attempt deadline; fails the attempt with AttemptTimeoutError. */
  requestTimeoutMs?: number;
  /** Backstop for the connect, headers and body phases. */
  clientTimeoutMs?: number;
}

const DEFAULT_PORTS: Readonly<Record<string, number>> = {
  'http:': 80,
  'https:': 443,
};

interface AttemptEndpoint {
  /** The image URL as the edge should see it. */
  readonly url: URL;
  /** Same path and query, addressed to the edge IP. */
  readonly requestUrl: URL;
  /** TLS server name; absent when the URL host is itself an IP. */
  readonly servername: string | undefined;
}

function stripBrackets(hostname: string): string {
  return hostname.startsWith('[') && hostname.endsWith(']')
    ? hostname.slice(1, -1)
    : hostname;
}

function buildAttemptEndpoint(attempt: AttemptRequest): AttemptEndpoint {
  const { ip, url } = attempt;
  const family = isIP(ip);
  if (family === 0) {
    throw new RequestConstructionError(`Invalid IP address: ${ip}`, ip, url);
  }
  if (!Number.isInteger(attempt.port) || attempt.port < 1 || attempt.port > 65535) {
    throw new RequestConstructionError(`Invalid port: ${attempt.port}`, ip, url);
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new RequestConstructionError(`Invalid URL: ${url}`, ip, url, {
      cause: error,
    });
  }

  const defaultPort = DEFAULT_PORTS[parsed.protocol];
  if (defaultPort === undefined) {
    throw new RequestConstructionError(
      `Unsupported protocol: ${parsed.protocol}`,
      ip,
      url
    );
  }

  const effectivePort = parsed.port ? Number(parsed.port) : defaultPort;
  if (effectivePort !== attempt.port) {
    parsed.port = String(attempt.port);
  }

  const requestUrl = new URL(parsed.href);
  requestUrl.hostname = family === 6 ? `[${ip}]` : ip;
  // The hostname setter ignores values it cannot parse (zone-scoped IPv6).
  if (normalizeIp(stripBrackets(requestUrl.hostname)) !== normalizeIp(ip)) {
    throw new RequestConstructionError(`Cannot address IP in URL: ${ip}`, ip, url);
  }

  const hostname = stripBrackets(parsed.hostname);
  return {
    url: parsed,
    requestUrl,
    servername: isIP(hostname) === 0 ? hostname : undefined,
  };
}

function createTimeoutReason(): Error {
  const error = new Error('Request timeout');
  error.name = 'TimeoutError';
  return error;
}

/**
 * Fetches `attempt.url` over a connection to `attempt.ip`, whatever the URL's
 * host resolves to. The URL's host is still sent as Host and TLS server name.
 * Redirects are returned as-is and the connection is torn down afterwards.
 */
export async function fetchFromIp(
  attempt: AttemptRequest,
  signal?: AbortSignal,
  options: DirectFetchOptions = {}
): Promise<HttpReply> {
  const requestTimeoutMs =
    options.requestTimeoutMs ?? config.fetcher.requestTimeoutMs;
  const clientTimeoutMs =
    options.clientTimeoutMs ?? config.fetcher.clientTimeoutMs;

  const { url, requestUrl, servername } = buildAttemptEndpoint(attempt);
  const headers = withHostHeader(buildRequestHeaders(attempt.headers), url.host);

  const timeoutController = new AbortController();
  const timer = setTimeout(() => {
    timeoutController.abort(createTimeoutReason());
  }, requestTimeoutMs);
  const timeoutSignal = timeoutController.signal;
  const attemptSignal = signal
    ? AbortSignal.any([signal, timeoutSignal])
    : timeoutSignal;
  const agent = createAttemptAgent({ connectTimeoutMs: clientTimeoutMs, servername });
  const context = {
    ip: attempt.ip,
    url: url.href,
    timeoutMs: requestTimeoutMs,
    timeoutSignal,
    cancelSignal: signal,
  };

  try {
    let response: Dispatcher.ResponseData;
    try {
      response = await request(requestUrl, {
        method: 'GET',
        headers,
        signal: attemptSignal,
        dispatcher: agent,
        headersTimeout: clientTimeoutMs,
        bodyTimeout: clientTimeoutMs,
      });
    } catch (error) {
      throw mapAttemptError(error, { ...context, stage: 'request' });
    }

    const responseHeaders = normalizeResponseHeaders(response.headers);
    try {
      const body = await readResponseBody(
        response.body,
        getHeader(responseHeaders, 'content-encoding'),
        attemptSignal
      );
      return { status: response.statusCode, headers: responseHeaders, body };
    } catch (error) {
      throw mapAttemptError(error, { ...context, stage: 'body' });
    }
  } finally {
    clearTimeout(timer);
    await destroyAgent(agent).catch((error: unknown) => {
      logDebug('Failed to release attempt dispatcher', {
        ip: attempt.ip,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }
}
