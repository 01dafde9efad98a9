import type { AttemptError } from '../../errors/app-error.js';

/**
 * Header name → values. An empty list, or an empty first value, removes the
 * header from the baseline instead of sending it empty.
 */
export type HeaderOverrides = Readonly<Record<string, readonly string[]>>;

export type ResponseHeaders = Readonly<Record<string, string | string[]>>;

export interface FetchTarget {
  readonly imageUrl: string;
  readonly port: number;
  readonly candidateIps: readonly string[];
  readonly extraHeaders?: HeaderOverrides;
}

export interface AttemptRequest {
  readonly ip: string;
  readonly port: number;
  readonly url: string;
  readonly headers?: HeaderOverrides;
}

export interface HttpReply {
  readonly status: number;
  readonly headers: ResponseHeaders;
  readonly body: Buffer;
}

export interface AttemptResponse extends HttpReply {
  readonly ok: true;
  readonly ip: string;
}

export interface AttemptFailure {
  readonly ok: false;
  readonly ip: string;
  readonly error: AttemptError;
}

export type FetchResult = AttemptResponse | AttemptFailure;

/**
 * Performs one request against one edge IP. Rejections are classified into
 * `AttemptError`s by the race.
 */
export type AttemptTransport = (
  request: AttemptRequest,
  signal: AbortSignal
) => Promise<HttpReply>;
