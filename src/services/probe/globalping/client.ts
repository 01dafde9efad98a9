import { setTimeout as delay } from 'node:timers/promises';

import type { z } from 'zod';

import { config } from '../../../config/index.js';
import {
  ProviderError,
  RateLimitError,
  ValidationError,
} from '../../../errors/app-error.js';
import { getErrorMessage } from '../../../utils/error-utils.js';
import { uniqueIps } from '../../../utils/ip-address.js';
import { logInfo, logWarn } from '../../logger.js';
import type { ProbeProvider } from '../provider.js';

import {
  createMeasurementResponseSchema,
  errorResponseSchema,
  GEOGRAPHIC_REGIONS,
  type MeasurementResult,
  measurementResponseSchema,
  type PingMeasurementRequest,
  probesResponseSchema,
} from './models.js';

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface GlobalpingClientOptions {
  baseUrl?: string;
  apiToken?: string;
  fetchFn?: FetchLike;
  requestTimeoutMs?: number;
  pollIntervalMs?: number;
  pollTimeoutMs?: number;
  probesPerRegion?: number;
}

type ApiReply = { notModified: true } | { notModified: false; data: unknown };

const API_ERROR_STATUSES = new Set([400, 404, 422]);

function isGeographicRegion(value: string): boolean {
  return GEOGRAPHIC_REGIONS.some((region) => region === value);
}

function parseRateLimitReset(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number.parseInt(header, 10);
  return Number.isNaN(seconds) || seconds < 0 ? undefined : seconds;
}

function parseJson(text: string, status: number): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new ProviderError(
      `Failed to parse response body (HTTP ${status})`,
      status
    );
  }
}

function parseWith<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  what: string
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ProviderError(`Invalid ${what} response`, undefined, {
      issues: result.error.issues.map((issue) => issue.message),
    });
  }
  return result.data;
}

function formatApiError(data: unknown, status: number): string {
  const parsed = errorResponseSchema.safeParse(data);
  if (!parsed.success) return `Unexpected response (HTTP ${status})`;

  const { type, message, params } = parsed.data.error;
  const lines = [`API returned error: (type "${type}") ${message}`];
  if (status === 400 && params && Object.keys(params).length > 0) {
    lines.push('Error params:');
    for (const [param, detail] of Object.entries(params)) {
      lines.push(`  - ${param}: ${detail}`);
    }
  }
  return lines.join('\n');
}

/**
 * Globalping measurement API. Hostnames are resolved by running a one-packet
 * ping from probes in every requested region and collecting the address each
 * probe resolved.
 */
export class GlobalpingClient implements ProbeProvider {
  readonly name = 'globalping';

  private readonly baseUrl: string;
  private readonly apiToken: string | undefined;
  private readonly fetchFn: FetchLike;
  private readonly requestTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly pollTimeoutMs: number;
  private readonly probesPerRegion: number;
  private readonly eTags = new Map<string, string>();

  constructor(options: GlobalpingClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.probe.baseUrl).replace(/\/$/, '');
    this.apiToken = options.apiToken;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.requestTimeoutMs =
      options.requestTimeoutMs ?? config.probe.requestTimeoutMs;
    this.pollIntervalMs = options.pollIntervalMs ?? config.probe.pollIntervalMs;
    this.pollTimeoutMs = options.pollTimeoutMs ?? config.probe.pollTimeoutMs;
    this.probesPerRegion =
      options.probesPerRegion ?? config.probe.probesPerRegion;
  }

  async locations(signal?: AbortSignal): Promise<string[]> {
    const reply = await this.request('GET', `${this.baseUrl}/probes`, {
      signal,
    });
    if (reply.notModified) return [];

    const probes = parseWith(probesResponseSchema, reply.data, 'probes');
    const regions = new Set<string>();
    for (const probe of probes) {
      const { region } = probe.location;
      if (region && isGeographicRegion(region)) regions.add(region);
    }
    return [...regions];
  }

  async resolve(
    hostname: string,
    locations: readonly string[],
    signal?: AbortSignal
  ): Promise<string[]> {
    const id = await this.createMeasurement(hostname, locations, signal);
    const results = await this.getMeasurement(id, signal);

    return uniqueIps(
      results.flatMap((entry) =>
        entry.result.resolvedAddress ? [entry.result.resolvedAddress] : []
      )
    );
  }

  async createMeasurement(
    hostname: string,
    regions: readonly string[],
    signal?: AbortSignal
  ): Promise<string> {
    if (!hostname) throw new ValidationError('No hostname specified');
    if (regions.length === 0) throw new ValidationError('No regions specified');

    const payload: PingMeasurementRequest = {
      type: 'ping',
      target: hostname,
      locations: regions.map((region) => ({
        region,
        limit: this.probesPerRegion,
      })),
      measurementOptions: { packets: 1 },
    };

    const reply = await this.request('POST', `${this.baseUrl}/measurements`, {
      body: payload,
      signal,
    });
    if (reply.notModified) {
      throw new ProviderError('Unexpected 304 for measurement creation', 304);
    }

    const created = parseWith(
      createMeasurementResponseSchema,
      reply.data,
      'measurement'
    );
    if (created.probesCount === 0) {
      throw new ProviderError('No probes available');
    }
    if (!created.id) {
      throw new ProviderError('Measurement response is missing its ID');
    }
    return created.id;
  }

  /**
   * Polls until the measurement finishes. A failed poll is logged and retried
   * on the next tick; only the overall deadline or an abort ends polling early.
   */
  async getMeasurement(
    id: string,
    signal?: AbortSignal
  ): Promise<MeasurementResult[]> {
    if (!id) throw new ValidationError('No measurement ID specified');

    const url = `${this.baseUrl}/measurements/${encodeURIComponent(id)}`;
    const startedAt = Date.now();

    try {
      for (;;) {
        await delay(this.pollIntervalMs, undefined, { signal });
        if (Date.now() - startedAt > this.pollTimeoutMs) {
          throw new ProviderError(
            `Measurement ${id} did not finish within ${this.pollTimeoutMs}ms`
          );
        }

        let reply: ApiReply;
        try {
          reply = await this.request('GET', url, { signal });
        } catch (error) {
          if (signal?.aborted) throw error;
          logWarn('Failed to get measurement', {
            id,
            error: getErrorMessage(error),
          });
          continue;
        }

        if (reply.notModified) {
          logInfo(`Measurement ${id} in progress...`);
          continue;
        }

        const measurement = parseWith(
          measurementResponseSchema,
          reply.data,
          'measurement'
        );
        switch (measurement.status) {
          case 'in-progress':
            logInfo(`Measurement ${id} in progress...`);
            continue;
          case 'finished':
            logInfo(
              `Measurement ${id} finished with ${measurement.results.length} results.`
            );
            return measurement.results;
          default:
            throw new ProviderError(
              `Invalid response: unknown status "${measurement.status}"`
            );
        }
      }
    } finally {
      this.eTags.delete(url);
    }
  }

  private buildHeaders(method: 'GET' | 'POST', url: string): Headers {
    const headers = new Headers({
      accept: 'application/json',
      'user-agent': config.probe.userAgent,
    });
    if (method === 'POST') headers.set('content-type', 'application/json');
    if (this.apiToken) headers.set('authorization', `Bearer ${this.apiToken}`);

    const eTag = method === 'GET' ? this.eTags.get(url) : undefined;
    if (eTag) headers.set('if-none-match', eTag);
    return headers;
  }

  private async request(
    method: 'GET' | 'POST',
    url: string,
    options: { body?: unknown; signal?: AbortSignal } = {}
  ): Promise<ApiReply> {
    const timeoutSignal = AbortSignal.timeout(this.requestTimeoutMs);
    const signal = options.signal
      ? AbortSignal.any([options.signal, timeoutSignal])
      : timeoutSignal;

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: this.buildHeaders(method, url),
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal,
      });
      text = await response.text();
    } catch (error) {
      if (options.signal?.aborted) throw error;
      throw new ProviderError(`Failed to send request: ${getErrorMessage(error)}`);
    }

    const eTag = response.headers.get('etag');
    if (method === 'GET' && eTag) this.eTags.set(url, eTag);

    const { status } = response;
    if (status === 200 || status === 202) {
      return { notModified: false, data: parseJson(text, status) };
    }
    if (status === 304) return { notModified: true };
    if (status === 429) {
      throw new RateLimitError(
        parseRateLimitReset(response.headers.get('x-ratelimit-reset'))
      );
    }
    if (API_ERROR_STATUSES.has(status)) {
      const data = text ? parseJson(text, status) : undefined;
      throw new ProviderError(formatApiError(data, status), status);
    }
    throw new ProviderError(`Unexpected response (HTTP ${status})`, status);
  }
}

export function createGlobalpingClient(
  options?: GlobalpingClientOptions
): GlobalpingClient {
  return new GlobalpingClient(options);
}
