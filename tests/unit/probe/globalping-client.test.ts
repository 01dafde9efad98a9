import { describe, expect, test } from 'vitest';

import {
  ProviderError,
  RateLimitError,
  ValidationError,
} from '../../../src/errors/app-error.js';
import { GlobalpingClient } from '../../../src/services/probe/globalping/client.js';

const BASE_URL = 'https://probe.test/v1';

interface RecordedRequest {
  readonly method: string;
  readonly url: string;
  readonly headers: Headers;
  readonly body: string | undefined;
}

type Handler = (request: RecordedRequest) => Response | Promise<Response>;

function json(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

function createClient(
  handlers: Handler[],
  options: { apiToken?: string; pollTimeoutMs?: number; pollIntervalMs?: number } = {}
): { client: GlobalpingClient; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const client = new GlobalpingClient({
    baseUrl: `${BASE_URL}/`,
    apiToken: options.apiToken,
    pollIntervalMs: options.pollIntervalMs ?? 0,
    pollTimeoutMs: options.pollTimeoutMs ?? 60000,
    probesPerRegion: 5,
    fetchFn: async (input, init) => {
      const request: RecordedRequest = {
        method: init?.method ?? 'GET',
        url: input,
        headers: new Headers(init?.headers),
        body: typeof init?.body === 'string' ? init.body : undefined,
      };
      requests.push(request);
      const handler = handlers.shift();
      if (!handler) throw new Error(`Unexpected request to ${input}`);
      return handler(request);
    },
  });
  return { client, requests };
}

describe('GlobalpingClient', () => {
  test('locations keeps distinct geographic regions', async () => {
    const { client, requests } = createClient([
      () =>
        json([
          { location: { region: 'Eastern Asia', country: 'JP' } },
          { location: { region: 'Western Europe' } },
          { location: { region: 'Eastern Asia' } },
          { location: { region: 'Atlantis' } },
          { location: {} },
        ]),
    ]);

    await expect(client.locations()).resolves.toEqual([
      'Eastern Asia',
      'Western Europe',
    ]);
    expect(requests[0]?.url).toBe(`${BASE_URL}/probes`);
  });

  test('resolve creates a ping measurement and polls it to completion', async () => {
    const { client, requests } = createClient(
      [
        () => json({ id: 'm1', probesCount: 3 }, 202),
        () => json({ id: 'm1', status: 'in-progress', results: [] }, 200, { etag: '"v1"' }),
        () => new Response(null, { status: 304 }),
        () =>
          json({
            id: 'm1',
            status: 'finished',
            results: [
              { result: { status: 'finished', resolvedAddress: '192.0.2.1' } },
              { result: { status: 'finished', resolvedAddress: '192.0.2.1' } },
              { result: { status: 'failed', resolvedAddress: null } },
              { result: { status: 'finished', resolvedAddress: '2001:DB8::1' } },
            ],
          }),
      ],
      { apiToken: 'test-token' }
    );

    const ips = await client.resolve('wx1.img.test', ['Eastern Asia', 'Northern Europe']);

    expect(ips).toEqual(['192.0.2.1', '2001:db8::1']);

    const [create, firstPoll, secondPoll] = requests;
    expect(create?.method).toBe('POST');
    expect(create?.url).toBe(`${BASE_URL}/measurements`);
    expect(create?.headers.get('authorization')).toBe('Bearer test-token');
    expect(create?.headers.get('content-type')).toBe('application/json');
    expect(JSON.parse(create?.body ?? '{}')).toEqual({
      type: 'ping',
      target: 'wx1.img.test',
      locations: [
        { region: 'Eastern Asia', limit: 5 },
        { region: 'Northern Europe', limit: 5 },
      ],
      measurementOptions: { packets: 1 },
    });
    expect(firstPoll?.url).toBe(`${BASE_URL}/measurements/m1`);
    expect(firstPoll?.headers.get('if-none-match')).toBeNull();
    expect(secondPoll?.headers.get('if-none-match')).toBe('"v1"');
  });

  test('keeps polling after a failed poll', async () => {
    const { client } = createClient([
      () => {
        throw new Error('socket hang up');
      },
      () => json({ status: 'finished', results: [] }),
    ]);

    await expect(client.getMeasurement('m2')).resolves.toEqual([]);
  });

  test('stops polling at the deadline', async () => {
    const { client } = createClient(
      [() => json({ status: 'in-progress' })],
      { pollIntervalMs: 20, pollTimeoutMs: 1 }
    );

    await expect(client.getMeasurement('m3')).rejects.toThrow(
      'Measurement m3 did not finish within 1ms'
    );
  });

  test('rejects an unknown measurement status', async () => {
    const { client } = createClient([() => json({ status: 'exploded' })]);

    await expect(client.getMeasurement('m4')).rejects.toThrow(
      'Invalid response: unknown status "exploded"'
    );
  });

  test('no probes is a provider error', async () => {
    const { client } = createClient([() => json({ id: 'm5', probesCount: 0 }, 202)]);

    await expect(client.createMeasurement('img.test', ['Eastern Asia'])).rejects.toThrow(
      'No probes available'
    );
  });

  test('validates its inputs before calling out', async () => {
    const { client, requests } = createClient([]);

    await expect(client.createMeasurement('', ['Eastern Asia'])).rejects.toBeInstanceOf(
      ValidationError
    );
    await expect(client.createMeasurement('img.test', [])).rejects.toThrow(
      'No regions specified'
    );
    expect(requests).toHaveLength(0);
  });

  test('429 becomes RateLimitError with the reset time', async () => {
    const { client } = createClient([
      () => json({}, 429, { 'x-ratelimit-reset': '42' }),
    ]);

    const error: unknown = await client.locations().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfter: 42, httpStatus: 429 });
  });

  test('400 lists the offending params', async () => {
    const { client } = createClient([
      () =>
        json(
          {
            error: {
              type: 'validation_error',
              message: 'Parameters validation failed.',
              params: { target: '"target" does not match any of the allowed types' },
            },
          },
          400
        ),
    ]);

    await expect(client.createMeasurement('bad host', ['Eastern Asia'])).rejects.toThrow(
      [
        'API returned error: (type "validation_error") Parameters validation failed.',
        'Error params:',
        '  - target: "target" does not match any of the allowed types',
      ].join('\n')
    );
  });

  test('other statuses are unexpected', async () => {
    const { client } = createClient([() => new Response('oops', { status: 503 })]);

    const error: unknown = await client.locations().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: 'Unexpected response (HTTP 503)',
      httpStatus: 503,
    });
  });

  test('network failures become provider errors', async () => {
    const { client } = createClient([
      () => {
        throw new TypeError('fetch failed');
      },
    ]);

    await expect(client.locations()).rejects.toThrow(
      'Failed to send request: fetch failed'
    );
  });
});
