import { setTimeout as delay } from 'node:timers/promises';

import { describe, expect, test } from 'vitest';

import {
  AttemptTimeoutError,
  ConnectionError,
} from '../../../src/errors/app-error.js';
import type {
  AttemptRequest,
  AttemptTransport,
  FetchResult,
  HttpReply,
} from '../../../src/services/fetcher/types.js';
import { startRace } from '../../../src/services/race.js';

const URL_A = 'https://img.test/large/a.jpg';

function reply(status: number, body = ''): HttpReply {
  return { status, headers: {}, body: Buffer.from(body) };
}

type Behaviour = (request: AttemptRequest, signal: AbortSignal) => Promise<HttpReply>;

function after(ms: number, outcome: () => HttpReply): Behaviour {
  return async (_request, signal) => {
    await delay(ms, undefined, { signal });
    return outcome();
  };
}

function stubTransport(behaviours: Record<string, Behaviour>): {
  transport: AttemptTransport;
  calls: string[];
} {
  const calls: string[] = [];
  const transport: AttemptTransport = async (request, signal) => {
    calls.push(request.ip);
    const behaviour = behaviours[request.ip];
    if (!behaviour) throw new Error(`No behaviour for ${request.ip}`);
    return behaviour(request, signal);
  };
  return { transport, calls };
}

async function drain(race: AsyncIterable<FetchResult>): Promise<FetchResult[]> {
  const results: FetchResult[] = [];
  for await (const result of race) results.push(result);
  return results;
}

describe('Race', () => {
  test('results arrive in completion order', async () => {
    const { transport } = stubTransport({
      '192.0.2.1': after(60, () => {
        throw new AttemptTimeoutError(50, '192.0.2.1', URL_A);
      }),
      '192.0.2.2': after(10, () => reply(200, 'PNGDATA')),
      '192.0.2.3': after(30, () => reply(403)),
    });
    const race = startRace(
      { imageUrl: URL_A, port: 443, candidateIps: ['192.0.2.1', '192.0.2.2', '192.0.2.3'] },
      { transport }
    );

    const first = await race.next();
    expect(first).toMatchObject({ ok: true, ip: '192.0.2.2', status: 200 });
    if (first?.ok) expect(first.body.toString()).toBe('PNGDATA');

    expect(await race.next()).toMatchObject({ ok: true, ip: '192.0.2.3', status: 403 });

    const third = await race.next();
    expect(third?.ok).toBe(false);
    if (third && !third.ok) {
      expect(third.error).toBeInstanceOf(AttemptTimeoutError);
    }

    await expect(race.next()).resolves.toBeUndefined();
  });

  test('delivers exactly one result per candidate when all fail', async () => {
    const refused = (): HttpReply => {
      throw Object.assign(new Error('connect refused'), { code: 'ECONNREFUSED' });
    };
    const { transport } = stubTransport({
      '192.0.2.1': after(5, refused),
      '192.0.2.2': after(1, refused),
      '192.0.2.3': after(3, refused),
    });
    const race = startRace(
      { imageUrl: URL_A, port: 443, candidateIps: ['192.0.2.1', '192.0.2.2', '192.0.2.3'] },
      { transport }
    );

    const results = await drain(race);

    expect(results.map((result) => result.ip)).toEqual([
      '192.0.2.2',
      '192.0.2.3',
      '192.0.2.1',
    ]);
    for (const result of results) {
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ConnectionError);
        expect(result.error).toMatchObject({ reason: 'refused' });
      }
    }
    expect(race.attempts.map((attempt) => attempt.status)).toEqual([
      'delivered',
      'delivered',
      'delivered',
    ]);
  });

  test('cancel aborts losers and drops their results', async () => {
    const seenSignals: AbortSignal[] = [];
    const { transport } = stubTransport({
      '192.0.2.1': async (_request, signal) => {
        seenSignals.push(signal);
        await delay(20);
        return reply(200, 'late');
      },
      '192.0.2.2': after(1, () => reply(200, 'winner')),
    });
    const race = startRace(
      { imageUrl: URL_A, port: 443, candidateIps: ['192.0.2.1', '192.0.2.2'] },
      { transport }
    );

    const winner = await race.next();
    race.cancel();
    await race.settled;

    expect(winner?.ip).toBe('192.0.2.2');
    expect(seenSignals[0]?.aborted).toBe(true);
    expect(race.cancelled).toBe(true);
    expect(race.attempts).toEqual([
      { ip: '192.0.2.1', status: 'dropped' },
      { ip: '192.0.2.2', status: 'delivered' },
    ]);
    await expect(race.next()).resolves.toBeUndefined();
  });

  test('cancel is idempotent, also after the race is exhausted', async () => {
    const { transport } = stubTransport({ '192.0.2.1': after(1, () => reply(200)) });
    const race = startRace(
      { imageUrl: URL_A, port: 443, candidateIps: ['192.0.2.1'] },
      { transport }
    );

    await drain(race);
    race.cancel();
    race.cancel();

    await expect(race.settled).resolves.toBeUndefined();
    await expect(race.next()).resolves.toBeUndefined();
  });

  test('an aborted parent signal skips every attempt', async () => {
    const parent = new AbortController();
    parent.abort();
    const { transport, calls } = stubTransport({ '192.0.2.1': after(1, () => reply(200)) });

    const race = startRace(
      { imageUrl: URL_A, port: 443, candidateIps: ['192.0.2.1'] },
      { transport, signal: parent.signal }
    );
    await race.settled;

    expect(calls).toEqual([]);
    expect(race.attempts).toEqual([{ ip: '192.0.2.1', status: 'skipped' }]);
    await expect(race.next()).resolves.toBeUndefined();
  });

  test('aborting the parent cancels a running race', async () => {
    const parent = new AbortController();
    const { transport } = stubTransport({
      '192.0.2.1': after(1000, () => reply(200)),
    });
    const race = startRace(
      { imageUrl: URL_A, port: 443, candidateIps: ['192.0.2.1'] },
      { transport, signal: parent.signal }
    );

    const pending = race.next();
    parent.abort();

    await expect(pending).resolves.toBeUndefined();
    await race.settled;
    expect(race.attempts[0]?.status).toBe('dropped');
  });

  test('an empty candidate list ends immediately', async () => {
    const race = startRace({ imageUrl: URL_A, port: 443, candidateIps: [] });

    await expect(race.next()).resolves.toBeUndefined();
    await expect(race.settled).resolves.toBeUndefined();
  });

  test('passes url, port and headers to the transport', async () => {
    const requests: AttemptRequest[] = [];
    const race = startRace(
      {
        imageUrl: URL_A,
        port: 8443,
        candidateIps: ['192.0.2.9'],
        extraHeaders: { 'X-Trace': ['abc'] },
      },
      {
        transport: async (request) => {
          requests.push(request);
          return reply(200);
        },
      }
    );

    await drain(race);

    expect(requests).toEqual([
      {
        ip: '192.0.2.9',
        port: 8443,
        url: URL_A,
        headers: { 'X-Trace': ['abc'] },
      },
    ]);
  });
});
