import { config } from '../config/index.js';
import { ResultChannel } from '../utils/result-channel.js';

import { fetchFromIp } from './fetcher.js';
import { mapAttemptError } from './fetcher/errors.js';
import type {
  AttemptTransport,
  FetchResult,
  FetchTarget,
} from './fetcher/types.js';
import { logDebug } from './logger.js';

/**
 * - `pending`: request in flight
 * - `skipped`: race was cancelled before the request started
 * - `delivered`: result deposited in the race's stream
 * - `dropped`: finished after cancellation, result discarded
 */
export type AttemptStatus = 'pending' | 'skipped' | 'delivered' | 'dropped';

export interface AttemptState {
  readonly ip: string;
  readonly status: AttemptStatus;
}

export interface RaceOptions {
  /** Defaults to a direct-IP request through undici. */
  transport?: AttemptTransport;
  /** Cancels the race when aborted. */
  signal?: AbortSignal;
}

const directTransport: AttemptTransport = (request, signal) =>
  fetchFromIp(request, signal);

/**
 * One concurrent fetch of a single URL against every candidate IP. Results
 * arrive in completion order; judging them is up to the consumer, who cancels
 * the race once it has what it needs.
 */
export class Race implements AsyncIterable<FetchResult> {
  readonly size: number;
  /** Resolves once every attempt task has finished. Never rejects. */
  readonly settled: Promise<void>;

  private readonly controller = new AbortController();
  private readonly channel: ResultChannel<FetchResult>;
  private readonly statuses: AttemptStatus[];
  private readonly transport: AttemptTransport;
  private consumed = 0;
  private detachParent: () => void = () => undefined;

  constructor(
    private readonly target: FetchTarget,
    options: RaceOptions = {}
  ) {
    this.size = target.candidateIps.length;
    this.transport = options.transport ?? directTransport;
    this.channel = new ResultChannel<FetchResult>(this.size);
    this.statuses = target.candidateIps.map((): AttemptStatus => 'pending');
    this.attachParent(options.signal);

    this.settled = Promise.all(
      target.candidateIps.map(async (ip, index) => this.runAttempt(ip, index))
    ).then(() => undefined);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get attempts(): readonly AttemptState[] {
    return this.target.candidateIps.map((ip, index) => ({
      ip,
      status: this.statuses[index] ?? 'pending',
    }));
  }

  /**
   * Next result in arrival order, or `undefined` once every candidate has
   * reported or the race was cancelled.
   */
  async next(): Promise<FetchResult | undefined> {
    if (this.consumed >= this.size) return undefined;

    const result = await this.channel.take();
    if (result === undefined) return undefined;

    this.consumed += 1;
    if (this.consumed >= this.size) this.detachParent();
    return result;
  }

  /**
   * Aborts in-flight attempts and discards undelivered results. Safe to call
   * any number of times, including after the race is exhausted.
   */
  cancel(): void {
    this.detachParent();
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
    this.channel.close();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<FetchResult, void, undefined> {
    try {
      for (;;) {
        const result = await this.next();
        if (result === undefined) return;
        yield result;
      }
    } finally {
      this.cancel();
    }
  }

  private attachParent(signal: AbortSignal | undefined): void {
    if (!signal) return;
    if (signal.aborted) {
      this.cancel();
      return;
    }

    const onAbort = (): void => {
      this.cancel();
    };
    signal.addEventListener('abort', onAbort, { once: true });
    this.detachParent = () => {
      signal.removeEventListener('abort', onAbort);
      this.detachParent = () => undefined;
    };
  }

  private async runAttempt(ip: string, index: number): Promise<void> {
    const { signal } = this.controller;
    if (signal.aborted) {
      this.statuses[index] = 'skipped';
      return;
    }

    const { imageUrl, port, extraHeaders } = this.target;
    let result: FetchResult;
    try {
      const reply = await this.transport(
        { ip, port, url: imageUrl, headers: extraHeaders },
        signal
      );
      result = {
        ok: true,
        ip,
        status: reply.status,
        headers: reply.headers,
        body: reply.body,
      };
    } catch (error) {
      result = {
        ok: false,
        ip,
        error: mapAttemptError(error, {
          ip,
          url: imageUrl,
          stage: 'request',
          timeoutMs: config.fetcher.requestTimeoutMs,
          cancelSignal: signal,
        }),
      };
    }

    if (signal.aborted || !this.channel.push(result)) {
      this.statuses[index] = 'dropped';
      logDebug('Dropped attempt result after cancellation', { ip });
      return;
    }
    this.statuses[index] = 'delivered';
  }
}

export function startRace(target: FetchTarget, options?: RaceOptions): Race {
  return new Race(target, options);
}
