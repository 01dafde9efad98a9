import {
  AllVariantsExhaustedError,
  HuntAbortedError,
} from '../errors/app-error.js';

import type {
  AttemptResponse,
  AttemptTransport,
  FetchResult,
  HeaderOverrides,
} from './fetcher/types.js';
import { logDebug, logWarn } from './logger.js';
import { startRace } from './race.js';
import { isOkStatus, type SuccessPolicy } from './success-policy.js';

export interface VariantContext {
  readonly url: string;
  readonly variantIndex: number;
}

export interface HuntOptions {
  transport?: AttemptTransport;
  /** Defaults to "HTTP 200". */
  isSuccess?: SuccessPolicy;
  headers?: HeaderOverrides;
  signal?: AbortSignal;
  /** Called before each variant's race starts. */
  onVariantStart?: (context: VariantContext) => void;
  /** Called for every result read from a race, accepted or not. */
  onResult?: (result: FetchResult, context: VariantContext) => void;
  /** Called when a variant's race ends without an accepted response. */
  onVariantExhausted?: (context: VariantContext) => void;
}

export interface HuntSuccess extends VariantContext {
  readonly result: AttemptResponse;
}

function describeRejection(result: FetchResult): Record<string, unknown> {
  return result.ok
    ? { ip: result.ip, status: result.status, bytes: result.body.length }
    : { ip: result.ip, code: result.error.code, error: result.error.message };
}

/**
 * Races every candidate IP for each URL variant in turn and returns the first
 * accepted response. Rejects with AllVariantsExhaustedError when no variant
 * yields one.
 */
export async function huntAcrossVariants(
  variants: readonly string[],
  port: number,
  candidateIps: readonly string[],
  options: HuntOptions = {}
): Promise<HuntSuccess> {
  const isSuccess = options.isSuccess ?? isOkStatus;
  const { signal } = options;

  for (const [variantIndex, url] of variants.entries()) {
    if (signal?.aborted) throw new HuntAbortedError();

    const context: VariantContext = { url, variantIndex };
    options.onVariantStart?.(context);
    const race = startRace(
      { imageUrl: url, port, candidateIps, extraHeaders: options.headers },
      { transport: options.transport, signal }
    );

    try {
      for (;;) {
        const result = await race.next();
        if (result === undefined) break;

        options.onResult?.(result, context);
        if (result.ok && isSuccess(result)) {
          return { ...context, result };
        }
        logDebug('Attempt did not qualify', {
          url,
          ...describeRejection(result),
        });
      }
    } finally {
      race.cancel();
    }

    if (signal?.aborted) throw new HuntAbortedError();

    logWarn('All attempts failed for variant', {
      url,
      candidates: candidateIps.length,
    });
    options.onVariantExhausted?.(context);
  }

  throw new AllVariantsExhaustedError(variants.length, candidateIps.length);
}
