import { getHeader } from './fetcher/headers.js';
import type { AttemptResponse } from './fetcher/types.js';

/**
 * Decides whether a well-formed response is the unfiltered image. Transport
 * failures never reach a policy.
 */
export type SuccessPolicy = (response: AttemptResponse) => boolean;

export const isOkStatus: SuccessPolicy = (response) => response.status === 200;

export const hasBody: SuccessPolicy = (response) => response.body.length > 0;

// Filtered edges answer 200 with an HTML notice instead of the image.
export const isNotHtml: SuccessPolicy = (response) => {
  const contentType = getHeader(response.headers, 'content-type');
  return !contentType?.toLowerCase().includes('text/html');
};

export function allOf(...policies: readonly SuccessPolicy[]): SuccessPolicy {
  return (response) => policies.every((policy) => policy(response));
}

export const imageSuccessPolicy: SuccessPolicy = allOf(
  isOkStatus,
  hasBody,
  isNotHtml
);
