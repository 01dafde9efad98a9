import type { HeaderOverrides, ResponseHeaders } from './types.js';

export const BROWSER_HEADERS: HeaderOverrides = {
  Accept: ['image/avif,image/webp,image/apng,image/svg+xml,image/*,*/*;q=0.8'],
  'Accept-Encoding': ['gzip, deflate, br'],
  'Accept-Language': ['zh-CN,zh;q=0.9'],
  Referer: ['https://weibo.com/'],
  'Sec-Ch-Ua': [
    '"Google Chrome";v="119", "Chromium";v="119", "Not?A_Brand";v="24"',
  ],
  'Sec-Ch-Ua-Mobile': ['?0'],
  'Sec-Ch-Ua-Platform': ['"Windows"'],
  'Sec-Fetch-Dest': ['image'],
  'Sec-Fetch-Mode': ['no-cors'],
  'Sec-Fetch-Site': ['cross-site'],
  'User-Agent': [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36',
  ],
};

function isRemoval(values: readonly string[]): boolean {
  const first = values.at(0);
  return first === undefined || first === '';
}

/**
 * Merges caller overrides into a baseline. Names compare case-insensitively;
 * the override's spelling wins when it replaces a baseline header.
 */
export function mergeHeaders(
  baseline: HeaderOverrides,
  overrides?: HeaderOverrides
): Record<string, string | string[]> {
  const merged = new Map<string, { name: string; values: readonly string[] }>();

  for (const [name, values] of Object.entries(baseline)) {
    merged.set(name.toLowerCase(), { name, values });
  }

  for (const [name, values] of Object.entries(overrides ?? {})) {
    const key = name.toLowerCase();
    if (isRemoval(values)) {
      merged.delete(key);
      continue;
    }
    merged.set(key, { name, values });
  }

  const result: Record<string, string | string[]> = {};
  for (const { name, values } of merged.values()) {
    if (values.length === 0) continue;
    result[name] = values.length === 1 ? (values[0] ?? '') : [...values];
  }
  return result;
}

export function buildRequestHeaders(
  overrides?: HeaderOverrides
): Record<string, string | string[]> {
  return mergeHeaders(BROWSER_HEADERS, overrides);
}

export function normalizeResponseHeaders(
  headers: Readonly<Record<string, string | string[] | undefined>>
): ResponseHeaders {
  const normalized: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    normalized[name.toLowerCase()] = value;
  }
  return normalized;
}

export function getHeader(
  headers: ResponseHeaders,
  name: string
): string | undefined {
  const value = headers[name.toLowerCase()];
  if (Array.isArray(value)) return value.join(', ');
  return value;
}

/**
 * Sets Host to the URL's authority. The request itself is addressed to an
 * edge IP, so any caller-supplied Host is replaced.
 */
export function withHostHeader(
  headers: Readonly<Record<string, string | string[]>>,
  host: string
): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() !== 'host') result[name] = value;
  }
  result.host = host;
  return result;
}
