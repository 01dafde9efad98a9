import { isIP } from 'node:net';

export type IpFamily = 4 | 6;

export function getIpFamily(value: string): IpFamily | null {
  const family = isIP(value);
  return family === 4 || family === 6 ? family : null;
}

/**
 * Canonical text form, so `2001:DB8::1` and `2001:db8:0::1` compare equal.
 * Returns null for anything that is not an IP literal.
 */
export function normalizeIp(value: string): string | null {
  const trimmed = value.trim();
  const family = getIpFamily(trimmed);
  if (family === null) return null;
  if (family === 4) return trimmed;
  try {
    return new URL(`http://[${trimmed}]/`).hostname.slice(1, -1);
  } catch {
    // zone-scoped addresses (fe80::1%eth0) are not valid URL hosts
    return trimmed.toLowerCase();
  }
}

/**
 * Drops unparseable entries and duplicates, keeping first-seen order.
 */
export function uniqueIps(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const normalized = normalizeIp(value);
    if (normalized !== null) seen.add(normalized);
  }
  return [...seen];
}
