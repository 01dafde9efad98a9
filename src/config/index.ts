import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import path from 'node:path';

import { z } from 'zod';

import {
  parseBoolean,
  parseInteger,
  parseLogLevel,
  parseOptionalString,
} from './env-parsers.js';

const packageJsonSchema = z.object({ version: z.string() });

function readPackageVersion(): string {
  try {
    const raw = readFileSync(
      new URL('../../package.json', import.meta.url),
      'utf8'
    );
    return packageJsonSchema.parse(JSON.parse(raw)).version;
  } catch {
    return '0.0.0';
  }
}

const TIMEOUT = {
  REQUEST_MS: 10000,
  CLIENT_MS: 15000,
  PROBE_REQUEST_MS: 15000,
  PROBE_POLL_INTERVAL_MS: 5000,
  PROBE_POLL_TIMEOUT_MS: 60000,
} as const;

const requestTimeoutMs = parseInteger(
  process.env.HOUND_REQUEST_TIMEOUT_MS,
  TIMEOUT.REQUEST_MS,
  100,
  120000
);

// The client backstop must stay above the per-attempt timeout.
const clientTimeoutMs = Math.max(
  parseInteger(
    process.env.HOUND_CLIENT_TIMEOUT_MS,
    TIMEOUT.CLIENT_MS,
    100,
    180000
  ),
  requestTimeoutMs + 1000
);

export const config = {
  app: {
    name: 'image-hound',
    version: readPackageVersion(),
  },
  fetcher: {
    requestTimeoutMs,
    clientTimeoutMs,
  },
  probe: {
    baseUrl: 'https://api.globalping.io/v1',
    requestTimeoutMs: TIMEOUT.PROBE_REQUEST_MS,
    pollIntervalMs: parseInteger(
      process.env.HOUND_PROBE_POLL_INTERVAL_MS,
      TIMEOUT.PROBE_POLL_INTERVAL_MS,
      0,
      60000
    ),
    pollTimeoutMs: parseInteger(
      process.env.HOUND_PROBE_POLL_TIMEOUT_MS,
      TIMEOUT.PROBE_POLL_TIMEOUT_MS,
      1000,
      600000
    ),
    probesPerRegion: 5,
    userAgent: 'image-hound/1.0',
  },
  cache: {
    concurrency: parseInteger(process.env.HOUND_CACHE_CONCURRENCY, 8, 1, 32),
  },
  storage: {
    configPath:
      parseOptionalString(process.env.HOUND_CONFIG) ??
      path.join(homedir(), '.image-hound.json'),
  },
  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
    enabled: parseBoolean(process.env.HOUND_LOG_ENABLED, true),
    file: parseOptionalString(process.env.HOUND_LOG_FILE),
  },
};
