import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { ConfigError } from '../errors/app-error.js';
import { isSystemError } from '../utils/error-utils.js';
import { getIpFamily } from '../utils/ip-address.js';

const ipSchema = z
  .string()
  .refine((value) => getIpFamily(value) !== null, 'Invalid IP address');

const storedConfigSchema = z.object({
  providers: z
    .object({
      globalping: z
        .object({ apiToken: z.string().min(1).optional() })
        .default({}),
    })
    .default({}),
  cache: z
    .object({
      locations: z.array(z.string()).default([]),
      resolves: z.array(ipSchema).default([]),
    })
    .default({}),
});

export type StoredConfig = z.infer<typeof storedConfigSchema>;

export function createEmptyConfig(): StoredConfig {
  return storedConfigSchema.parse({});
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export async function loadConfig(filePath: string): Promise<StoredConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isSystemError(error) && error.code === 'ENOENT') {
      return createEmptyConfig();
    }
    throw new ConfigError(`Failed to read config file ${filePath}`, filePath, {
      cause: error,
    });
  }

  if (!raw.trim()) return createEmptyConfig();

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file ${filePath}`, filePath, {
      cause: error,
    });
  }

  const result = storedConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file ${filePath}: ${formatIssues(result.error)}`,
      filePath
    );
  }
  return result.data;
}

export async function saveConfig(
  filePath: string,
  value: StoredConfig
): Promise<void> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
  } catch (error) {
    throw new ConfigError(`Failed to write config file ${filePath}`, filePath, {
      cause: error,
    });
  }
}
