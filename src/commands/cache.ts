import { config } from '../config/index.js';
import { loadConfig, saveConfig } from '../config/store.js';
import { AppError, ProviderError } from '../errors/app-error.js';
import { logInfo, logWarn } from '../services/logger.js';
import { createProvider, type ProbeProvider } from '../services/probe/index.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { uniqueIps } from '../utils/ip-address.js';
import { imageHostnames } from '../utils/sinaimg.js';
import { mapSettled } from '../utils/worker-pool.js';

export interface CacheCommandOptions {
  provider: string;
  /** Refetch locations and replace cached resolves instead of merging. */
  force: boolean;
  configPath: string;
  /** Overrides the provider looked up by name. */
  probeProvider?: ProbeProvider;
  hostnames?: readonly string[];
  concurrency?: number;
  print?: (line: string) => void;
  signal?: AbortSignal;
}

function printToStdout(line: string): void {
  process.stdout.write(`${line}\n`);
}

async function loadLocations(
  provider: ProbeProvider,
  cached: readonly string[],
  force: boolean,
  signal?: AbortSignal
): Promise<string[]> {
  if (!force && cached.length > 0) return [...new Set(cached)];

  const locations = [...new Set(await provider.locations(signal))];
  if (locations.length === 0) {
    throw new ProviderError(`No locations available from ${provider.name}`);
  }
  return locations;
}

/**
 * Resolves every image hostname from every location and stores the edge IPs.
 * Returns the number of cached resolves.
 */
export async function runCache(options: CacheCommandOptions): Promise<number> {
  const print = options.print ?? printToStdout;
  const stored = await loadConfig(options.configPath);
  const provider =
    options.probeProvider ??
    createProvider(options.provider, {
      globalping: { apiToken: stored.providers.globalping.apiToken },
    });

  const locations = await loadLocations(
    provider,
    stored.cache.locations,
    options.force,
    options.signal
  );
  print(`Using ${locations.length} locations.`);

  const hostnames = options.hostnames ?? imageHostnames();
  const settled = await mapSettled(
    hostnames,
    async (hostname) => provider.resolve(hostname, locations, options.signal),
    {
      concurrency: options.concurrency ?? config.cache.concurrency,
      signal: options.signal,
      onSettled: ({ item: hostname, outcome }, completed, total) => {
        if (outcome.status === 'rejected') {
          logWarn(`Failed to resolve "${hostname}"`, {
            error: getErrorMessage(outcome.reason),
          });
          return;
        }
        logInfo(`Resolved ${hostname} (${completed}/${total})`, {
          addresses: outcome.value.length,
        });
      },
    }
  );
  // An interrupted run keeps the cache as it was.
  if (options.signal?.aborted) {
    throw new AppError('Cache run was canceled', 'CACHE_ABORTED');
  }

  const resolved = settled.flatMap(({ outcome }) =>
    outcome.status === 'fulfilled' ? outcome.value : []
  );

  const previous = options.force ? [] : stored.cache.resolves;
  const resolves = uniqueIps([...previous, ...resolved]);
  await saveConfig(options.configPath, {
    ...stored,
    cache: { locations, resolves },
  });
  print(`Cached ${resolves.length} resolves.`);
  return resolves.length;
}
