import { ValidationError } from '../../errors/app-error.js';

import {
  createGlobalpingClient,
  type GlobalpingClientOptions,
} from './globalping/client.js';
import type { ProbeProvider } from './provider.js';

export type { ProbeProvider } from './provider.js';

export interface ProviderSettings {
  globalping?: GlobalpingClientOptions;
}

const PROVIDERS = {
  globalping: (settings: ProviderSettings) =>
    createGlobalpingClient(settings.globalping),
} as const satisfies Record<string, (settings: ProviderSettings) => ProbeProvider>;

export type ProviderName = keyof typeof PROVIDERS;

export const PROVIDER_NAMES = Object.keys(PROVIDERS);

function isProviderName(value: string): value is ProviderName {
  return Object.hasOwn(PROVIDERS, value);
}

export function createProvider(
  name: string,
  settings: ProviderSettings = {}
): ProbeProvider {
  if (!isProviderName(name)) {
    throw new ValidationError(`Unknown provider: ${name}`, {
      available: PROVIDER_NAMES,
    });
  }
  return PROVIDERS[name](settings);
}
