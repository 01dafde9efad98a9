import { ValidationError } from '../errors/app-error.js';

export interface ParsedImageUrl {
  readonly url: URL;
  /** Explicit port, or the scheme's default. */
  readonly port: number;
  readonly explicitPort: boolean;
}

const DEFAULT_PORTS: Readonly<Record<string, number>> = {
  'https:': 443,
  'http:': 80,
};

/**
 * Parses an image URL as pasted by a user. Protocol-relative URLs
 * (`//host/path`) are taken as https.
 */
export function parseImageUrl(input: string): ParsedImageUrl {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new ValidationError('Image URL is empty');
  }

  const candidate = trimmed.startsWith('//') ? `https:${trimmed}` : trimmed;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    throw new ValidationError(`Invalid image URL: ${input}`, { url: input });
  }

  const defaultPort = DEFAULT_PORTS[url.protocol];
  if (defaultPort === undefined) {
    throw new ValidationError(
      `Unsupported scheme: ${url.protocol.replace(/:$/, '')}`,
      { url: input }
    );
  }

  // WHATWG URL already rejects ports above 65535.
  const port = url.port ? Number(url.port) : defaultPort;
  if (port < 1) {
    throw new ValidationError(`Invalid port "${url.port}"`, { url: input });
  }

  return { url, port, explicitPort: url.port !== '' };
}

/**
 * Default port for an absolute URL's scheme, or undefined for schemes other
 * than http and https.
 */
export function defaultPortFor(url: string): number | undefined {
  try {
    return DEFAULT_PORTS[new URL(url).protocol];
  } catch {
    return undefined;
  }
}
