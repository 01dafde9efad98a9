import { loadConfig } from '../config/store.js';
import { ValidationError } from '../errors/app-error.js';
import { getHeader } from '../services/fetcher/headers.js';
import type { AttemptTransport } from '../services/fetcher/types.js';
import { huntAcrossVariants } from '../services/hunt.js';
import { logDebug } from '../services/logger.js';
import { imageSuccessPolicy } from '../services/success-policy.js';
import { defaultPortFor, parseImageUrl } from '../utils/image-url.js';
import {
  parseOutputPath,
  resolveOutputFilename,
  writeOutputFile,
} from '../utils/output-path.js';
import { generateQualityVariants } from '../utils/sinaimg.js';

export interface HuntCommandOptions {
  url: string;
  output: string;
  configPath: string;
  transport?: AttemptTransport;
  print?: (line: string) => void;
  cwd?: string;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface HuntCommandResult {
  readonly path: string;
  readonly url: string;
  readonly ip: string;
  readonly bytes: number;
}

function printToStdout(line: string): void {
  process.stdout.write(`${line}\n`);
}

function buildVariants(url: string): string[] {
  try {
    return generateQualityVariants(url);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    logDebug('No quality variants for URL, hunting it alone', { url });
    return [url];
  }
}

/**
 * Returns null when there are no cached edge IPs to hunt with.
 */
export async function runHunt(
  options: HuntCommandOptions
): Promise<HuntCommandResult | null> {
  const print = options.print ?? printToStdout;

  const output = await parseOutputPath(options.output, options.cwd);
  const { url, port, explicitPort } = parseImageUrl(options.url);

  const stored = await loadConfig(options.configPath);
  const candidateIps = stored.cache.resolves;
  if (candidateIps.length === 0) {
    print('No cached resolves found, please run `image-hound cache` first');
    return null;
  }
  print(`Using ${candidateIps.length} cached resolves.`);

  const variants = buildVariants(url.href);
  // Variants may switch scheme (http input, https tiers); an implicit port
  // follows the variants' scheme.
  const huntPort = explicitPort
    ? port
    : (defaultPortFor(variants[0] ?? url.href) ?? port);
  const total = variants.length * candidateIps.length;
  let attempted = 0;

  const success = await huntAcrossVariants(variants, huntPort, candidateIps, {
    transport: options.transport,
    isSuccess: imageSuccessPolicy,
    signal: options.signal,
    onVariantStart: ({ url: variant }) => {
      print(`Started hunting for ${variant}`);
    },
    onResult: (result) => {
      attempted += 1;
      logDebug('Attempt finished', { attempted, total, ip: result.ip });
      if (!result.ok) {
        print(`[FAILED] ${result.ip} | ${result.error.message}`);
      }
    },
    onVariantExhausted: ({ url: variant }) => {
      print(`[FAILED] All failed for ${variant}`);
    },
  });

  const { result } = success;
  print(`[SUCCESS] ${success.url} | ${result.ip} | ${result.body.length}`);

  const filename = resolveOutputFilename({
    filename: output.filename,
    urlPath: url.pathname,
    contentType: getHeader(result.headers, 'content-type'),
    body: result.body,
    now: options.now?.(),
  });
  const savedPath = await writeOutputFile(output.dir, filename, result.body);
  print(`Saved ${success.url} to ${savedPath}`);

  return {
    path: savedPath,
    url: success.url,
    ip: result.ip,
    bytes: result.body.length,
  };
}
