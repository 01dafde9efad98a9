import { parseArgs } from 'node:util';

import { runCache } from './commands/cache.js';
import { runHunt } from './commands/hunt.js';
import { config } from './config/index.js';
import { AppError } from './errors/app-error.js';
import { logError } from './services/logger.js';
import { getErrorMessage } from './utils/error-utils.js';

export type CliCommand =
  | {
      readonly kind: 'hunt';
      readonly url: string;
      readonly output: string;
      readonly configPath: string;
    }
  | {
      readonly kind: 'cache';
      readonly provider: string;
      readonly force: boolean;
      readonly configPath: string;
    }
  | { readonly kind: 'help' }
  | { readonly kind: 'version' };

interface CliParseSuccess {
  readonly ok: true;
  readonly command: CliCommand;
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

type CliParseResult = CliParseSuccess | CliParseFailure;

const usageLines = [
  'Hunt for an unfiltered copy of a CDN-hosted image by requesting it from',
  'edge servers resolved across the world.',
  '',
  'Usage:',
  '  image-hound hunt <url> [--output|-o <path>] [--config <path>]',
  '  image-hound cache [--provider|-p <name>] [--force|-f] [--config <path>]',
  '',
  'Options:',
  '  --output, -o    Output file or directory (default: current directory).',
  '  --provider, -p  Probe provider used to resolve edges (default: globalping).',
  '  --force, -f     Refetch locations and replace cached resolves.',
  '  --config        Config file (default: ~/.image-hound.json).',
  '  --help, -h      Show this help message.',
  '  --version, -v   Show version.',
  '',
  'Example:',
  '  image-hound hunt https://wx1.sinaimg.cn/mw690/006UeiBSgy1hjnwewgeclj30u01400xm.jpg',
  '',
] as const;

const optionSchema = {
  output: { type: 'string', short: 'o' },
  provider: { type: 'string', short: 'p' },
  force: { type: 'boolean', short: 'f' },
  config: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
} as const;

function readString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value !== '' ? value : fallback;
}

function readBoolean(value: unknown): boolean {
  return value === true;
}

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

function parseRawArgs(args: readonly string[]) {
  return parseArgs({
    args: [...args],
    options: optionSchema,
    strict: true,
    allowPositionals: true,
  });
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  let parsed: ReturnType<typeof parseRawArgs>;
  try {
    parsed = parseRawArgs(args);
  } catch (error: unknown) {
    return { ok: false, message: getErrorMessage(error) };
  }

  const { values, positionals } = parsed;
  if (readBoolean(values.help)) return { ok: true, command: { kind: 'help' } };
  if (readBoolean(values.version)) {
    return { ok: true, command: { kind: 'version' } };
  }

  const [name, ...rest] = positionals;
  const configPath = readString(values.config, config.storage.configPath);

  switch (name) {
    case 'hunt': {
      const [url, ...extra] = rest;
      if (!url) return { ok: false, message: 'hunt requires an image URL' };
      if (extra.length > 0) {
        return { ok: false, message: `Unexpected argument: ${extra.join(' ')}` };
      }
      return {
        ok: true,
        command: {
          kind: 'hunt',
          url,
          output: readString(values.output, '.'),
          configPath,
        },
      };
    }
    case 'cache':
      if (rest.length > 0) {
        return { ok: false, message: `Unexpected argument: ${rest.join(' ')}` };
      }
      return {
        ok: true,
        command: {
          kind: 'cache',
          provider: readString(values.provider, 'globalping'),
          force: readBoolean(values.force),
          configPath,
        },
      };
    case undefined:
      return { ok: true, command: { kind: 'help' } };
    default:
      return { ok: false, message: `Unknown command: ${name}` };
  }
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Runs one CLI invocation and returns its exit code.
 */
export async function runCli(
  args: readonly string[],
  signal?: AbortSignal,
  io: CliIo = processIo
): Promise<number> {
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    io.stderr(`${parsed.message}\n\n${renderCliUsage()}`);
    return 1;
  }

  const print = (line: string): void => {
    io.stdout(`${line}\n`);
  };
  const { command } = parsed;

  try {
    switch (command.kind) {
      case 'help':
        io.stdout(renderCliUsage());
        return 0;
      case 'version':
        io.stdout(`${config.app.version}\n`);
        return 0;
      case 'hunt': {
        const result = await runHunt({
          url: command.url,
          output: command.output,
          configPath: command.configPath,
          print,
          signal,
        });
        return result ? 0 : 1;
      }
      case 'cache':
        await runCache({
          provider: command.provider,
          force: command.force,
          configPath: command.configPath,
          print,
          signal,
        });
        return 0;
    }
  } catch (error: unknown) {
    const label = error instanceof AppError ? `[${error.code}] ` : '';
    if (!(error instanceof AppError && error.isOperational)) {
      logError(
        'Command failed',
        error instanceof Error ? error : { error: String(error) }
      );
    }
    io.stderr(`${label}${getErrorMessage(error)}\n`);
    return 1;
  }
}
