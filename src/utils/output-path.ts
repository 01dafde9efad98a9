import type { Stats } from 'node:fs';
import { stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ValidationError } from '../errors/app-error.js';
import { isSystemError } from './error-utils.js';

export interface OutputTarget {
  readonly dir: string;
  /** null when the caller pointed at a directory and the name is derived. */
  readonly filename: string | null;
}

const EXTENSIONS_BY_MIME: Readonly<Record<string, string>> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
  'image/avif': '.avif',
  'image/bmp': '.bmp',
  'image/svg+xml': '.svg',
  'image/tiff': '.tiff',
  'image/x-icon': '.ico',
  'application/octet-stream': '.bin',
};

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await stat(target);
  } catch (error) {
    if (isSystemError(error) && error.code === 'ENOENT') return null;
    throw error;
  }
}

export async function parseOutputPath(
  output: string,
  cwd: string = process.cwd()
): Promise<OutputTarget> {
  const target = path.resolve(cwd, output);

  const targetStats = await statOrNull(target);
  if (targetStats?.isDirectory()) {
    return { dir: target, filename: null };
  }
  if (/[\\/]$/.test(output)) {
    throw new ValidationError(`Directory does not exist: ${target}`);
  }

  const dir = path.dirname(target);
  const dirStats = await statOrNull(dir);
  if (!dirStats?.isDirectory()) {
    throw new ValidationError(`Directory does not exist: ${dir}`);
  }

  return { dir, filename: path.basename(target) };
}

function startsWith(body: Buffer, bytes: readonly number[], offset = 0): boolean {
  return bytes.every((byte, index) => body[offset + index] === byte);
}

/**
 * Content type from magic bytes, for responses that omit the header.
 */
export function sniffImageType(body: Buffer): string {
  if (startsWith(body, [0xff, 0xd8, 0xff])) return 'image/jpeg';
  if (startsWith(body, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) {
    return 'image/png';
  }
  const head = body.subarray(0, 12).toString('latin1');
  if (head.startsWith('GIF87a') || head.startsWith('GIF89a')) return 'image/gif';
  if (head.startsWith('RIFF') && head.slice(8, 12) === 'WEBP') return 'image/webp';
  if (head.startsWith('BM')) return 'image/bmp';
  return 'application/octet-stream';
}

export function extensionForType(contentType: string): string {
  const mime = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return EXTENSIONS_BY_MIME[mime] ?? '.bin';
}

export interface FilenameInput {
  readonly filename: string | null;
  readonly urlPath: string;
  readonly contentType?: string;
  readonly body: Buffer;
  readonly now?: Date;
}

/**
 * Name for the saved image: the explicit name, else the URL's last path
 * segment, with an extension appended when the segment has none.
 */
export function resolveOutputFilename(input: FilenameInput): string {
  if (input.filename) return input.filename;

  let name = input.urlPath.slice(input.urlPath.lastIndexOf('/') + 1);
  if (name.includes('.')) return name;

  const contentType = input.contentType || sniffImageType(input.body);
  if (!name) {
    name = String(Math.floor((input.now ?? new Date()).getTime() / 1000));
  }
  return name + extensionForType(contentType);
}

export async function writeOutputFile(
  dir: string,
  filename: string,
  body: Buffer
): Promise<string> {
  const target = path.join(dir, filename);
  await writeFile(target, body, { mode: 0o644 });
  return target;
}
