import { type Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createBrotliDecompress, createGunzip, createInflate } from 'node:zlib';

type ContentEncoding = 'gzip' | 'deflate' | 'br';

type Decompressor =
  | ReturnType<typeof createGunzip>
  | ReturnType<typeof createInflate>
  | ReturnType<typeof createBrotliDecompress>;

function isSupportedContentEncoding(
  encoding: string
): encoding is ContentEncoding {
  return encoding === 'gzip' || encoding === 'deflate' || encoding === 'br';
}

/**
 * Returns the encodings to undo, outermost first, or null when the body must
 * pass through untouched (no header, identity only, or an encoding we do not
 * decode).
 */
export function parseContentEncodings(
  value: string | undefined
): ContentEncoding[] | null {
  if (!value) return null;

  const tokens = value
    .split(',')
    .map((token) => token.trim().toLowerCase())
    .filter((token) => token !== '' && token !== 'identity');
  if (tokens.length === 0) return null;
  if (!tokens.every(isSupportedContentEncoding)) return null;

  return tokens.filter(isSupportedContentEncoding).reverse();
}

function createDecompressor(encoding: ContentEncoding): Decompressor {
  switch (encoding) {
    case 'gzip':
      return createGunzip();
    case 'deflate':
      return createInflate();
    case 'br':
      return createBrotliDecompress();
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk));
}

function createCollector(chunks: Buffer[]): Writable {
  return new Writable({
    write(
      chunk: unknown,
      _encoding: BufferEncoding,
      callback: (error?: Error | null) => void
    ): void {
      chunks.push(toBuffer(chunk));
      callback();
    },
  });
}

/**
 * Reads a response body to the end, undoing its content encoding.
 */
export async function readResponseBody(
  body: Readable,
  contentEncoding: string | undefined,
  signal?: AbortSignal
): Promise<Buffer> {
  const encodings = parseContentEncodings(contentEncoding) ?? [];
  const chunks: Buffer[] = [];

  await pipeline(
    [body, ...encodings.map(createDecompressor), createCollector(chunks)],
    signal ? { signal } : {}
  );

  return Buffer.concat(chunks);
}
