import { Readable } from 'node:stream';
import { brotliCompressSync, deflateSync, gzipSync } from 'node:zlib';

import { describe, expect, test } from 'vitest';

import {
  parseContentEncodings,
  readResponseBody,
} from '../../../src/services/fetcher/response.js';

describe('parseContentEncodings', () => {
  test('returns the encodings to undo, outermost first', () => {
    expect(parseContentEncodings('gzip, br')).toEqual(['br', 'gzip']);
  });

  test('passes through identity, missing and unknown encodings', () => {
    expect(parseContentEncodings(undefined)).toBeNull();
    expect(parseContentEncodings('identity')).toBeNull();
    expect(parseContentEncodings('gzip, zstd')).toBeNull();
  });
});

describe('readResponseBody', () => {
  test('decodes brotli', async () => {
    const body = Readable.from([brotliCompressSync(Buffer.from('hello image'))]);

    const decoded = await readResponseBody(body, 'br');

    expect(decoded.toString()).toBe('hello image');
  });

  test('decodes stacked encodings', async () => {
    const encoded = brotliCompressSync(gzipSync(Buffer.from('layers')));

    const decoded = await readResponseBody(Readable.from([encoded]), 'gzip, br');

    expect(decoded.toString()).toBe('layers');
  });

  test('decodes deflate', async () => {
    const decoded = await readResponseBody(
      Readable.from([deflateSync(Buffer.from('zlib'))]),
      'deflate'
    );

    expect(decoded.toString()).toBe('zlib');
  });

  test('returns raw bytes without an encoding', async () => {
    const decoded = await readResponseBody(
      Readable.from([Buffer.from('ab'), Buffer.from('cd')]),
      undefined
    );

    expect(decoded.toString()).toBe('abcd');
  });

  test('rejects a corrupt compressed body', async () => {
    await expect(
      readResponseBody(Readable.from([Buffer.from('not gzip')]), 'gzip')
    ).rejects.toThrow();
  });
});
