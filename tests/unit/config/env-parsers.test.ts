import { describe, expect, test } from 'vitest';

import {
  parseBoolean,
  parseInteger,
  parseLogLevel,
  parseOptionalString,
} from '../../../src/config/env-parsers.js';

describe('env-parsers', () => {
  test('parseInteger clamps and falls back', () => {
    expect(parseInteger(undefined, 10)).toBe(10);
    expect(parseInteger('abc', 10)).toBe(10);
    expect(parseInteger('42', 10)).toBe(42);
    expect(parseInteger('5', 10, 100)).toBe(100);
    expect(parseInteger('500', 10, 1, 200)).toBe(200);
  });

  test('parseBoolean', () => {
    expect(parseBoolean('YES', false)).toBe(true);
    expect(parseBoolean('off', true)).toBe(false);
    expect(parseBoolean('maybe', true)).toBe(true);
    expect(parseBoolean(undefined, false)).toBe(false);
  });

  test('parseLogLevel defaults to info', () => {
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined)).toBe('info');
  });

  test('parseOptionalString drops blank values', () => {
    expect(parseOptionalString('  ')).toBeUndefined();
    expect(parseOptionalString(' /tmp/x.json ')).toBe('/tmp/x.json');
  });
});
