import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  parseBooleanEnv,
  parseListEnv,
  parseTrustProxy,
  readEnumEnv,
  readNonNegativeIntEnv,
  readPositiveIntEnv,
} from './httpConfig';

describe('parseTrustProxy', () => {
  it('reads booleans, hop counts and address lists', () => {
    expect(parseTrustProxy(undefined)).toBe(false);
    expect(parseTrustProxy('  ')).toBe(false);
    expect(parseTrustProxy('TRUE')).toBe(true);
    expect(parseTrustProxy('false')).toBe(false);
    expect(parseTrustProxy('2')).toBe(2);
    expect(parseTrustProxy('loopback, 10.0.0.0/8')).toEqual(['loopback', '10.0.0.0/8']);
  });
});

describe('env readers', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('falls back on missing or invalid numbers', () => {
    vi.stubEnv('TEST_NUMBER', '-4');
    expect(readPositiveIntEnv('TEST_NUMBER', 7)).toBe(7);
    expect(readNonNegativeIntEnv('TEST_NUMBER', 7)).toBe(7);

    vi.stubEnv('TEST_NUMBER', '0');
    expect(readPositiveIntEnv('TEST_NUMBER', 7)).toBe(7);
    expect(readNonNegativeIntEnv('TEST_NUMBER', 7)).toBe(0);

    vi.stubEnv('TEST_NUMBER', '12.9');
    expect(readPositiveIntEnv('TEST_NUMBER', 7)).toBe(12);
  });

  it('reads booleans with a fallback', () => {
    vi.stubEnv('TEST_FLAG', 'True');
    expect(parseBooleanEnv('TEST_FLAG')).toBe(true);
    vi.stubEnv('TEST_FLAG', 'maybe');
    expect(parseBooleanEnv('TEST_FLAG', true)).toBe(true);
  });

  it('accepts only the allowed enum values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const allowed = ['merge', 'split'] as const;

    vi.stubEnv('TEST_ENUM', ' Split ');
    expect(readEnumEnv('TEST_ENUM', allowed, 'merge')).toBe('split');

    vi.stubEnv('TEST_ENUM', 'zigzag');
    expect(readEnumEnv('TEST_ENUM', allowed, 'merge')).toBe('merge');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('splits comma separated lists', () => {
    vi.stubEnv('TEST_LIST', 'https://a.example, ,https://b.example');
    expect(parseListEnv('TEST_LIST', ['*'])).toEqual(['https://a.example', 'https://b.example']);
    vi.stubEnv('TEST_LIST', ' , ');
    expect(parseListEnv('TEST_LIST', ['*'])).toEqual(['*']);
  });
});
