import { describe, expect, it } from 'vitest';
import { MAX_TIMEOUT, parsePort, parseTimeout } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('parsePort', () => {
  it('should accept integers and integer-like strings', () => {
    expect(parsePort(8069)).toBe(8069);
    expect(parsePort('8069')).toBe(8069);
    expect(parsePort(' 443 ')).toBe(443);
    expect(parsePort(0)).toBe(0);
    expect(parsePort('65535')).toBe(65535);
  });

  it('should reject values that are not integers', () => {
    for (const port of ['abc', '', '80.0', 80.5, -1, 65536, '-1', null, undefined, NaN]) {
      expect(() => parsePort(port)).toThrow(ConfigurationError);
    }
  });

  it('should name the invalid value', () => {
    expect(() => parsePort('abc')).toThrow("The port 'abc' is invalid. An integer is required.");
  });
});

describe('parseTimeout', () => {
  it('should accept positive seconds', () => {
    expect(parseTimeout(120)).toBe(120);
    expect(parseTimeout(0.5)).toBe(0.5);
  });

  it('should reject zero, negative and non-numeric values', () => {
    for (const timeout of [0, -5, NaN, Infinity, '10']) {
      expect(() => parseTimeout(timeout)).toThrow(ConfigurationError);
    }
  });

  it('should accept the longest timeout a timer can hold', () => {
    expect(parseTimeout(MAX_TIMEOUT)).toBe(2_147_483);
  });

  it('should reject a timeout longer than a timer can hold', () => {
    expect(() => parseTimeout(30 * 24 * 3600)).toThrow(
      "The timeout '2592000' is invalid. A positive number of seconds up to 2147483 is required."
    );
  });
});
