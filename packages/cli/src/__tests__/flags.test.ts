import { describe, it, expect } from 'vitest';
import { ConfigError, ErrorCode } from '@hyperenum/core';

import {
  collect,
  resolveSplits,
  resolveThreshold,
  resolveVerbosity,
  splitList,
} from '../flags.js';

describe('collect', () => {
  it('accumulates repeated flag values', () => {
    expect(collect('a', undefined)).toEqual(['a']);
    expect(collect('b', ['a'])).toEqual(['a', 'b']);
  });
});

describe('splitList', () => {
  it('flattens comma lists and drops blanks', () => {
    expect(splitList(['a, b', ',c,'])).toEqual(['a', 'b', 'c']);
    expect(splitList(undefined)).toEqual([]);
  });
});

describe('numeric flags', () => {
  it('falls back to defaults when absent', () => {
    expect(resolveSplits(undefined)).toBe(2);
    expect(resolveVerbosity(undefined)).toBe(1);
    expect(resolveThreshold(undefined)).toBe(1000);
  });

  it('parses strings and numbers', () => {
    expect(resolveSplits('4')).toBe(4);
    expect(resolveSplits(3)).toBe(3);
    expect(resolveVerbosity(' 0 ')).toBe(0);
    expect(resolveThreshold('250')).toBe(250);
  });

  it('rejects splits below one with INVALID_SPLITS', () => {
    expect(() => resolveSplits('0')).toThrow(ConfigError);
    expect(() => resolveSplits('1.5')).toThrow(
      'Invalid --splits value "1.5". Expected an integer of at least 1.'
    );
    try {
      resolveSplits('zero');
    } catch (error) {
      expect(error instanceof ConfigError && error.errorCode).toBe(
        ErrorCode.INVALID_SPLITS
      );
    }
  });

  it('rejects negative verbosity and thresholds', () => {
    expect(() => resolveVerbosity('-1')).toThrow(/--verbose/);
    expect(() => resolveThreshold('lots')).toThrow(/--threshold/);
  });
});
