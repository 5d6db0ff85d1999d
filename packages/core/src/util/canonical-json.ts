import { Buffer } from 'node:buffer';

import type { OptionValue } from '../types/options.js';

/** Option values, and the entity and document records built from them. */
export type CanonicalValue = OptionValue | { [key: string]: CanonicalValue };

export interface CanonicalJSONResult {
  text: string;
  buffer: Buffer;
  byteLength: number;
}

function normalizeNumber(value: number): number {
  if (Object.is(value, -0)) return 0;
  return value;
}

function canonicalize(value: CanonicalValue): string {
  if (typeof value === 'number') {
    return JSON.stringify(normalizeNumber(value));
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalize).join(',')}]`;
  }

  const entries = Object.keys(value)
    .sort()
    .flatMap((key) => {
      const item = value[key];
      return item === undefined
        ? []
        : [`${JSON.stringify(key)}:${canonicalize(item)}`];
    });
  return `{${entries.join(',')}}`;
}

/**
 * Serialize a document with object keys sorted at every depth.
 * Array order is preserved.
 */
export function canonicalizeForHash(value: CanonicalValue): CanonicalJSONResult {
  const text = canonicalize(value);
  const buffer = Buffer.from(text, 'utf8');
  return {
    text,
    buffer,
    byteLength: buffer.byteLength,
  };
}
