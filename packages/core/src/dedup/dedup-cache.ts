import { createHash } from 'node:crypto';
import { canonicalizeForHash } from '../util/canonical-json.js';
import type { ConfigDocument } from '../types/options.js';

export interface DocumentFingerprint {
  digest: string;
  canonical: string;
}

/**
 * Order-independent fingerprint of a document: sha256 over its canonical JSON.
 */
export function fingerprintDocument(
  document: ConfigDocument
): DocumentFingerprint {
  const canonical = canonicalizeForHash(document);
  const digest = createHash('sha256').update(canonical.buffer).digest('hex');
  return { digest, canonical: canonical.text };
}

/**
 * Caller-held set of fingerprints suppressing structurally identical
 * documents. Rounded range steps and special values that fall inside the
 * sampled interval are the usual source of repeats.
 */
export class DedupCache {
  readonly #seen = new Set<string>();
  #rejected = 0;

  /**
   * Record the document and return true the first time its fingerprint is
   * seen; return false for every later repeat.
   */
  admit(document: ConfigDocument): boolean {
    const { digest } = fingerprintDocument(document);
    if (this.#seen.has(digest)) {
      this.#rejected += 1;
      return false;
    }
    this.#seen.add(digest);
    return true;
  }

  has(document: ConfigDocument): boolean {
    return this.#seen.has(fingerprintDocument(document).digest);
  }

  /** Distinct documents admitted so far */
  get size(): number {
    return this.#seen.size;
  }

  /** Repeats turned away so far */
  get rejected(): number {
    return this.#rejected;
  }

  clear(): void {
    this.#seen.clear();
    this.#rejected = 0;
  }
}
