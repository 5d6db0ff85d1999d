import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { createLogger } from '@hyperenum/core';

import { acceptAll, createPromptGate, isYes } from '../confirm.js';

const request = { entity: 'A', estimate: 5000, threshold: 1000 };

describe('isYes', () => {
  it('accepts y and yes in any case', () => {
    expect(isYes('y')).toBe(true);
    expect(isYes(' YES ')).toBe(true);
    expect(isYes('')).toBe(false);
    expect(isYes('nope')).toBe(false);
  });
});

describe('confirmation gates', () => {
  it('acceptAll always proceeds', async () => {
    await expect(acceptAll(request)).resolves.toBe(true);
  });

  it('declines without a terminal and says how to proceed', async () => {
    const lines: string[] = [];
    const logger = createLogger({
      verbosity: 0,
      sink: { write: (chunk: string) => lines.push(chunk) },
    });
    const gate = createPromptGate({ interactive: false, logger });

    await expect(gate(request)).resolves.toBe(false);
    expect(lines).toEqual([
      '[hyperenum] warning: game A: 5000 documents exceed 1000 and no terminal is attached; pass --yes to write them\n',
    ]);
  });

  it('reads the answer from the prompt', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const gate = createPromptGate({ input, output, interactive: true });

    const pending = gate(request);
    input.write('y\n');
    await expect(pending).resolves.toBe(true);

    const declined = gate(request);
    input.write('n\n');
    await expect(declined).resolves.toBe(false);

    expect(String(output.read())).toContain(
      'game A: about to write 5000 documents (threshold 1000). Continue? [y/N] '
    );
  });
});
