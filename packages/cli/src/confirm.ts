import { createInterface } from 'node:readline/promises';
import type { ConfirmationGate, Logger } from '@hyperenum/core';

export const acceptAll: ConfirmationGate = async () => true;

export interface PromptGateOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Without a terminal there is nobody to ask; oversized expansions are declined. */
  interactive?: boolean;
  logger?: Logger;
}

export function isYes(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

/**
 * Ask on the terminal before writing an expansion above the threshold.
 */
export function createPromptGate(options: PromptGateOptions = {}): ConfirmationGate {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stderr;
  const interactive = options.interactive ?? Boolean(process.stdin.isTTY);

  return async ({ entity, estimate, threshold }) => {
    if (!interactive) {
      options.logger?.warn(
        `game ${entity}: ${estimate} documents exceed ${threshold} and no terminal is attached; pass --yes to write them`
      );
      return false;
    }
    const rl = createInterface({ input, output });
    try {
      const answer = await rl.question(
        `game ${entity}: about to write ${estimate} documents (threshold ${threshold}). Continue? [y/N] `
      );
      return isYes(answer);
    } finally {
      rl.close();
    }
  };
}
