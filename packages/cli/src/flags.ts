import {
  ConfigError,
  DEFAULT_CONFIRM_THRESHOLD,
  DEFAULT_SPLITS,
  ErrorCode,
} from '@hyperenum/core';

/**
 * CLI options interface matching Commander.js option structure.
 * Repeatable flags arrive as arrays, numeric flags as raw strings.
 */
export interface CliOptions {
  schema?: string;
  configFile?: string;
  dir?: string;
  game?: string[];
  options?: string[];
  others?: string[];
  ignore?: string[];
  splits?: string;
  verbose?: string;
  threshold?: string;
  yes?: boolean;
  printConfig?: boolean;
}

export const DEFAULT_VERBOSITY = 1;
export const DEFAULT_OUTPUT_DIR = '.';

/** Commander accumulator for repeatable flags. */
export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

/** Flatten repeated comma lists, dropping blanks. */
export function splitList(values: readonly string[] | undefined): string[] {
  if (!values) return [];
  return values
    .flatMap((value) => value.split(','))
    .map((part) => part.trim())
    .filter(Boolean);
}

function parseInteger(
  flag: string,
  raw: string | number,
  min: number,
  errorCode: ErrorCode
): number {
  const value = typeof raw === 'number' ? raw : Number(String(raw).trim());
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError({
      message: `Invalid ${flag} value "${String(raw)}". Expected an integer of at least ${min}.`,
      errorCode,
      context: { value: raw },
    });
  }
  return value;
}

export function resolveSplits(raw: string | number | undefined): number {
  if (raw === undefined) return DEFAULT_SPLITS;
  return parseInteger('--splits', raw, 1, ErrorCode.INVALID_SPLITS);
}

export function resolveVerbosity(raw: string | number | undefined): number {
  if (raw === undefined) return DEFAULT_VERBOSITY;
  return parseInteger('--verbose', raw, 0, ErrorCode.CONFIGURATION_ERROR);
}

export function resolveThreshold(raw: string | number | undefined): number {
  if (raw === undefined) return DEFAULT_CONFIRM_THRESHOLD;
  return parseInteger('--threshold', raw, 0, ErrorCode.CONFIGURATION_ERROR);
}
