import {
  COMMON_OPTIONS,
  isUnsupported,
  type OptionDescriptor,
  type Selection,
} from '../types/options.js';
import { countOptionValues } from './option-values.js';

/** Estimates above this ask for confirmation before enumerating. */
export const DEFAULT_CONFIRM_THRESHOLD = 1000;

export interface EstimateInput {
  options: readonly OptionDescriptor[];
  selection: Selection;
  ignored: ReadonlySet<string>;
  splits: number;
}

export interface EstimateFactor {
  option: string;
  factor: number;
}

export interface EstimateResult {
  total: number;
  factors: EstimateFactor[];
}

/**
 * Count of documents the enumeration engine will yield for this selection,
 * before deduplication, without materialising any of them.
 */
export function estimateBlastRadius(input: EstimateInput): EstimateResult {
  const factors: EstimateFactor[] = [];
  let total = 1;

  for (const option of input.options) {
    if (COMMON_OPTIONS.has(option.id)) continue;
    if (input.ignored.has(option.id)) continue;
    const restriction = input.selection.get(option.id);
    if (restriction === undefined) continue;
    if (isUnsupported(option)) continue;

    const factor = countOptionValues(option, restriction, input.splits);
    factors.push({ option: option.id, factor });
    total *= factor;
  }

  return { total, factors };
}

export function exceedsThreshold(
  estimate: number,
  threshold: number = DEFAULT_CONFIRM_THRESHOLD
): boolean {
  return estimate > threshold;
}
