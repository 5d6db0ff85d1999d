/**
 * Per-kind value dispatch shared by the estimator and the enumeration engine.
 *
 * `countOptionValues` must always equal the length of what
 * `optionValues` produces for the same arguments.
 */

import type {
  EnumerableOption,
  RangeLikeOption,
  SelectionRestriction,
} from '../types/options.js';

export const TOGGLE_VALUES: readonly number[] = [0, 1];

/**
 * Round to the nearest integer, ties to even (2.5 → 2, 3.5 → 4).
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Split count for a range: the restriction when it is a number, the run's
 * default otherwise, clamped to the number of integer steps in the interval.
 */
export function effectiveSplits(
  option: RangeLikeOption,
  restriction: SelectionRestriction,
  defaultSplits: number
): number {
  const requested =
    typeof restriction === 'number' ? restriction : defaultSplits;
  return Math.min(requested, option.end - option.start);
}

/**
 * Sample points of `[start, end]`: `splits + 1` evenly spaced values, each
 * rounded, both endpoints included. A zero-width interval yields `start`.
 */
export function sampleRange(
  start: number,
  end: number,
  splits: number
): number[] {
  if (splits <= 0 || end <= start) return [start];
  const width = end - start;
  const points: number[] = [];
  for (let k = 0; k <= splits; k += 1) {
    points.push(roundHalfEven(start + (k * width) / splits));
  }
  return points;
}

function selectedChoiceCodes(
  option: Extract<EnumerableOption, { kind: 'choice' }>,
  restriction: SelectionRestriction
): number[] {
  if (restriction === 'all' || typeof restriction === 'number') {
    return option.choices.map((entry) => entry.code);
  }
  return option.choices
    .filter((entry) => restriction.includes(entry.label))
    .map((entry) => entry.code);
}

/**
 * Candidate values for one selected option, in enumeration order.
 */
export function optionValues(
  option: EnumerableOption,
  restriction: SelectionRestriction,
  defaultSplits: number
): number[] {
  switch (option.kind) {
    case 'toggle':
      return [...TOGGLE_VALUES];
    case 'choice':
      return selectedChoiceCodes(option, restriction);
    case 'range':
      return sampleRange(
        option.start,
        option.end,
        effectiveSplits(option, restriction, defaultSplits)
      );
    case 'named-range':
      return [
        ...sampleRange(
          option.start,
          option.end,
          effectiveSplits(option, restriction, defaultSplits)
        ),
        ...option.specials.map((special) => special.value),
      ];
    default: {
      const exhaustive: never = option;
      return exhaustive;
    }
  }
}

/**
 * Number of candidate values for one selected option, computed without
 * materialising them.
 */
export function countOptionValues(
  option: EnumerableOption,
  restriction: SelectionRestriction,
  defaultSplits: number
): number {
  switch (option.kind) {
    case 'toggle':
      return TOGGLE_VALUES.length;
    case 'choice':
      return selectedChoiceCodes(option, restriction).length;
    case 'range':
      return Math.max(effectiveSplits(option, restriction, defaultSplits), 0) + 1;
    case 'named-range':
      return (
        Math.max(effectiveSplits(option, restriction, defaultSplits), 0) +
        1 +
        option.specials.length
      );
    default: {
      const exhaustive: never = option;
      return exhaustive;
    }
  }
}
