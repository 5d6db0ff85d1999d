import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import {
  countOptionValues,
  effectiveSplits,
  optionValues,
  roundHalfEven,
  sampleRange,
} from '../option-values.js';
import type { EnumerableOption, RangeOption } from '../../types/options.js';

const range = (start: number, end: number): RangeOption => ({
  id: 'R',
  kind: 'range',
  default: start,
  start,
  end,
});

describe('roundHalfEven', () => {
  it('rounds to the nearest integer', () => {
    expect(roundHalfEven(1.333)).toBe(1);
    expect(roundHalfEven(2.667)).toBe(3);
    expect(roundHalfEven(-1.6)).toBe(-2);
  });

  it('breaks ties towards the even neighbour', () => {
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(-2.5)).toBe(-2);
    expect(roundHalfEven(0.5)).toBe(0);
  });
});

describe('sampleRange', () => {
  it('samples [0, 4] into four points with three splits', () => {
    expect(sampleRange(0, 4, 3)).toEqual([0, 1, 3, 4]);
  });

  it('includes both endpoints of [0, 10] with two splits', () => {
    const points = sampleRange(0, 10, 2);
    expect(points).toEqual([0, 5, 10]);
    expect(points).toContain(0);
    expect(points).toContain(10);
  });

  it('returns the start of a zero-width interval', () => {
    expect(sampleRange(7, 7, 0)).toEqual([7]);
  });

  it('keeps both endpoints for splits that do not divide the width', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: -50, max: 50 }),
        fc.integer({ min: 1, max: 100 }),
        fc.integer({ min: 1, max: 100 }),
        (start, width, requested) => {
          const splits = Math.min(requested, width);
          const points = sampleRange(start, start + width, splits);
          expect(points).toHaveLength(splits + 1);
          expect(points[0]).toBe(start);
          expect(points[points.length - 1]).toBe(start + width);
        }
      )
    );
  });
});

describe('effectiveSplits', () => {
  it('clamps the requested split count to the interval width', () => {
    expect(effectiveSplits(range(0, 3), 10, 2)).toBe(3);
    expect(effectiveSplits(range(0, 3), 'all', 2)).toBe(2);
    expect(effectiveSplits(range(0, 3), 'all', 8)).toBe(3);
  });
});

describe('optionValues', () => {
  it('yields 0 and 1 for a toggle', () => {
    expect(
      optionValues({ id: 'T', kind: 'toggle', default: 1 }, 'all', 2)
    ).toEqual([0, 1]);
  });

  it('filters choice codes by label in schema order', () => {
    const option: EnumerableOption = {
      id: 'C',
      kind: 'choice',
      default: 0,
      choices: [
        { label: 'a', code: 0 },
        { label: 'b', code: 1 },
        { label: 'c', code: 5 },
      ],
    };
    expect(optionValues(option, 'all', 2)).toEqual([0, 1, 5]);
    expect(optionValues(option, ['c', 'a'], 2)).toEqual([0, 5]);
  });

  it('appends named-range specials after the sampled interval', () => {
    const option: EnumerableOption = {
      id: 'N',
      kind: 'named-range',
      default: 1,
      start: 1,
      end: 5,
      specials: [
        { name: 'none', value: 0 },
        { name: 'all', value: 99 },
      ],
    };
    expect(optionValues(option, 'all', 2)).toEqual([1, 3, 5, 0, 99]);
  });

  it('always agrees with countOptionValues', () => {
    const optionArb: fc.Arbitrary<EnumerableOption> = fc.oneof(
      fc.constant<EnumerableOption>({ id: 'T', kind: 'toggle', default: 0 }),
      fc
        .tuple(fc.integer({ min: -20, max: 20 }), fc.integer({ min: 0, max: 40 }))
        .map(([start, width]) => range(start, start + width)),
      fc
        .tuple(
          fc.integer({ min: 0, max: 10 }),
          fc.integer({ min: 0, max: 10 }),
          fc.array(fc.integer({ min: 100, max: 200 }), { maxLength: 3 })
        )
        .map(
          ([start, width, specials]): EnumerableOption => ({
            id: 'N',
            kind: 'named-range',
            default: start,
            start,
            end: start + width,
            specials: specials.map((value) => ({ name: `s${value}`, value })),
          })
        )
    );
    fc.assert(
      fc.property(
        optionArb,
        fc.integer({ min: 1, max: 12 }),
        fc.integer({ min: 1, max: 12 }),
        (option, restriction, splits) => {
          expect(optionValues(option, restriction, splits)).toHaveLength(
            countOptionValues(option, restriction, splits)
          );
          expect(optionValues(option, 'all', splits)).toHaveLength(
            countOptionValues(option, 'all', splits)
          );
        }
      )
    );
  });
});
