import {
  COMMON_OPTIONS,
  CORE_OPTIONS,
  isFillBehavior,
  isRangeLike,
  isUnsupported,
  type ConfigDocument,
  type DefaultValue,
  type EnumerableOption,
  type FillBehavior,
  type OptionDescriptor,
  type OptionValue,
  type Selection,
} from '../types/options.js';
import { silentLogger, type Logger } from '../util/logger.js';

export interface BuildBaseInput {
  entity: string;
  options: readonly OptionDescriptor[];
  selection: Selection;
  ignored: ReadonlySet<string>;
  fill: FillBehavior;
  logger?: Logger;
}

/**
 * Map a user-supplied fill behavior onto a known one. Unknown values warn and
 * fall back to 'default'.
 */
export function resolveFillBehavior(
  raw: string | undefined,
  logger: Logger = silentLogger
): FillBehavior {
  if (raw === undefined || raw === '') return 'default';
  const normalized = raw.trim().toLowerCase();
  if (isFillBehavior(normalized)) return normalized;
  logger.warn(`unknown fill behavior "${raw}", using "default"`);
  return 'default';
}

export function copyDefault(value: DefaultValue): OptionValue {
  if (typeof value === 'number' || typeof value === 'string') return value;
  return value.map(copyDefault);
}

function legalValueCount(option: EnumerableOption): number {
  switch (option.kind) {
    case 'toggle':
      return 2;
    case 'choice':
      return option.choices.length;
    case 'range':
    case 'named-range':
      return option.end - option.start + 1;
    default: {
      const exhaustive: never = option;
      return exhaustive;
    }
  }
}

function fillValue(option: EnumerableOption, fill: FillBehavior): OptionValue {
  switch (fill) {
    case 'default':
      return copyDefault(option.default);
    case 'random':
      return 'random';
    case 'minimum':
      return isRangeLike(option) ? option.start : 0;
    case 'maximum':
      return isRangeLike(option) ? option.end : legalValueCount(option);
    default: {
      const exhaustive: never = fill;
      return exhaustive;
    }
  }
}

/**
 * Build the starting document for one entity: the fixed core keys plus one
 * value per option that is not common, ignored, selected or unsupported.
 */
export function buildBase(input: BuildBaseInput): ConfigDocument {
  const { entity, options, selection, ignored, fill } = input;
  const logger = input.logger ?? silentLogger;
  const values: Record<string, OptionValue> = { ...CORE_OPTIONS };

  for (const option of options) {
    if (COMMON_OPTIONS.has(option.id)) continue;
    if (ignored.has(option.id)) continue;
    if (selection.has(option.id)) continue;
    if (isUnsupported(option)) {
      logger.debug(
        `game ${entity}: skipping option ${option.id}, ${option.kind} is not supported`
      );
      continue;
    }
    values[option.id] = fillValue(option, fill);
  }

  return { [entity]: values };
}
