/**
 * Option model
 *
 * An entity (a game) declares an ordered list of options. Four kinds carry a
 * finite legal value set and can be enumerated; free text and text choices
 * cannot and are left out of both base-filling and enumeration.
 */

export type OptionValue = number | string | OptionValue[];

/** Defaults may be tuple-shaped; they are copied into fresh arrays on use. */
export type DefaultValue = number | string | readonly DefaultValue[];

interface OptionBase {
  /** Identifier, unique within an entity's schema */
  id: string;
}

export interface ToggleOption extends OptionBase {
  kind: 'toggle';
  /** 1 for a default-on toggle */
  default: 0 | 1;
}

export interface ChoiceEntry {
  label: string;
  code: number;
}

export interface ChoiceOption extends OptionBase {
  kind: 'choice';
  default: DefaultValue;
  /** Ordered label → code mapping */
  choices: readonly ChoiceEntry[];
}

export interface RangeOption extends OptionBase {
  kind: 'range';
  default: DefaultValue;
  start: number;
  end: number;
}

export interface SpecialValue {
  name: string;
  value: number;
}

export interface NamedRangeOption extends OptionBase {
  kind: 'named-range';
  default: DefaultValue;
  start: number;
  end: number;
  /** Sentinel values enumerated verbatim after the sampled interval */
  specials: readonly SpecialValue[];
}

export interface FreeTextOption extends OptionBase {
  kind: 'free-text';
  default: DefaultValue;
}

export interface TextChoiceOption extends OptionBase {
  kind: 'text-choice';
  default: DefaultValue;
}

export type EnumerableOption =
  | ToggleOption
  | ChoiceOption
  | RangeOption
  | NamedRangeOption;

export type UnsupportedOption = FreeTextOption | TextChoiceOption;

export type OptionDescriptor = EnumerableOption | UnsupportedOption;

export type OptionKind = OptionDescriptor['kind'];

export type RangeLikeOption = RangeOption | NamedRangeOption;

/** Options present on every entity, never filled or enumerated here */
export const COMMON_OPTIONS: ReadonlySet<string> = new Set([
  'progression_balancing',
  'accessibility',
  'local_items',
  'non_local_items',
  'start_inventory',
  'start_hints',
  'start_location_hints',
  'exclude_locations',
  'priority_locations',
  'item_links',
  'death_link',
]);

/** Fixed keys written into every base document */
export const CORE_OPTIONS = {
  progression_balancing: 0,
  accessibility: 'items',
} as const satisfies Record<string, OptionValue>;

export type EntityOptions = Record<string, OptionValue>;

/** entity name → option id → value */
export type ConfigDocument = Record<string, EntityOptions>;

/**
 * 'all' enumerates every legal value; a label list restricts a choice;
 * a number sets the split count of a range.
 */
export type SelectionRestriction = 'all' | readonly string[] | number;

export type Selection = ReadonlyMap<string, SelectionRestriction>;

export const FILL_BEHAVIORS = [
  'default',
  'random',
  'minimum',
  'maximum',
] as const;

export type FillBehavior = (typeof FILL_BEHAVIORS)[number];

export const DEFAULT_SPLITS = 2;

/** Everything one entity's run needs besides the schema */
export interface EntitySelection {
  entity: string;
  selection: Selection;
  ignored: ReadonlySet<string>;
  fill: FillBehavior;
  splits: number;
}

export function isUnsupported(
  option: OptionDescriptor
): option is UnsupportedOption {
  return option.kind === 'free-text' || option.kind === 'text-choice';
}

export function isRangeLike(
  option: OptionDescriptor
): option is RangeLikeOption {
  return option.kind === 'range' || option.kind === 'named-range';
}

export function isFillBehavior(value: string): value is FillBehavior {
  return FILL_BEHAVIORS.some((behavior) => behavior === value);
}
