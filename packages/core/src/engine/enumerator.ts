/**
 * Enumeration engine
 *
 * Depth-first expansion over schema order. Each recursion level expands the
 * first still-unassigned selected option, fanning out over its candidate
 * values; the level that assigns the last missing option yields documents.
 *
 * The base document is never mutated. Each branch carries the list of
 * assignments made so far and a fresh document is materialised only when it
 * is yielded, so sibling branches and previously yielded documents never
 * share state.
 */

import {
  COMMON_OPTIONS,
  isUnsupported,
  type ConfigDocument,
  type EnumerableOption,
  type OptionDescriptor,
  type OptionValue,
  type Selection,
  type SelectionRestriction,
} from '../types/options.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { optionValues } from './option-values.js';

export interface EnumerateInput {
  entity: string;
  options: readonly OptionDescriptor[];
  base: ConfigDocument;
  selection: Selection;
  ignored: ReadonlySet<string>;
  splits: number;
  logger?: Logger;
}

type Assignment = readonly [id: string, value: OptionValue];

interface NextOption {
  index: number;
  option: EnumerableOption;
  restriction: SelectionRestriction;
}

function materialize(
  base: ConfigDocument,
  entity: string,
  assignments: readonly Assignment[]
): ConfigDocument {
  const document = structuredClone(base);
  const values = document[entity] ?? {};
  for (const [id, value] of assignments) {
    values[id] = value;
  }
  document[entity] = values;
  return document;
}

/**
 * Lazily yield every document combining `base` with one candidate value per
 * selected option. Stop pulling to abandon the traversal.
 */
export function* enumerateDocuments(
  input: EnumerateInput
): Generator<ConfigDocument, void, undefined> {
  const { entity, options, base, selection, ignored, splits } = input;
  const logger = input.logger ?? silentLogger;
  const baseValues = base[entity] ?? {};
  const baseSize = Object.keys(baseValues).length;

  const findNext = (cursor: number): NextOption | undefined => {
    for (let index = cursor; index < options.length; index += 1) {
      const option = options[index];
      if (!option) continue;
      if (COMMON_OPTIONS.has(option.id)) continue;
      if (ignored.has(option.id)) continue;
      if (Object.prototype.hasOwnProperty.call(baseValues, option.id)) continue;
      const restriction = selection.get(option.id);
      if (restriction === undefined) continue;
      if (isUnsupported(option)) continue;
      return { index, option, restriction };
    }
    return undefined;
  };

  function* expand(
    cursor: number,
    assignments: readonly Assignment[]
  ): Generator<ConfigDocument, void, undefined> {
    // One assignment short of a complete document.
    const isLastBranch =
      baseSize + selection.size - 1 === baseSize + assignments.length;

    const next = findNext(cursor);
    if (!next) return;

    const { index, option, restriction } = next;
    logger.trace(`game ${entity}: expanding ${option.kind} ${option.id}`);

    for (const value of optionValues(option, restriction, splits)) {
      const branch: Assignment[] = [...assignments, [option.id, value]];
      if (isLastBranch) {
        yield materialize(base, entity, branch);
      } else {
        yield* expand(index + 1, branch);
      }
    }
  }

  yield* expand(0, []);
}
