/**
 * Selection parsing and consistency checks.
 *
 * Option spec grammar (CLI and config file):
 *   name           enumerate every legal value
 *   name=all       same
 *   name=3         range split count
 *   name=a|b|c     choice labels
 */

import { ErrorCode } from '../errors/codes.js';
import { ConfigError } from '../types/errors.js';
import {
  COMMON_OPTIONS,
  isRangeLike,
  isUnsupported,
  type EntitySelection,
  type OptionDescriptor,
  type SelectionRestriction,
} from '../types/options.js';

export function parseRestriction(raw: string): SelectionRestriction {
  const value = raw.trim();
  if (value === '' || value.toLowerCase() === 'all') return 'all';
  if (/^-?\d+$/.test(value)) return Number(value);
  return value
    .split('|')
    .map((label) => label.trim())
    .filter(Boolean);
}

export function parseOptionSpec(
  spec: string
): [id: string, restriction: SelectionRestriction] {
  const eq = spec.indexOf('=');
  if (eq === -1) {
    const id = spec.trim();
    if (!id) {
      throw new ConfigError({
        message: 'Empty option name in selection',
        errorCode: ErrorCode.EMPTY_SELECTION,
      });
    }
    return [id, 'all'];
  }
  const id = spec.slice(0, eq).trim();
  if (!id) {
    throw new ConfigError({
      message: `Missing option name in "${spec}"`,
      errorCode: ErrorCode.INVALID_RESTRICTION,
    });
  }
  return [id, parseRestriction(spec.slice(eq + 1))];
}

/**
 * Build a selection from option specs; later specs for the same option win.
 */
export function parseSelection(
  specs: readonly string[]
): Map<string, SelectionRestriction> {
  const selection = new Map<string, SelectionRestriction>();
  for (const spec of specs) {
    for (const part of spec.split(',')) {
      if (!part.trim()) continue;
      const [id, restriction] = parseOptionSpec(part);
      selection.set(id, restriction);
    }
  }
  return selection;
}

export function formatRestriction(restriction: SelectionRestriction): string {
  if (restriction === 'all') return 'all';
  if (typeof restriction === 'number') return String(restriction);
  return restriction.join('|');
}

export interface SelectionIssue {
  severity: 'warn' | 'error';
  code: ErrorCode;
  option?: string;
  message: string;
}

function isSplitCount(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

/**
 * Check a selection against an entity's options. Errors make the entity
 * unprocessable; warnings flag options that will silently contribute nothing.
 */
export function checkSelection(
  options: readonly OptionDescriptor[],
  target: EntitySelection
): SelectionIssue[] {
  const issues: SelectionIssue[] = [];

  if (target.selection.size === 0) {
    issues.push({
      severity: 'error',
      code: ErrorCode.EMPTY_SELECTION,
      message: 'No options selected for enumeration',
    });
  }
  if (!isSplitCount(target.splits)) {
    issues.push({
      severity: 'error',
      code: ErrorCode.INVALID_SPLITS,
      message: `Split count must be an integer of at least 1, got ${target.splits}`,
    });
  }

  const byId = new Map(options.map((option) => [option.id, option]));

  for (const [id, restriction] of target.selection) {
    const option = byId.get(id);
    if (COMMON_OPTIONS.has(id)) {
      issues.push({
        severity: 'warn',
        code: ErrorCode.INVALID_RESTRICTION,
        option: id,
        message: `Option "${id}" is common to every game and is never enumerated`,
      });
      continue;
    }
    if (!option) {
      issues.push({
        severity: 'warn',
        code: ErrorCode.INVALID_RESTRICTION,
        option: id,
        message: `Option "${id}" does not exist for ${target.entity}; no documents will be produced`,
      });
      continue;
    }
    if (target.ignored.has(id)) {
      issues.push({
        severity: 'warn',
        code: ErrorCode.INVALID_RESTRICTION,
        option: id,
        message: `Option "${id}" is both selected and ignored; no documents will be produced`,
      });
      continue;
    }
    if (isUnsupported(option)) {
      issues.push({
        severity: 'warn',
        code: ErrorCode.INVALID_RESTRICTION,
        option: id,
        message: `Option "${id}" is ${option.kind}, which cannot be enumerated; no documents will be produced`,
      });
      continue;
    }

    if (typeof restriction === 'number') {
      if (!isRangeLike(option)) {
        issues.push({
          severity: 'error',
          code: ErrorCode.INVALID_RESTRICTION,
          option: id,
          message: `Option "${id}" is a ${option.kind}; a split count only applies to ranges`,
        });
      } else if (!isSplitCount(restriction)) {
        issues.push({
          severity: 'error',
          code: ErrorCode.INVALID_SPLITS,
          option: id,
          message: `Split count for "${id}" must be an integer of at least 1, got ${restriction}`,
        });
      }
      continue;
    }

    if (restriction !== 'all') {
      if (option.kind !== 'choice') {
        issues.push({
          severity: 'error',
          code: ErrorCode.INVALID_RESTRICTION,
          option: id,
          message: `Option "${id}" is a ${option.kind}; label lists only apply to choices`,
        });
        continue;
      }
      const labels = new Set(option.choices.map((entry) => entry.label));
      for (const label of restriction) {
        if (!labels.has(label)) {
          issues.push({
            severity: 'warn',
            code: ErrorCode.INVALID_RESTRICTION,
            option: id,
            message: `Option "${id}" has no choice "${label}"`,
          });
        }
      }
      if (!restriction.some((label) => labels.has(label))) {
        issues.push({
          severity: 'error',
          code: ErrorCode.INVALID_RESTRICTION,
          option: id,
          message: `Option "${id}" restriction keeps none of its choices`,
        });
      }
    }
  }

  return issues;
}

/**
 * Turn the first error-level issue into a ConfigError for the entity.
 */
export function selectionError(
  entity: string,
  issues: readonly SelectionIssue[]
): ConfigError | undefined {
  const first = issues.find((issue) => issue.severity === 'error');
  if (!first) return undefined;
  return new ConfigError({
    message: first.message,
    errorCode: first.code,
    context: { entity, option: first.option },
  });
}
