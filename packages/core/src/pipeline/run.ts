/**
 * Run orchestrator
 *
 * Processes entities one at a time: check the selection, build the base
 * document, estimate the blast radius, ask the confirmation gate when the
 * estimate is above the threshold, then stream enumerated documents through
 * a fresh dedup cache into the output writer. A failure inside one entity is
 * recorded in the report and the next entity is processed.
 */

import { ErrorCode } from '../errors/codes.js';
import { DedupCache } from '../dedup/dedup-cache.js';
import { buildBase } from '../engine/base-builder.js';
import {
  DEFAULT_CONFIRM_THRESHOLD,
  estimateBlastRadius,
  exceedsThreshold,
} from '../engine/blast-radius.js';
import { enumerateDocuments } from '../engine/enumerator.js';
import { checkSelection, selectionError } from '../selection/selection.js';
import {
  ConfigError,
  OutputError,
  isHyperEnumError,
  toHyperEnumError,
} from '../types/errors.js';
import type { EntitySelection } from '../types/options.js';
import { silentLogger, type Logger } from '../util/logger.js';
import type {
  ConfirmationGate,
  EntitySink,
  OutputWriter,
  ProcessedEntity,
  RunOptions,
  RunReport,
  SkipReason,
  SkippedEntity,
} from './types.js';

const declineAll: ConfirmationGate = async () => false;

function asOutputError(entity: string, error: unknown): OutputError {
  if (error instanceof OutputError) return error;
  const cause = error instanceof Error ? error : undefined;
  return new OutputError({
    message: `Could not write output for ${entity}: ${
      cause?.message ?? String(error)
    }`,
    context: { entity },
    cause,
  });
}

async function openSink(
  writer: OutputWriter,
  entity: string
): Promise<EntitySink> {
  try {
    return await writer.open(entity);
  } catch (error) {
    throw asOutputError(entity, error);
  }
}

async function closeSink(sink: EntitySink, entity: string): Promise<void> {
  try {
    await sink.close();
  } catch (error) {
    throw asOutputError(entity, error);
  }
}

type EntityOutcome =
  | { kind: 'processed'; result: ProcessedEntity }
  | { kind: 'skipped'; result: SkippedEntity };

function skipped(
  entity: string,
  reason: SkipReason,
  message: string,
  code?: ErrorCode
): EntityOutcome {
  return { kind: 'skipped', result: { entity, reason, message, code } };
}

async function processEntity(
  target: EntitySelection,
  options: RunOptions,
  logger: Logger
): Promise<EntityOutcome> {
  const { entity, selection, ignored, fill, splits } = target;
  const schema = options.provider.optionsOf(entity);
  if (!schema) {
    return skipped(
      entity,
      'unknown-entity',
      `No option schema for game "${entity}"`,
      ErrorCode.UNKNOWN_ENTITY
    );
  }

  const issues = checkSelection(schema, target);
  for (const issue of issues) {
    if (issue.severity === 'warn') logger.warn(`game ${entity}: ${issue.message}`);
  }
  const invalid = selectionError(entity, issues);
  if (invalid) {
    return skipped(entity, 'invalid-selection', invalid.message, invalid.errorCode);
  }

  const base = buildBase({
    entity,
    options: schema,
    selection,
    ignored,
    fill,
    logger,
  });
  const estimate = estimateBlastRadius({
    options: schema,
    selection,
    ignored,
    splits,
  }).total;
  logger.info(`game ${entity}: ${estimate} configuration(s) to generate`);

  const threshold = options.threshold ?? DEFAULT_CONFIRM_THRESHOLD;
  if (exceedsThreshold(estimate, threshold)) {
    const confirm = options.confirm ?? declineAll;
    const proceed = await confirm({ entity, estimate, threshold });
    if (!proceed) {
      return skipped(
        entity,
        'declined',
        `Expansion of ${estimate} documents above ${threshold} was not confirmed`
      );
    }
  }

  const sink = await openSink(options.writer, entity);
  const cache = new DedupCache();
  let generated = 0;
  let written = 0;

  try {
    for (const document of enumerateDocuments({
      entity,
      options: schema,
      base,
      selection,
      ignored,
      splits,
      logger,
    })) {
      generated += 1;
      if (!cache.admit(document)) {
        logger.debug(`game ${entity}: dropping duplicate document ${generated}`);
        continue;
      }
      written += 1;
      try {
        await sink.write(document, written);
      } catch (error) {
        throw asOutputError(entity, error);
      }
    }
  } finally {
    await closeSink(sink, entity);
  }

  if (generated !== estimate) {
    logger.warn(
      `game ${entity}: generated ${generated} document(s), estimated ${estimate}`
    );
  }

  return {
    kind: 'processed',
    result: {
      entity,
      estimate,
      generated,
      written,
      duplicates: cache.rejected,
    },
  };
}

/**
 * Enumerate every target in order and report which entities were processed
 * and which were skipped, and why.
 */
export async function runEnumeration(options: RunOptions): Promise<RunReport> {
  const logger = options.logger ?? silentLogger;
  if (options.targets.length === 0) {
    throw new ConfigError({
      message: 'Must supply at least one game to enumerate configurations for',
      errorCode: ErrorCode.NO_ENTITIES,
    });
  }

  const report: RunReport = { processed: [], skipped: [] };

  for (const target of options.targets) {
    let outcome: EntityOutcome;
    try {
      outcome = await processEntity(target, options, logger);
    } catch (error) {
      const wrapped = toHyperEnumError(error);
      const reason: SkipReason =
        isHyperEnumError(error) && error.errorCode === ErrorCode.OUTPUT_FAILED
          ? 'output-failed'
          : 'internal-error';
      outcome = skipped(target.entity, reason, wrapped.message, wrapped.errorCode);
    }

    if (outcome.kind === 'processed') {
      report.processed.push(outcome.result);
      logger.info(
        `game ${target.entity}: wrote ${outcome.result.written} document(s)`
      );
    } else {
      report.skipped.push(outcome.result);
      logger.warn(`game ${target.entity} skipped: ${outcome.result.message}`);
    }
  }

  return report;
}
