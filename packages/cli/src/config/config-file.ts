/**
 * Config file loading and CLI merging.
 *
 * A config file is a multi-document YAML stream with one document per game:
 *
 *   game: Clock Tower
 *   options: [goal, floors=3]
 *   others: random
 *   ---
 *   game: Lantern Quest
 *   options: difficulty=easy|hard
 *
 * `schema`, `dir`, `splits`, `verbose` and `threshold` may appear in any
 * document; the last occurrence wins. Entries pair with games by position,
 * so `--game` on the CLI keeps the file's options for the same slot unless
 * `--options` is given too.
 *
 * Precedence: CLI > config file > defaults.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { Ajv, type ValidateFunction } from 'ajv';
import { parseAllDocuments } from 'yaml';
import {
  ConfigError,
  ErrorCode,
  formatAjvErrors,
  parseSelection,
  resolveFillBehavior,
  silentLogger,
  type EntitySelection,
  type Logger,
} from '@hyperenum/core';

import {
  DEFAULT_OUTPUT_DIR,
  resolveSplits,
  resolveThreshold,
  resolveVerbosity,
  splitList,
  type CliOptions,
} from '../flags.js';

interface ConfigDocumentInput {
  game: string;
  options?: string | string[];
  others?: string;
  ignore?: string | string[];
  schema?: string;
  dir?: string;
  splits?: number;
  verbose?: number;
  threshold?: number;
}

const stringList = {
  anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
} as const;

const CONFIG_DOCUMENT_SCHEMA = {
  type: 'object',
  required: ['game'],
  additionalProperties: false,
  properties: {
    game: { type: 'string', minLength: 1 },
    options: stringList,
    others: { type: 'string' },
    ignore: stringList,
    schema: { type: 'string' },
    dir: { type: 'string' },
    splits: { type: 'integer', minimum: 1 },
    verbose: { type: 'integer', minimum: 0 },
    threshold: { type: 'integer', minimum: 0 },
  },
} as const;

let cachedValidator: ValidateFunction<ConfigDocumentInput> | undefined;

function getValidator(): ValidateFunction<ConfigDocumentInput> {
  if (!cachedValidator) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    cachedValidator = ajv.compile<ConfigDocumentInput>(CONFIG_DOCUMENT_SCHEMA);
  }
  return cachedValidator;
}

export interface GameEntry {
  game: string;
  options: string[];
  others?: string;
  ignore: string[];
}

export interface FileConfig {
  games: GameEntry[];
  schema?: string;
  dir?: string;
  splits?: number;
  verbose?: number;
  threshold?: number;
}

export interface GamePlan {
  game: string;
  options: string[];
  others: string;
  ignore: string[];
}

export interface ResolvedConfig {
  schema?: string;
  dir: string;
  splits: number;
  verbose: number;
  threshold: number;
  yes: boolean;
  ignore: string[];
  games: GamePlan[];
}

function asList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return splitList(typeof value === 'string' ? [value] : value);
}

export function parseConfigFile(text: string, source = '<inline>'): FileConfig {
  const config: FileConfig = { games: [] };
  const validate = getValidator();

  parseAllDocuments(text).forEach((document, index) => {
    const where = `${source} (document ${index + 1})`;
    const [parseError] = document.errors;
    if (parseError) {
      throw new ConfigError({
        message: `Could not parse config file ${where}: ${parseError.message}`,
        context: { path: source },
        cause: parseError,
      });
    }

    const input: unknown = document.toJS();
    if (input === null || input === undefined) return;
    if (!validate(input)) {
      throw new ConfigError({
        message: `Invalid config file ${where}: ${formatAjvErrors(validate.errors)}`,
        context: { path: source },
      });
    }

    config.games.push({
      game: input.game,
      options: asList(input.options),
      others: input.others,
      ignore: asList(input.ignore),
    });
    if (input.schema !== undefined) config.schema = input.schema;
    if (input.dir !== undefined) config.dir = input.dir;
    if (input.splits !== undefined) config.splits = input.splits;
    if (input.verbose !== undefined) config.verbose = input.verbose;
    if (input.threshold !== undefined) config.threshold = input.threshold;
  });

  return config;
}

export async function loadConfigFile(filePath: string): Promise<FileConfig> {
  const abs = path.resolve(process.cwd(), filePath);
  let text: string;
  try {
    text = await readFile(abs, 'utf8');
  } catch (error) {
    throw new ConfigError({
      message: `Config file not readable: ${abs}`,
      context: { path: abs },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseConfigFile(text, abs);
}

export function resolveConfig(
  cli: CliOptions,
  file: FileConfig = { games: [] }
): ResolvedConfig {
  const names = cli.game ? splitList(cli.game) : file.games.map((g) => g.game);
  const others = cli.others ? splitList(cli.others) : undefined;

  const games = names.map((game, index): GamePlan => {
    const entry = file.games[index];
    const group = cli.options?.[index];
    return {
      game,
      options: cli.options
        ? splitList(group === undefined ? [] : [group])
        : (entry?.options ?? []),
      others:
        (others?.length === 1 ? others[0] : others?.[index]) ??
        entry?.others ??
        'default',
      ignore: entry?.ignore ?? [],
    };
  });

  return {
    schema: cli.schema ?? file.schema,
    dir: cli.dir ?? file.dir ?? DEFAULT_OUTPUT_DIR,
    splits: resolveSplits(cli.splits ?? file.splits),
    verbose: resolveVerbosity(cli.verbose ?? file.verbose),
    threshold: resolveThreshold(cli.threshold ?? file.threshold),
    yes: cli.yes ?? false,
    ignore: splitList(cli.ignore),
    games,
  };
}

export function requireSchemaPath(config: ResolvedConfig): string {
  if (!config.schema) {
    throw new ConfigError({
      message: 'Missing --schema <file>',
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { suggestion: 'pass --schema or set "schema" in the config file' },
    });
  }
  return config.schema;
}

/**
 * Turn resolved game plans into per-entity enumeration targets.
 */
export function toTargets(
  config: ResolvedConfig,
  logger: Logger = silentLogger
): EntitySelection[] {
  return config.games.map((plan) => ({
    entity: plan.game,
    selection: parseSelection(plan.options),
    ignored: new Set([...config.ignore, ...plan.ignore]),
    fill: resolveFillBehavior(plan.others, logger),
    splits: config.splits,
  }));
}
