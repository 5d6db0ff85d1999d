import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import { parse as parseYaml } from 'yaml';

import { ErrorCode } from '../errors/codes.js';
import { SchemaError } from '../types/errors.js';
import type { OptionDescriptor } from '../types/options.js';
import {
  OPTION_SCHEMA_FILE_SCHEMA,
  type RawOption,
  type RawSchemaFile,
} from './schema-definition.js';
import { StaticSchemaProvider } from './schema-provider.js';

let cachedValidator: ValidateFunction<RawSchemaFile> | undefined;

function getValidator(): ValidateFunction<RawSchemaFile> {
  if (!cachedValidator) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    cachedValidator = ajv.compile<RawSchemaFile>(OPTION_SCHEMA_FILE_SCHEMA);
  }
  return cachedValidator;
}

export function formatAjvErrors(
  errors: readonly ErrorObject[] | null | undefined
): string {
  if (!errors || errors.length === 0) return 'unknown validation error';
  return errors
    .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
    .join('; ');
}

function fail(
  message: string,
  entity: string,
  option: string,
  source: string
): never {
  throw new SchemaError({
    message,
    context: { entity, option, path: source },
  });
}

function requireNumber(
  value: number | undefined,
  field: string,
  entity: string,
  raw: RawOption,
  source: string
): number {
  if (value === undefined) {
    fail(`option "${raw.id}" is missing "${field}"`, entity, raw.id, source);
  }
  return value;
}

function toDescriptor(
  entity: string,
  raw: RawOption,
  source: string
): OptionDescriptor {
  switch (raw.kind) {
    case 'toggle':
    case 'default-on-toggle': {
      const fallback = raw.kind === 'default-on-toggle' ? 1 : 0;
      const value = raw.default ?? fallback;
      if (value !== 0 && value !== 1) {
        fail(
          `toggle "${raw.id}" default must be 0 or 1`,
          entity,
          raw.id,
          source
        );
      }
      return { id: raw.id, kind: 'toggle', default: value };
    }
    case 'choice': {
      const choices = raw.choices ?? [];
      const labels = new Set<string>();
      for (const entry of choices) {
        if (labels.has(entry.label)) {
          fail(
            `choice "${raw.id}" repeats label "${entry.label}"`,
            entity,
            raw.id,
            source
          );
        }
        labels.add(entry.label);
      }
      const value = raw.default ?? choices[0]?.code ?? 0;
      if (
        typeof value === 'number' &&
        !choices.some((entry) => entry.code === value)
      ) {
        fail(
          `choice "${raw.id}" default ${value} is not one of its codes`,
          entity,
          raw.id,
          source
        );
      }
      return { id: raw.id, kind: 'choice', default: value, choices };
    }
    case 'range':
    case 'named-range': {
      const start = requireNumber(raw.start, 'start', entity, raw, source);
      const end = requireNumber(raw.end, 'end', entity, raw, source);
      if (start > end) {
        fail(
          `range "${raw.id}" has start ${start} greater than end ${end}`,
          entity,
          raw.id,
          source
        );
      }
      const specials = raw.kind === 'named-range' ? (raw.specials ?? []) : [];
      const value = raw.default ?? start;
      if (
        typeof value === 'number' &&
        (value < start || value > end) &&
        !specials.some((special) => special.value === value)
      ) {
        fail(
          `range "${raw.id}" default ${value} is outside [${start}, ${end}]`,
          entity,
          raw.id,
          source
        );
      }
      if (raw.kind === 'range') {
        return { id: raw.id, kind: 'range', default: value, start, end };
      }
      return {
        id: raw.id,
        kind: 'named-range',
        default: value,
        start,
        end,
        specials,
      };
    }
    case 'free-text':
    case 'text-choice':
      return { id: raw.id, kind: raw.kind, default: raw.default ?? '' };
    default: {
      const exhaustive: never = raw.kind;
      return exhaustive;
    }
  }
}

/**
 * Validate an already-parsed schema document and build a provider over it.
 */
export function schemaFromObject(
  input: unknown,
  source = '<inline>'
): StaticSchemaProvider {
  const validate = getValidator();
  if (!validate(input)) {
    throw new SchemaError({
      message: `Invalid option schema: ${formatAjvErrors(validate.errors)}`,
      context: { path: source },
    });
  }

  const schema = new Map<string, readonly OptionDescriptor[]>();
  for (const [entity, body] of Object.entries(input.entities)) {
    const seen = new Set<string>();
    const options: OptionDescriptor[] = [];
    for (const raw of body.options) {
      if (seen.has(raw.id)) {
        fail(`option "${raw.id}" is declared twice`, entity, raw.id, source);
      }
      seen.add(raw.id);
      options.push(toDescriptor(entity, raw, source));
    }
    schema.set(entity, options);
  }
  return new StaticSchemaProvider(schema);
}

/**
 * Parse a JSON or YAML schema document. YAML is assumed unless the source
 * name ends in .json.
 */
export function parseSchemaDocument(
  text: string,
  source = '<inline>'
): StaticSchemaProvider {
  let parsed: unknown;
  try {
    parsed =
      path.extname(source).toLowerCase() === '.json'
        ? JSON.parse(text)
        : parseYaml(text);
  } catch (error) {
    throw new SchemaError({
      message: `Could not parse option schema ${source}`,
      errorCode: ErrorCode.SCHEMA_PARSE_FAILED,
      context: { path: source },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return schemaFromObject(parsed, source);
}

export async function loadSchemaFile(
  filePath: string
): Promise<StaticSchemaProvider> {
  const abs = path.resolve(process.cwd(), filePath);
  let text: string;
  try {
    text = await readFile(abs, 'utf8');
  } catch (error) {
    throw new SchemaError({
      message: `Option schema file not readable: ${abs}`,
      errorCode: ErrorCode.SCHEMA_PARSE_FAILED,
      context: { path: abs },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseSchemaDocument(text, abs);
}
