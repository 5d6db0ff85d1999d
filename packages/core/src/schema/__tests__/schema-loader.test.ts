import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {
  loadSchemaFile,
  parseSchemaDocument,
  schemaFromObject,
} from '../schema-loader.js';
import { StaticSchemaProvider } from '../schema-provider.js';
import { ErrorCode } from '../../errors/codes.js';
import { SchemaError } from '../../types/errors.js';

const YAML_SCHEMA = `
entities:
  Clock Tower:
    options:
      - id: goal
        kind: choice
        default: 1
        choices:
          - { label: bells, code: 0 }
          - { label: gears, code: 1 }
      - id: hard_mode
        kind: default-on-toggle
      - id: floors
        kind: range
        start: 3
        end: 9
        default: 5
      - id: keys
        kind: named-range
        start: 1
        end: 4
        specials:
          - { name: random-low, value: -1 }
      - id: motto
        kind: free-text
      - id: extras
        kind: toggle
        default: 0
`;

function expectSchemaError(fn: () => unknown, pattern: RegExp): void {
  expect(fn).toThrow(SchemaError);
  expect(fn).toThrow(pattern);
}

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parseSchemaDocument', () => {
  it('builds descriptors in declaration order from YAML', () => {
    const provider = parseSchemaDocument(YAML_SCHEMA, 'schema.yaml');

    expect(provider.entities()).toEqual(['Clock Tower']);
    expect(provider.optionsOf('Clock Tower')).toEqual([
      {
        id: 'goal',
        kind: 'choice',
        default: 1,
        choices: [
          { label: 'bells', code: 0 },
          { label: 'gears', code: 1 },
        ],
      },
      { id: 'hard_mode', kind: 'toggle', default: 1 },
      { id: 'floors', kind: 'range', default: 5, start: 3, end: 9 },
      {
        id: 'keys',
        kind: 'named-range',
        default: 1,
        start: 1,
        end: 4,
        specials: [{ name: 'random-low', value: -1 }],
      },
      { id: 'motto', kind: 'free-text', default: '' },
      { id: 'extras', kind: 'toggle', default: 0 },
    ]);
    expect(provider.optionsOf('Elsewhere')).toBeUndefined();
  });

  it('parses JSON when the source ends in .json', () => {
    const provider = parseSchemaDocument(
      JSON.stringify({
        entities: { G: { options: [{ id: 't', kind: 'toggle' }] } },
      }),
      'schema.json'
    );
    expect(provider.optionsOf('G')).toEqual([
      { id: 't', kind: 'toggle', default: 0 },
    ]);
  });

  it('reports unparsable text as a parse failure', () => {
    const error = caught(() => parseSchemaDocument('{ nope', 'broken.json'));
    expect(error).toBeInstanceOf(SchemaError);
    expect(error instanceof SchemaError && error.errorCode).toBe(
      ErrorCode.SCHEMA_PARSE_FAILED
    );
  });
});

describe('schemaFromObject', () => {
  it('rejects documents that do not match the file schema', () => {
    expectSchemaError(
      () => schemaFromObject({ entities: { G: { options: [{ id: 'x' }] } } }),
      /Invalid option schema: .*kind/
    );
    expectSchemaError(
      () =>
        schemaFromObject({
          entities: { G: { options: [{ id: 'c', kind: 'choice' }] } },
        }),
      /choices/
    );
  });

  it('rejects inverted ranges', () => {
    expectSchemaError(
      () =>
        schemaFromObject({
          entities: {
            G: { options: [{ id: 'r', kind: 'range', start: 5, end: 1 }] },
          },
        }),
      /start 5 greater than end 1/
    );
  });

  it('rejects defaults outside the legal values', () => {
    expectSchemaError(
      () =>
        schemaFromObject({
          entities: {
            G: {
              options: [
                { id: 'r', kind: 'range', start: 0, end: 3, default: 9 },
              ],
            },
          },
        }),
      /default 9 is outside \[0, 3\]/
    );
    expectSchemaError(
      () =>
        schemaFromObject({
          entities: {
            G: {
              options: [
                {
                  id: 'c',
                  kind: 'choice',
                  default: 4,
                  choices: [{ label: 'a', code: 0 }],
                },
              ],
            },
          },
        }),
      /default 4 is not one of its codes/
    );
    expectSchemaError(
      () =>
        schemaFromObject({
          entities: { G: { options: [{ id: 't', kind: 'toggle', default: 2 }] } },
        }),
      /must be 0 or 1/
    );
  });

  it('accepts a named-range default equal to a special value', () => {
    const provider = schemaFromObject({
      entities: {
        G: {
          options: [
            {
              id: 'n',
              kind: 'named-range',
              start: 1,
              end: 3,
              default: 0,
              specials: [{ name: 'off', value: 0 }],
            },
          ],
        },
      },
    });
    expect(provider.optionsOf('G')?.[0]).toMatchObject({ default: 0 });
  });

  it('rejects duplicate option ids and choice labels', () => {
    expectSchemaError(
      () =>
        schemaFromObject({
          entities: {
            G: {
              options: [
                { id: 't', kind: 'toggle' },
                { id: 't', kind: 'toggle' },
              ],
            },
          },
        }),
      /declared twice/
    );
    expectSchemaError(
      () =>
        schemaFromObject({
          entities: {
            G: {
              options: [
                {
                  id: 'c',
                  kind: 'choice',
                  choices: [
                    { label: 'a', code: 0 },
                    { label: 'a', code: 1 },
                  ],
                },
              ],
            },
          },
        }),
      /repeats label "a"/
    );
  });
});

describe('loadSchemaFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'hyperenum-schema-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a YAML file from disk', async () => {
    const file = path.join(dir, 'games.yaml');
    await writeFile(file, YAML_SCHEMA, 'utf8');

    const provider = await loadSchemaFile(file);
    expect(provider).toBeInstanceOf(StaticSchemaProvider);
    expect(provider.optionsOf('Clock Tower')).toHaveLength(6);
  });

  it('fails with a parse error when the file is missing', async () => {
    const error = await loadSchemaFile(path.join(dir, 'absent.yaml')).catch(
      (e: unknown) => e
    );
    expect(error).toBeInstanceOf(SchemaError);
    expect(error instanceof SchemaError && error.errorCode).toBe(
      ErrorCode.SCHEMA_PARSE_FAILED
    );
  });
});
