/**
 * JSON Schema of an option schema file, checked with Ajv before the file's
 * options are turned into descriptors.
 */

import type { DefaultValue } from '../types/options.js';

export type RawOptionKind =
  | 'toggle'
  | 'default-on-toggle'
  | 'choice'
  | 'range'
  | 'named-range'
  | 'free-text'
  | 'text-choice';

export interface RawOption {
  id: string;
  kind: RawOptionKind;
  default?: DefaultValue;
  choices?: Array<{ label: string; code: number }>;
  start?: number;
  end?: number;
  specials?: Array<{ name: string; value: number }>;
}

export interface RawSchemaFile {
  entities: Record<string, { options: RawOption[] }>;
}

const requireFields = (kind: string | string[], required: string[]) => ({
  if: {
    properties: { kind: Array.isArray(kind) ? { enum: kind } : { const: kind } },
  },
  then: { required },
});

export const OPTION_SCHEMA_FILE_SCHEMA = {
  type: 'object',
  required: ['entities'],
  additionalProperties: false,
  properties: {
    $schema: { type: 'string' },
    entities: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['options'],
        additionalProperties: false,
        properties: {
          options: {
            type: 'array',
            items: { $ref: '#/definitions/option' },
          },
        },
      },
    },
  },
  definitions: {
    defaultValue: {
      anyOf: [
        { type: 'number' },
        { type: 'string' },
        { type: 'array', items: { $ref: '#/definitions/defaultValue' } },
      ],
    },
    option: {
      type: 'object',
      required: ['id', 'kind'],
      additionalProperties: false,
      properties: {
        id: { type: 'string', minLength: 1 },
        kind: {
          enum: [
            'toggle',
            'default-on-toggle',
            'choice',
            'range',
            'named-range',
            'free-text',
            'text-choice',
          ],
        },
        default: { $ref: '#/definitions/defaultValue' },
        choices: {
          type: 'array',
          minItems: 1,
          items: {
            type: 'object',
            required: ['label', 'code'],
            additionalProperties: false,
            properties: {
              label: { type: 'string' },
              code: { type: 'integer' },
            },
          },
        },
        start: { type: 'integer' },
        end: { type: 'integer' },
        specials: {
          type: 'array',
          items: {
            type: 'object',
            required: ['name', 'value'],
            additionalProperties: false,
            properties: {
              name: { type: 'string' },
              value: { type: 'integer' },
            },
          },
        },
      },
      allOf: [
        requireFields('choice', ['choices']),
        requireFields(['range', 'named-range'], ['start', 'end']),
      ],
    },
  },
} as const;
