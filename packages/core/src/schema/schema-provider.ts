import type { OptionDescriptor } from '../types/options.js';

/** entity name → options in declaration order */
export type OptionSchema = ReadonlyMap<string, readonly OptionDescriptor[]>;

/**
 * Source of option schemas. Read-only: nothing in the engine mutates what it
 * returns, and the order of `optionsOf` is the enumeration order.
 */
export interface SchemaProvider {
  entities(): string[];
  optionsOf(entity: string): readonly OptionDescriptor[] | undefined;
}

export class StaticSchemaProvider implements SchemaProvider {
  readonly #schema: OptionSchema;

  constructor(schema: OptionSchema) {
    this.#schema = schema;
  }

  static fromRecord(
    record: Record<string, readonly OptionDescriptor[]>
  ): StaticSchemaProvider {
    return new StaticSchemaProvider(new Map(Object.entries(record)));
  }

  entities(): string[] {
    return [...this.#schema.keys()];
  }

  optionsOf(entity: string): readonly OptionDescriptor[] | undefined {
    return this.#schema.get(entity);
  }
}
