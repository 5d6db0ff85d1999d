import { mkdir, open } from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'yaml';
import type { ConfigDocument, EntitySink, OutputWriter } from '@hyperenum/core';

/** `Clock  Tower` → `Clock_Tower.yaml` */
export function outputFileName(entity: string): string {
  return `${entity.split(/\s+/).filter(Boolean).join('_')}.yaml`;
}

/**
 * One YAML document per configuration: the `name`/`description`/`game`
 * header followed by the configuration body, closed by a `---` marker.
 */
export function renderDocument(
  entity: string,
  document: ConfigDocument,
  sequence: number
): string {
  const header = stringify({
    name: `${entity}${sequence}`,
    description: `${entity}${sequence}`,
    game: entity,
  });
  return `\n${header}${stringify(document)}\n---\n`;
}

/**
 * Writes every entity to `<dir>/<entity>.yaml`, truncating an existing file.
 */
export class YamlFileWriter implements OutputWriter {
  constructor(private readonly dir: string) {}

  pathFor(entity: string): string {
    return path.join(this.dir, outputFileName(entity));
  }

  async open(entity: string): Promise<EntitySink> {
    await mkdir(this.dir, { recursive: true });
    const handle = await open(this.pathFor(entity), 'w');
    return {
      write: async (document, sequence) => {
        await handle.write(renderDocument(entity, document, sequence));
      },
      close: () => handle.close(),
    };
  }
}
