import type { ErrorCode } from '../errors/codes.js';
import type { ConfigDocument, EntitySelection } from '../types/options.js';
import type { SchemaProvider } from '../schema/schema-provider.js';
import type { Logger } from '../util/logger.js';

/** Receives the numbered documents of one entity. */
export interface EntitySink {
  write(document: ConfigDocument, sequence: number): Promise<void>;
  close(): Promise<void>;
}

/** Opens one sink per entity; all serialization and file placement lives behind it. */
export interface OutputWriter {
  open(entity: string): Promise<EntitySink>;
}

export interface ConfirmationRequest {
  entity: string;
  estimate: number;
  threshold: number;
}

/** Resolves true to go ahead with an oversized expansion. */
export type ConfirmationGate = (request: ConfirmationRequest) => Promise<boolean>;

export interface RunOptions {
  provider: SchemaProvider;
  targets: readonly EntitySelection[];
  writer: OutputWriter;
  confirm?: ConfirmationGate;
  threshold?: number;
  logger?: Logger;
}

export interface ProcessedEntity {
  entity: string;
  estimate: number;
  generated: number;
  written: number;
  duplicates: number;
}

export type SkipReason =
  | 'unknown-entity'
  | 'invalid-selection'
  | 'declined'
  | 'output-failed'
  | 'internal-error';

export interface SkippedEntity {
  entity: string;
  reason: SkipReason;
  message: string;
  code?: ErrorCode;
}

export interface RunReport {
  processed: ProcessedEntity[];
  skipped: SkippedEntity[];
}
