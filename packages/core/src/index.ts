// @hyperenum/core entry point
//
// Public API:
// - Option model and selection types (./types/options.js).
// - Schema provider interface, in-memory provider and the JSON/YAML schema loader.
// - The three engine pieces: buildBase, estimateBlastRadius, enumerateDocuments.
// - DedupCache / fingerprintDocument for suppressing repeated documents.
// - runEnumeration, which strings the above together per entity and reports
//   what was processed and what was skipped.

export * from './types/options.js';

export {
  HyperEnumError,
  SchemaError,
  ConfigError,
  OutputError,
  isHyperEnumError,
  toHyperEnumError,
  type ErrorContext,
  type SerializedError,
  type HyperEnumErrorParams,
} from './types/errors.js';
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';

export {
  createLogger,
  silentLogger,
  LOG_PREFIX,
  type Logger,
  type LoggerOptions,
  type LogSink,
} from './util/logger.js';
export { canonicalizeForHash } from './util/canonical-json.js';
export type { CanonicalValue, CanonicalJSONResult } from './util/canonical-json.js';

export {
  StaticSchemaProvider,
  type SchemaProvider,
  type OptionSchema,
} from './schema/schema-provider.js';
export {
  loadSchemaFile,
  parseSchemaDocument,
  schemaFromObject,
  formatAjvErrors,
} from './schema/schema-loader.js';

export {
  buildBase,
  resolveFillBehavior,
  type BuildBaseInput,
} from './engine/base-builder.js';
export {
  estimateBlastRadius,
  exceedsThreshold,
  DEFAULT_CONFIRM_THRESHOLD,
  type EstimateInput,
  type EstimateResult,
  type EstimateFactor,
} from './engine/blast-radius.js';
export {
  enumerateDocuments,
  type EnumerateInput,
} from './engine/enumerator.js';
export {
  optionValues,
  countOptionValues,
  sampleRange,
  effectiveSplits,
  roundHalfEven,
} from './engine/option-values.js';

export {
  DedupCache,
  fingerprintDocument,
  type DocumentFingerprint,
} from './dedup/dedup-cache.js';

export {
  parseOptionSpec,
  parseRestriction,
  parseSelection,
  formatRestriction,
  checkSelection,
  selectionError,
  type SelectionIssue,
} from './selection/selection.js';

export { runEnumeration } from './pipeline/run.js';
export type {
  ConfirmationGate,
  ConfirmationRequest,
  EntitySink,
  OutputWriter,
  ProcessedEntity,
  RunOptions,
  RunReport,
  SkipReason,
  SkippedEntity,
} from './pipeline/types.js';
