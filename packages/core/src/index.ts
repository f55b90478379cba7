// @confsmith/core entry point
//
// - Node API facades (loadConfig/dumpConfig/dumpDefaultConfig/writeDefaultConfig)
//   are the preferred entry points; they read and write files.
// - The engine (validate, emitDefaults) works on in-memory trees only.
// - Building blocks (container adapters, flow marking, base coercion,
//   provenance, presentation) are exported for callers that assemble their own
//   pipeline.

export * from './api.js';

// Engine
export {
  validate,
  type ValidateOptions,
  type ValidateResult,
} from './engine/inject.js';
export { emitDefaults, type EmitOptions } from './engine/emit.js';
export { NO_DEFAULT } from './engine/defaults.js';

// Schema checking and dialects
export {
  checkSchema,
  compileSchema,
  resolveDialect,
  validatorFor,
  type CheckerOptions,
} from './schema/checker.js';
export {
  detectDialect,
  LATEST_DIALECT,
  type Dialect,
  type KnownDialect,
} from './dialect/detectDialect.js';

// Containers
export {
  isMapping,
  isSequence,
  mappingEntries,
  mappingGet,
  mappingHas,
  mappingKeys,
  mappingSet,
  sequenceItems,
  sequenceSet,
  type Mapping,
  type PlainMapping,
  type Sequence,
} from './schema/type-compat.js';
export { toBase, validationView } from './util/base-types.js';

// Presentation and provenance
export { markFlow, isFlowStyle } from './presentation/flow-style.js';
export { PresentationAnnotator } from './presentation/annotator.js';
export { ProvenanceTracker } from './provenance/tracker.js';

// Serialization
export {
  parseConfigText,
  serializeJson,
  serializeYaml,
  extendedReplacer,
  type YamlSerializeOptions,
} from './io/index.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  getExitCode,
  type Severity,
} from './errors/codes.js';
export {
  ConfsmithError,
  SchemaError,
  ValidationError,
  ShapeError,
  ConfigError,
  ParseError,
  isConfsmithError,
  createValidationFailure,
  type ValidationFailure,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export { didYouMean, suggestFor } from './errors/suggestions.js';

// Options and schema types
export {
  DEFAULT_OPTIONS,
  DUMP_FORMATS,
  isDumpFormat,
  resolveOptions,
  type DumpFormat,
  type EngineOptions,
  type ResolvedOptions,
} from './types/options.js';
export type { Schema, SchemaNode, SchemaType } from './types/schema.js';
