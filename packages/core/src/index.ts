/**
 * @handlerkit/core - Schema model, synthesis and runtime for capability registries
 */

// Error types
export {
  HandlerKitError,
  SchemaError,
  ConfigError,
  ConformanceError,
  DispatchError,
  InvariantViolationError,
} from './errors/HandlerKitError.js';
export type { ErrorContext, HandlerKitErrorJSON } from './errors/HandlerKitError.js';

// Logging
export { ConsoleLogger, createLogger, formatMessage, isLogLevel, silentLogger, LOG_LEVELS } from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Config
export {
  loadConfig,
  DEFAULT_CONFIG,
  validateVersion,
  validateNaming,
  validateSchemaPaths,
} from './config/index.js';
export type { HandlerKitConfig } from './config/index.js';
export { HANDLERKIT_VERSION, getSchemaVersion } from './version.js';

// Naming contract
export { DEFAULT_NAMING, resolveNaming } from './naming.js';
export type { NamingOptions, NamingConvention } from './naming.js';

// Schema construction
export { SystemSpecBuilder, HandlerSpecBuilder } from './schema/SchemaBuilder.js';
export { validateSystemSpec, validateGeneratedNames, RESERVED_OPERATIONS } from './schema/validateSchema.js';
export { parseSystemDocument, loadSystemSpec } from './schema/SchemaLoader.js';

// Synthesis
export { synthesize, computeChecksum } from './synthesis/Synthesizer.js';
export type { SynthesizeOptions } from './synthesis/Synthesizer.js';

// Object binding
export { bindObjectType, applyBinding, bindCapabilities } from './binding/ObjectBinder.js';
export type { HandlerVocabulary } from './binding/ObjectBinder.js';

// Runtime registry
export { Registry, createRegistry } from './runtime/Registry.js';
export type { RegistryOptions } from './runtime/Registry.js';
