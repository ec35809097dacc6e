// ── Core: types ──────────────────────────────────────────────────────
export {
  Runtime,
  ProcessingGuarantee,
  SubscriptionMode,
  isRuntime,
  isProcessingGuarantee,
  isSubscriptionMode,
  DEFAULT_RUNTIME,
  DEFAULT_PARALLELISM,
  DEFAULT_PROCESSING_GUARANTEE,
  UNBOUNDED_RETRIES,
  VOID_TYPE,
} from './core/types.js';
export type {
  ConsumerConfig,
  Resources,
  WindowConfig,
  UserConfig,
  FunctionConfig,
  ConsumerSpec,
  SourceSpec,
  SinkSpec,
  RetryDetails,
  FunctionDetails,
  FunctionTypes,
} from './core/types.js';

// ── Core: errors ─────────────────────────────────────────────────────
export {
  InvalidConfigurationError,
  ArtifactError,
  isInvalidConfiguration,
  isArtifactError,
  errorMessage,
} from './core/errors.js';

// ── Core: parsing ────────────────────────────────────────────────────
export {
  parseFunctionConfig,
  parseFunctionDetails,
  parseWindowConfig,
  parseResources,
  parseProjectConfig,
  parseEnvironmentConfig,
} from './core/parse.js';
export { isRecord, isBlank, isNotBlank } from './core/guards.js';

// ── Core: config & environment ───────────────────────────────────────
export { defineConfig, defineFunction, applyFunctionDefaults } from './core/config.js';
export type { FnConfigProjectConfig, FunctionDefaults } from './core/config.js';
export {
  defineEnvironment,
  resolveEnvironment,
  applyOverrides,
  discoverEnvironments,
} from './core/environment.js';
export type { EnvironmentConfig, FunctionOverrides } from './core/environment.js';

// ── Translate ────────────────────────────────────────────────────────
export { collectInputTopics, buildInputSpecs } from './translate/input-topics.js';
export { deriveSubscriptionMode, reconstructDelivery } from './translate/subscription.js';
export type { DeliverySettings } from './translate/subscription.js';
export {
  WINDOW_CONFIG_KEY,
  serializeUserConfig,
  deserializeUserConfig,
  mergeWindowConfig,
  extractWindowConfig,
} from './translate/user-config.js';
export type { ExtractedUserConfig } from './translate/user-config.js';
export { toDetails, fromDetails, WINDOW_FUNCTION_EXECUTOR_CLASS } from './translate/translator.js';

// ── Validate ─────────────────────────────────────────────────────────
export { validate, runCommonChecks, runJavaChecks, RUNTIME_STRATEGIES } from './validate/pipeline.js';
export type {
  ValidateOptions,
  ValidationResult,
  RuntimeStrategy,
  RuntimeCheckContext,
} from './validate/pipeline.js';
export { DEFAULT_COLLABORATORS, resolveCollaborators } from './validate/collaborators.js';
export type { ValidationCollaborators, TypeCompatibilityCheck } from './validate/collaborators.js';
export {
  BUILTIN_SCHEME,
  isPackageUrlSupported,
  isBuiltin,
  localArtifactLoader,
  staticTypeResolver,
  createArtifactHandle,
  listArchiveEntries,
} from './validate/artifact.js';
export type {
  ArtifactLocator,
  ArtifactHandle,
  ArtifactLoader,
  FunctionTypeResolver,
} from './validate/artifact.js';
export { isValidTopicName, parseTopicName } from './validate/topic-name.js';
export type { ParsedTopicName } from './validate/topic-name.js';
export { validateWindowConfig, inferMissingWindowArguments } from './validate/window-config.js';
export { validateResourceLimits } from './validate/resources.js';
export { validateSchemaType, validateSerdeClass, DEFAULT_SERDE_CLASS } from './validate/schema.js';

// ── Codec ────────────────────────────────────────────────────────────
export { encodeFunctionDetails, decodeFunctionDetails } from './codec/details-codec.js';
