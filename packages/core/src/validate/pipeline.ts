import {
  DEFAULT_PARALLELISM,
  DEFAULT_RUNTIME,
  ProcessingGuarantee,
  Runtime,
  UNBOUNDED_RETRIES,
  VOID_TYPE,
  type FunctionConfig,
  type FunctionTypes,
} from '../core/types.js';
import {
  ArtifactError,
  InvalidConfigurationError,
  errorMessage,
  isArtifactError,
  isInvalidConfiguration,
} from '../core/errors.js';
import { isBlank, isNotBlank, isNotEmpty } from '../core/guards.js';
import { collectInputTopics } from '../translate/input-topics.js';
import {
  isBuiltin,
  isPackageUrlSupported,
  type ArtifactHandle,
  type ArtifactLocator,
} from './artifact.js';
import { resolveCollaborators, type ValidationCollaborators } from './collaborators.js';

// ── Public types ────────────────────────────────────────────────────

export interface ValidateOptions {
  /** Package URL given alongside the config; takes priority over `uploadedFile` and `jar`. */
  readonly packageUrl?: string;
  /** Path of a package file already uploaded by the caller. */
  readonly uploadedFile?: string;
  readonly collaborators?: Partial<ValidationCollaborators>;
  /** Replace or add per-runtime checks. */
  readonly runtimeStrategies?: Partial<Record<Runtime, RuntimeStrategy>>;
}

export interface ValidationResult {
  /** Opened function package, for runtimes that introspect one. The caller owns it. */
  readonly artifact?: ArtifactHandle;
  readonly types?: FunctionTypes;
}

export interface RuntimeCheckContext {
  readonly collaborators: ValidationCollaborators;
  readonly packageUrl?: string;
  readonly uploadedFile?: string;
}

export interface RuntimeStrategy {
  check(config: FunctionConfig, context: RuntimeCheckContext): Promise<ValidationResult>;
}

function reject(message: string, field?: string): never {
  throw new InvalidConfigurationError(message, { field });
}

// ── Stage 1: common checks ──────────────────────────────────────────

export function runCommonChecks(config: FunctionConfig, collaborators: ValidationCollaborators): void {
  if (isBlank(config.tenant)) reject('Function tenant must be set', 'tenant');
  if (isBlank(config.namespace)) reject('Function namespace must be set', 'namespace');
  if (isBlank(config.name)) reject('Function name must be set', 'name');
  if (isBlank(config.className)) reject('Function class name must be set', 'className');

  const inputTopics = collectInputTopics(config);
  if (inputTopics.length === 0) {
    reject('No input topic(s) specified for the function', 'inputs');
  }
  for (const topic of inputTopics) {
    if (!collaborators.isValidTopicName(topic)) {
      reject(`Input topic ${topic} is invalid`, 'inputs');
    }
  }

  checkTopic(config.output, 'Output', 'output', collaborators);
  checkTopic(config.logTopic, 'Log', 'logTopic', collaborators);
  checkTopic(config.deadLetterTopic, 'DeadLetter', 'deadLetterTopic', collaborators);

  const parallelism = config.parallelism ?? DEFAULT_PARALLELISM;
  if (!Number.isInteger(parallelism)) {
    reject(`Function parallelism must be a whole number [${parallelism}]`, 'parallelism');
  }
  if (parallelism <= 0) {
    reject('Function parallelism should be a positive number', 'parallelism');
  }

  if (isNotEmpty(config.output) && inputTopics.includes(config.output)) {
    reject(
      `Output topic ${config.output} is also being used as an input topic (topics must be one or the other)`,
      'output',
    );
  }

  for (const [topic, spec] of Object.entries(config.inputSpecs ?? {})) {
    if (isNotBlank(spec.schemaType) && isNotBlank(spec.serdeClassName)) {
      reject('Only one of schemaType or serdeClassName should be set in inputSpec', `inputSpecs.${topic}`);
    }
  }

  if (config.windowConfig) {
    // The windowing executor acks on its own.
    if (config.autoAck === true) {
      reject('Cannot enable auto ack when using windowing functionality', 'autoAck');
    }
    collaborators.validateWindowConfig(config.windowConfig);
  }

  if (config.resources) {
    collaborators.validateResourceLimits(config.resources);
  }

  checkDelivery(config);
  checkArtifactPaths(config, collaborators);
}

function checkTopic(
  topic: string | undefined,
  label: string,
  field: string,
  collaborators: ValidationCollaborators,
): void {
  if (isNotEmpty(topic) && !collaborators.isValidTopicName(topic)) {
    reject(`${label} topic ${topic} is invalid`, field);
  }
}

function checkDelivery(config: FunctionConfig): void {
  const { timeoutMs, processingGuarantees } = config;
  const retries = config.maxMessageRetries ?? UNBOUNDED_RETRIES;

  if (!Number.isInteger(retries)) {
    reject(`MaxMessageRetries must be a whole number [${retries}]`, 'maxMessageRetries');
  }
  if (timeoutMs != null && !Number.isInteger(timeoutMs)) {
    reject(`Function timeout must be a whole number of milliseconds [${timeoutMs}]`, 'timeoutMs');
  }
  if (timeoutMs != null && timeoutMs <= 0) {
    reject('Function timeout must be a positive number', 'timeoutMs');
  }
  if (
    timeoutMs != null &&
    processingGuarantees != null &&
    processingGuarantees !== ProcessingGuarantee.AT_LEAST_ONCE
  ) {
    reject(
      `Message timeout can only be specified with processing guarantee ${ProcessingGuarantee.AT_LEAST_ONCE}`,
      'timeoutMs',
    );
  }
  if (retries >= 0 && processingGuarantees === ProcessingGuarantee.EFFECTIVELY_ONCE) {
    reject('MaxMessageRetries and effectively-once processing cannot be combined', 'maxMessageRetries');
  }
  if (retries < 0 && isNotEmpty(config.deadLetterTopic)) {
    reject('Dead letter topic specified, however max retries is set to infinity', 'deadLetterTopic');
  }
}

const PACKAGE_FIELDS = [
  { field: 'jar', label: 'jar file' },
  { field: 'py', label: 'python file' },
  { field: 'go', label: 'go executable' },
] as const;

function checkArtifactPaths(config: FunctionConfig, collaborators: ValidationCollaborators): void {
  for (const { field, label } of PACKAGE_FIELDS) {
    const locator = config[field];
    if (!isNotEmpty(locator) || isBuiltin(locator) || isPackageUrlSupported(locator)) continue;
    if (!collaborators.fileExists(locator)) {
      reject(`The supplied ${label} does not exist`, field);
    }
  }
}

// ── Stage 2: runtime checks ─────────────────────────────────────────

async function resolveArtifact(
  config: FunctionConfig,
  context: RuntimeCheckContext,
): Promise<ArtifactHandle> {
  const { collaborators } = context;
  let locator: ArtifactLocator;

  if (isNotBlank(context.packageUrl)) {
    locator = { kind: 'url', url: context.packageUrl };
  } else if (isNotEmpty(context.uploadedFile)) {
    locator = { kind: 'file', path: context.uploadedFile };
  } else if (isNotEmpty(config.jar) && isPackageUrlSupported(config.jar)) {
    locator = { kind: 'url', url: config.jar };
  } else if (isNotEmpty(config.jar) && !isBuiltin(config.jar)) {
    if (!collaborators.fileExists(config.jar)) {
      reject('Jar file does not exist', 'jar');
    }
    locator = { kind: 'file', path: config.jar };
  } else {
    reject('Function Package is not provided', 'jar');
  }

  try {
    return await collaborators.artifactLoader.load(locator);
  } catch (err) {
    if (isArtifactError(err)) throw err;
    throw new ArtifactError(`Corrupted Jar File: ${errorMessage(err)}`, { cause: err });
  }
}

async function resolveTypes(
  config: FunctionConfig,
  artifact: ArtifactHandle,
  collaborators: ValidationCollaborators,
): Promise<FunctionTypes> {
  try {
    return await collaborators.typeResolver.resolve(config, artifact);
  } catch (err) {
    if (isArtifactError(err) || isInvalidConfiguration(err)) throw err;
    throw new ArtifactError(`Could not resolve function types: ${errorMessage(err)}`, {
      locator: artifact.locator,
      cause: err,
    });
  }
}

export function runJavaChecks(
  config: FunctionConfig,
  types: FunctionTypes,
  artifact: ArtifactHandle,
  collaborators: ValidationCollaborators,
): void {
  const { validateSerdeClass, validateSchemaType } = collaborators;

  for (const serde of Object.values(config.customSerdeInputs ?? {})) {
    validateSerdeClass(serde, types.input, artifact, true);
  }
  for (const schema of Object.values(config.customSchemaInputs ?? {})) {
    validateSchemaType(schema, types.input, artifact, true);
  }
  for (const spec of Object.values(config.inputSpecs ?? {})) {
    if (isNotBlank(spec.serdeClassName)) {
      validateSerdeClass(spec.serdeClassName, types.input, artifact, true);
    }
    if (isNotBlank(spec.schemaType)) {
      validateSchemaType(spec.schemaType, types.input, artifact, true);
    }
  }

  if (types.output === VOID_TYPE) {
    return;
  }

  if (isNotBlank(config.outputSerdeClassName) && isNotBlank(config.outputSchemaType)) {
    reject('Only one of outputSchemaType or outputSerdeClassName should be set', 'outputSchemaType');
  }
  if (isNotBlank(config.outputSchemaType)) {
    validateSchemaType(config.outputSchemaType, types.output, artifact, false);
  }
  if (isNotBlank(config.outputSerdeClassName)) {
    validateSerdeClass(config.outputSerdeClassName, types.output, artifact, false);
  }
}

const javaStrategy: RuntimeStrategy = {
  async check(config, context) {
    const artifact = await resolveArtifact(config, context);
    const types = await resolveTypes(config, artifact, context.collaborators);
    runJavaChecks(config, types, artifact, context.collaborators);
    return { artifact, types };
  },
};

/** Runtimes without type introspection, and without the features that need it. */
function restrictedStrategy(label: string): RuntimeStrategy {
  return {
    async check(config) {
      if (config.processingGuarantees === ProcessingGuarantee.EFFECTIVELY_ONCE) {
        reject(`Effectively-once processing guarantees not yet supported in ${label}`, 'processingGuarantees');
      }
      if (config.windowConfig) {
        reject(`There is currently no support for windowing in ${label}`, 'windowConfig');
      }
      if ((config.maxMessageRetries ?? UNBOUNDED_RETRIES) >= 0) {
        reject(`Message retries not yet supported in ${label}`, 'maxMessageRetries');
      }
      return {};
    },
  };
}

export const RUNTIME_STRATEGIES: Readonly<Record<Runtime, RuntimeStrategy>> = {
  [Runtime.JAVA]: javaStrategy,
  [Runtime.PYTHON]: restrictedStrategy('Python'),
  [Runtime.GO]: restrictedStrategy('Go'),
};

// ── validate ────────────────────────────────────────────────────────

/**
 * Gate a function config: common checks, then the runtime's own. The first
 * violation rejects with InvalidConfigurationError, or ArtifactError when
 * the function package cannot be opened or introspected.
 */
export async function validate(
  config: FunctionConfig,
  options: ValidateOptions = {},
): Promise<ValidationResult> {
  const collaborators = resolveCollaborators(options.collaborators);
  runCommonChecks(config, collaborators);

  const runtime = config.runtime ?? DEFAULT_RUNTIME;
  const strategy = options.runtimeStrategies?.[runtime] ?? RUNTIME_STRATEGIES[runtime];
  return strategy.check(config, {
    collaborators,
    packageUrl: options.packageUrl,
    uploadedFile: options.uploadedFile,
  });
}
