import {
  DEFAULT_PARALLELISM,
  DEFAULT_PROCESSING_GUARANTEE,
  DEFAULT_RUNTIME,
  SubscriptionMode,
  isProcessingGuarantee,
  isRuntime,
  isSubscriptionMode,
  type ConsumerConfig,
  type ConsumerSpec,
  type FunctionConfig,
  type FunctionDetails,
  type FunctionTypes,
  type Resources,
  type RetryDetails,
  type SinkSpec,
  type SourceSpec,
  type WindowConfig,
} from './types.js';
import type { FnConfigProjectConfig, FunctionDefaults } from './config.js';
import type { EnvironmentConfig, FunctionOverrides } from './environment.js';
import { InvalidConfigurationError } from './errors.js';
import {
  isRecord,
  readBoolean,
  readEnum,
  readNumber,
  readRecord,
  readString,
  readStringArray,
  readStringMap,
} from './guards.js';

// Loaders (JSON files, jiti-imported modules, decoded protobuf) hand us
// `unknown`; these narrow it into the typed records or throw
// InvalidConfigurationError naming the bad field.

function expectRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new InvalidConfigurationError(`${what} must be an object`);
  }
  return value;
}

// ── Shared pieces ───────────────────────────────────────────────────

export function parseResources(value: unknown, path = 'resources'): Resources {
  const obj = expectRecord(value, path);
  return {
    cpu: readNumber(obj, 'cpu', path),
    ram: readNumber(obj, 'ram', path),
    disk: readNumber(obj, 'disk', path),
  };
}

export function parseWindowConfig(value: unknown, path = 'windowConfig'): WindowConfig {
  const obj = expectRecord(value, path);
  return {
    windowLengthCount: readNumber(obj, 'windowLengthCount', path),
    windowLengthDurationMs: readNumber(obj, 'windowLengthDurationMs', path),
    slidingIntervalCount: readNumber(obj, 'slidingIntervalCount', path),
    slidingIntervalDurationMs: readNumber(obj, 'slidingIntervalDurationMs', path),
    lateDataTopic: readString(obj, 'lateDataTopic', path),
    maxLagMs: readNumber(obj, 'maxLagMs', path),
    watermarkEmitIntervalMs: readNumber(obj, 'watermarkEmitIntervalMs', path),
    timestampExtractorClassName: readString(obj, 'timestampExtractorClassName', path),
    actualWindowFunctionClassName: readString(obj, 'actualWindowFunctionClassName', path),
  };
}

function parseConsumerConfigs(
  obj: Record<string, unknown>,
): Record<string, ConsumerConfig> | undefined {
  const specs = readRecord(obj, 'inputSpecs');
  if (!specs) return undefined;

  const result = new Map<string, ConsumerConfig>();
  for (const [topic, raw] of Object.entries(specs)) {
    const path = `inputSpecs.${topic}`;
    const spec = expectRecord(raw, path);
    result.set(topic, {
      schemaType: readString(spec, 'schemaType', path),
      serdeClassName: readString(spec, 'serdeClassName', path),
      isRegexPattern: readBoolean(spec, 'isRegexPattern', path),
    });
  }
  return Object.fromEntries(result);
}

// ── parseFunctionConfig ─────────────────────────────────────────────

export function parseFunctionConfig(value: unknown): FunctionConfig {
  const obj = expectRecord(value, 'Function config');
  const resources = readRecord(obj, 'resources');
  const windowConfig = readRecord(obj, 'windowConfig');

  return {
    tenant: readString(obj, 'tenant'),
    namespace: readString(obj, 'namespace'),
    name: readString(obj, 'name'),
    className: readString(obj, 'className'),
    runtime: readEnum(obj, 'runtime', isRuntime),
    inputs: readStringArray(obj, 'inputs'),
    topicsPattern: readString(obj, 'topicsPattern'),
    customSerdeInputs: readStringMap(obj, 'customSerdeInputs'),
    customSchemaInputs: readStringMap(obj, 'customSchemaInputs'),
    inputSpecs: parseConsumerConfigs(obj),
    output: readString(obj, 'output'),
    outputSerdeClassName: readString(obj, 'outputSerdeClassName'),
    outputSchemaType: readString(obj, 'outputSchemaType'),
    logTopic: readString(obj, 'logTopic'),
    processingGuarantees: readEnum(obj, 'processingGuarantees', isProcessingGuarantee),
    retainOrdering: readBoolean(obj, 'retainOrdering'),
    subName: readString(obj, 'subName'),
    timeoutMs: readNumber(obj, 'timeoutMs'),
    autoAck: readBoolean(obj, 'autoAck'),
    maxMessageRetries: readNumber(obj, 'maxMessageRetries'),
    deadLetterTopic: readString(obj, 'deadLetterTopic'),
    parallelism: readNumber(obj, 'parallelism'),
    resources: resources ? parseResources(resources) : undefined,
    jar: readString(obj, 'jar'),
    py: readString(obj, 'py'),
    go: readString(obj, 'go'),
    userConfig: readRecord(obj, 'userConfig'),
    windowConfig: windowConfig ? parseWindowConfig(windowConfig) : undefined,
  };
}

// ── parseFunctionDetails ────────────────────────────────────────────

function parseConsumerSpecs(source: Record<string, unknown>): Record<string, ConsumerSpec> {
  const specs = readRecord(source, 'inputSpecs', 'source') ?? {};
  const result = new Map<string, ConsumerSpec>();
  for (const [topic, raw] of Object.entries(specs)) {
    const path = `source.inputSpecs.${topic}`;
    const spec = expectRecord(raw, path);
    result.set(topic, {
      serdeClassName: readString(spec, 'serdeClassName', path),
      schemaType: readString(spec, 'schemaType', path),
      isRegexPattern: readBoolean(spec, 'isRegexPattern', path) ?? false,
      typeClassName: readString(spec, 'typeClassName', path),
    });
  }
  return Object.fromEntries(result);
}

function parseSourceSpec(value: Record<string, unknown>): SourceSpec {
  return {
    inputSpecs: parseConsumerSpecs(value),
    subscriptionType:
      readEnum(value, 'subscriptionType', isSubscriptionMode, 'source') ?? SubscriptionMode.SHARED,
    subscriptionName: readString(value, 'subscriptionName', 'source'),
    timeoutMs: readNumber(value, 'timeoutMs', 'source'),
    typeClassName: readString(value, 'typeClassName', 'source'),
  };
}

function parseSinkSpec(value: Record<string, unknown>): SinkSpec {
  return {
    topic: readString(value, 'topic', 'sink'),
    serdeClassName: readString(value, 'serdeClassName', 'sink'),
    schemaType: readString(value, 'schemaType', 'sink'),
    typeClassName: readString(value, 'typeClassName', 'sink'),
  };
}

function parseRetryDetails(value: Record<string, unknown>): RetryDetails {
  return {
    maxMessageRetries: readNumber(value, 'maxMessageRetries', 'retryDetails') ?? 0,
    deadLetterTopic: readString(value, 'deadLetterTopic', 'retryDetails'),
  };
}

/**
 * Narrow a descriptor read from JSON or decoded from the wire. Fields the
 * wire format leaves out at their zero value come back as the descriptor's
 * defaults (JAVA, AT_LEAST_ONCE, SHARED, autoAck off).
 */
export function parseFunctionDetails(value: unknown): FunctionDetails {
  const obj = expectRecord(value, 'Function details');
  const source = readRecord(obj, 'source') ?? {};
  const sink = readRecord(obj, 'sink') ?? {};
  const retryDetails = readRecord(obj, 'retryDetails');
  const resources = readRecord(obj, 'resources');

  return {
    tenant: readString(obj, 'tenant'),
    namespace: readString(obj, 'namespace'),
    name: readString(obj, 'name'),
    className: readString(obj, 'className'),
    logTopic: readString(obj, 'logTopic'),
    runtime: readEnum(obj, 'runtime', isRuntime) ?? DEFAULT_RUNTIME,
    processingGuarantees:
      readEnum(obj, 'processingGuarantees', isProcessingGuarantee) ?? DEFAULT_PROCESSING_GUARANTEE,
    source: parseSourceSpec(source),
    sink: parseSinkSpec(sink),
    retryDetails: retryDetails ? parseRetryDetails(retryDetails) : undefined,
    userConfig: readString(obj, 'userConfig'),
    autoAck: readBoolean(obj, 'autoAck') ?? false,
    parallelism: readNumber(obj, 'parallelism') ?? DEFAULT_PARALLELISM,
    resources: resources ? parseResources(resources) : undefined,
  };
}

// ── Project files ───────────────────────────────────────────────────

function parseDefaults(value: Record<string, unknown>): FunctionDefaults {
  return {
    tenant: readString(value, 'tenant', 'defaults'),
    namespace: readString(value, 'namespace', 'defaults'),
    runtime: readEnum(value, 'runtime', isRuntime, 'defaults'),
    parallelism: readNumber(value, 'parallelism', 'defaults'),
    processingGuarantees: readEnum(value, 'processingGuarantees', isProcessingGuarantee, 'defaults'),
  };
}

export function parseProjectConfig(value: unknown): FnConfigProjectConfig {
  const obj = expectRecord(value, 'Project config');
  const defaults = readRecord(obj, 'defaults');
  const table = readRecord(obj, 'functionTypes');

  let functionTypes: Record<string, FunctionTypes> | undefined;
  if (table) {
    functionTypes = {};
    for (const [className, raw] of Object.entries(table)) {
      const path = `functionTypes.${className}`;
      const entry = expectRecord(raw, path);
      functionTypes[className] = {
        input: readString(entry, 'input', path) ?? '',
        output: readString(entry, 'output', path) ?? '',
      };
    }
  }

  return {
    defaults: defaults ? parseDefaults(defaults) : undefined,
    functionTypes,
  };
}

function parseOverrides(value: unknown, path: string): FunctionOverrides {
  const obj = expectRecord(value, path);
  const resources = readRecord(obj, 'resources', path);
  return {
    tenant: readString(obj, 'tenant', path),
    namespace: readString(obj, 'namespace', path),
    parallelism: readNumber(obj, 'parallelism', path),
    resources: resources ? parseResources(resources, `${path}.resources`) : undefined,
    userConfig: readRecord(obj, 'userConfig', path),
  };
}

export function parseEnvironmentConfig(value: unknown): EnvironmentConfig {
  const obj = expectRecord(value, 'Environment config');
  const name = readString(obj, 'name');
  if (name === undefined) {
    throw new InvalidConfigurationError('Environment config must have a name', { field: 'name' });
  }

  const cluster = readRecord(obj, 'cluster');
  const overrides = readRecord(obj, 'functionOverrides');

  let functionOverrides: Record<string, FunctionOverrides> | undefined;
  if (overrides) {
    functionOverrides = {};
    for (const [fnName, raw] of Object.entries(overrides)) {
      functionOverrides[fnName] = parseOverrides(raw, `functionOverrides.${fnName}`);
    }
  }

  return {
    name,
    cluster: cluster
      ? {
          tenant: readString(cluster, 'tenant', 'cluster'),
          namespace: readString(cluster, 'namespace', 'cluster'),
        }
      : undefined,
    functionOverrides,
  };
}
