import {
  DEFAULT_PARALLELISM,
  DEFAULT_PROCESSING_GUARANTEE,
  DEFAULT_RUNTIME,
  Runtime,
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
} from '../core/types.js';
import { isNotBlank, isNotEmpty } from '../core/guards.js';
import { buildInputSpecs } from './input-topics.js';
import { deriveSubscriptionMode, reconstructDelivery } from './subscription.js';
import {
  deserializeUserConfig,
  extractWindowConfig,
  mergeWindowConfig,
  serializeUserConfig,
} from './user-config.js';

/** Class the runtime runs in place of a windowed function; it wraps the real one. */
export const WINDOW_FUNCTION_EXECUTOR_CLASS =
  'org.apache.pulsar.functions.windowing.WindowFunctionExecutor';

// ── toDetails ───────────────────────────────────────────────────────

/**
 * Map a function config onto the runtime descriptor.
 *
 * Purely structural: a config that would fail validation still maps, to
 * whatever it says. `types` are attached to source and sink only for the
 * JAVA runtime.
 */
export function toDetails(config: FunctionConfig, types?: FunctionTypes): FunctionDetails {
  const runtime = config.runtime ?? DEFAULT_RUNTIME;
  const javaTypes = runtime === Runtime.JAVA ? types : undefined;

  const { userConfig, className } = buildUserConfig(config);

  return {
    tenant: config.tenant,
    namespace: config.namespace,
    name: config.name,
    className,
    logTopic: config.logTopic,
    runtime,
    processingGuarantees: config.processingGuarantees ?? DEFAULT_PROCESSING_GUARANTEE,
    source: buildSourceSpec(config, javaTypes),
    sink: buildSinkSpec(config, javaTypes),
    retryDetails: buildRetryDetails(config),
    userConfig,
    autoAck: config.autoAck ?? false,
    parallelism: config.parallelism ?? DEFAULT_PARALLELISM,
    resources: config.resources ? copyResources(config.resources) : undefined,
  };
}

function buildSourceSpec(config: FunctionConfig, types: FunctionTypes | undefined): SourceSpec {
  let inputSpecs: Record<string, ConsumerSpec> = buildInputSpecs(config);
  if (types) {
    inputSpecs = Object.fromEntries(
      Object.entries(inputSpecs).map(([topic, spec]) => [topic, { ...spec, typeClassName: types.input }]),
    );
  }

  return {
    inputSpecs,
    subscriptionType: deriveSubscriptionMode(config.retainOrdering ?? false, config.processingGuarantees),
    subscriptionName: isNotBlank(config.subName) ? config.subName : undefined,
    timeoutMs: config.timeoutMs,
    typeClassName: types?.input,
  };
}

function buildSinkSpec(config: FunctionConfig, types: FunctionTypes | undefined): SinkSpec {
  return {
    topic: config.output,
    serdeClassName: isNotBlank(config.outputSerdeClassName) ? config.outputSerdeClassName : undefined,
    schemaType: isNotBlank(config.outputSchemaType) ? config.outputSchemaType : undefined,
    typeClassName: types?.output,
  };
}

function buildRetryDetails(config: FunctionConfig): RetryDetails | undefined {
  if (config.maxMessageRetries === undefined || config.maxMessageRetries < 0) {
    return undefined;
  }
  return {
    maxMessageRetries: config.maxMessageRetries,
    deadLetterTopic: isNotEmpty(config.deadLetterTopic) ? config.deadLetterTopic : undefined,
  };
}

function buildUserConfig(config: FunctionConfig): {
  userConfig: string | undefined;
  className: string | undefined;
} {
  let windowConfig: WindowConfig | undefined;
  let className = config.className;

  if (config.windowConfig) {
    windowConfig = { ...config.windowConfig, actualWindowFunctionClassName: config.className };
    className = WINDOW_FUNCTION_EXECUTOR_CLASS;
  }

  const bag = mergeWindowConfig(config.userConfig, windowConfig);
  return {
    userConfig: Object.keys(bag).length > 0 ? serializeUserConfig(bag) : undefined,
    className,
  };
}

function copyResources(resources: Resources): Resources {
  return { cpu: resources.cpu, ram: resources.ram, disk: resources.disk };
}

// ── fromDetails ─────────────────────────────────────────────────────

/**
 * Map a runtime descriptor back onto a function config.
 *
 * Inputs always come back in the `inputSpecs` form. Ordering and guarantee
 * are rebuilt from the subscription mode, so AT_MOST_ONCE reads back as
 * AT_LEAST_ONCE. A windowed descriptor yields the wrapped class name and a
 * window config without the executor's back-reference.
 */
export function fromDetails(details: FunctionDetails): FunctionConfig {
  const inputSpecs = Object.fromEntries(
    Object.entries(details.source.inputSpecs).map(([topic, spec]): [string, ConsumerConfig] => [
      topic,
      {
        serdeClassName: isNotEmpty(spec.serdeClassName) ? spec.serdeClassName : undefined,
        schemaType: isNotEmpty(spec.schemaType) ? spec.schemaType : undefined,
        isRegexPattern: spec.isRegexPattern,
      },
    ]),
  );

  const delivery = reconstructDelivery(details.source.subscriptionType);

  const bag = isNotEmpty(details.userConfig) ? deserializeUserConfig(details.userConfig) : {};
  const { userConfig, windowConfig } = extractWindowConfig(bag);

  let className = details.className;
  let restoredWindow: WindowConfig | undefined;
  if (windowConfig) {
    const { actualWindowFunctionClassName, ...rest } = windowConfig;
    className = actualWindowFunctionClassName;
    restoredWindow = rest;
  }

  return {
    tenant: details.tenant,
    namespace: details.namespace,
    name: details.name,
    className,
    runtime: details.runtime,
    inputSpecs,
    output: isNotEmpty(details.sink.topic) ? details.sink.topic : undefined,
    outputSerdeClassName: isNotEmpty(details.sink.serdeClassName) ? details.sink.serdeClassName : undefined,
    outputSchemaType: isNotEmpty(details.sink.schemaType) ? details.sink.schemaType : undefined,
    logTopic: isNotEmpty(details.logTopic) ? details.logTopic : undefined,
    processingGuarantees: delivery.processingGuarantees,
    retainOrdering: delivery.retainOrdering,
    subName: isNotEmpty(details.source.subscriptionName) ? details.source.subscriptionName : undefined,
    timeoutMs: details.source.timeoutMs,
    autoAck: details.autoAck,
    maxMessageRetries: details.retryDetails?.maxMessageRetries,
    deadLetterTopic: isNotEmpty(details.retryDetails?.deadLetterTopic)
      ? details.retryDetails?.deadLetterTopic
      : undefined,
    parallelism: details.parallelism,
    resources: details.resources ? copyResources(details.resources) : undefined,
    // The descriptor drops an empty bag, so an empty one reads back as unset.
    userConfig: Object.keys(userConfig).length > 0 ? userConfig : undefined,
    windowConfig: restoredWindow,
  };
}
