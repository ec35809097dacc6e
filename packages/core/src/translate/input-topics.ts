import type { ConsumerSpec, FunctionConfig } from '../core/types.js';
import { isNotBlank, isNotEmpty } from '../core/guards.js';

// ── collectInputTopics ──────────────────────────────────────────────

/**
 * Every topic a config reads from, across all five input forms, in
 * declaration order: plain inputs, the topics pattern, custom-serde keys,
 * custom-schema keys, then input-spec keys. Duplicates are kept.
 */
export function collectInputTopics(config: FunctionConfig): string[] {
  const topics: string[] = [];

  if (config.inputs) {
    topics.push(...config.inputs);
  }
  if (config.topicsPattern != null) {
    topics.push(config.topicsPattern);
  }
  if (config.customSerdeInputs) {
    topics.push(...Object.keys(config.customSerdeInputs));
  }
  if (config.customSchemaInputs) {
    topics.push(...Object.keys(config.customSchemaInputs));
  }
  if (config.inputSpecs) {
    topics.push(...Object.keys(config.inputSpecs));
  }

  return topics;
}

// ── buildInputSpecs ─────────────────────────────────────────────────

/**
 * Normalize the input forms into one topic → consumer spec map.
 *
 * Forms are applied in the same order as {@link collectInputTopics}; a topic
 * named by several forms ends up with the spec of the last one. An input-spec
 * entry that sets both schema type and serde keeps only the schema type here;
 * rejecting that combination is validation's job.
 */
export function buildInputSpecs(config: FunctionConfig): Record<string, ConsumerSpec> {
  // Topic names are arbitrary keys ('__proto__' included), so collect into a Map.
  const specs = new Map<string, ConsumerSpec>();

  for (const topic of config.inputs ?? []) {
    specs.set(topic, { isRegexPattern: false });
  }

  if (isNotEmpty(config.topicsPattern)) {
    specs.set(config.topicsPattern, { isRegexPattern: true });
  }

  for (const [topic, serdeClassName] of Object.entries(config.customSerdeInputs ?? {})) {
    specs.set(topic, { serdeClassName, isRegexPattern: false });
  }

  for (const [topic, schemaType] of Object.entries(config.customSchemaInputs ?? {})) {
    specs.set(topic, { schemaType, isRegexPattern: false });
  }

  for (const [topic, consumer] of Object.entries(config.inputSpecs ?? {})) {
    const isRegexPattern = consumer.isRegexPattern ?? false;
    if (isNotBlank(consumer.schemaType)) {
      specs.set(topic, { schemaType: consumer.schemaType, isRegexPattern });
    } else if (isNotBlank(consumer.serdeClassName)) {
      specs.set(topic, { serdeClassName: consumer.serdeClassName, isRegexPattern });
    } else {
      specs.set(topic, { isRegexPattern });
    }
  }

  return Object.fromEntries(specs);
}
