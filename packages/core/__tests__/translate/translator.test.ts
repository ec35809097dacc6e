import { describe, it, expect } from 'vitest';
import {
  ProcessingGuarantee,
  Runtime,
  SubscriptionMode,
  type FunctionConfig,
} from '../../src/core/types.js';
import { toDetails, fromDetails, WINDOW_FUNCTION_EXECUTOR_CLASS } from '../../src/translate/translator.js';
import { WINDOW_CONFIG_KEY } from '../../src/translate/user-config.js';

const IN = 'persistent://t/ns/in';
const OUT = 'persistent://t/ns/out';

const base: FunctionConfig = {
  tenant: 't',
  namespace: 'ns',
  name: 'f',
  className: 'com.x.F',
  runtime: Runtime.JAVA,
  inputs: [IN],
  output: OUT,
  parallelism: 1,
  processingGuarantees: ProcessingGuarantee.AT_LEAST_ONCE,
};

const full: FunctionConfig = {
  tenant: 't',
  namespace: 'ns',
  name: 'f',
  className: 'com.x.F',
  runtime: Runtime.JAVA,
  inputSpecs: {
    [IN]: { schemaType: 'JSON', isRegexPattern: false },
    'persistent://t/ns/in-.*': { serdeClassName: 'com.x.Serde', isRegexPattern: true },
  },
  output: OUT,
  outputSchemaType: 'AVRO',
  logTopic: 'persistent://t/ns/log',
  processingGuarantees: ProcessingGuarantee.AT_LEAST_ONCE,
  retainOrdering: false,
  subName: 'sub',
  timeoutMs: 3000,
  autoAck: true,
  maxMessageRetries: 3,
  deadLetterTopic: 'persistent://t/ns/dlq',
  parallelism: 4,
  resources: { cpu: 0.5, ram: 1024, disk: 2048 },
  userConfig: { threshold: 5, nested: { a: [1, 2] } },
};

describe('toDetails', () => {
  it('maps a minimal config', () => {
    const details = toDetails(base);

    expect(details.tenant).toBe('t');
    expect(details.namespace).toBe('ns');
    expect(details.name).toBe('f');
    expect(details.className).toBe('com.x.F');
    expect(details.runtime).toBe(Runtime.JAVA);
    expect(details.processingGuarantees).toBe(ProcessingGuarantee.AT_LEAST_ONCE);
    expect(details.source.inputSpecs).toEqual({ [IN]: { isRegexPattern: false } });
    expect(details.source.subscriptionType).toBe(SubscriptionMode.SHARED);
    expect(details.sink.topic).toBe(OUT);
    expect(details.retryDetails).toBeUndefined();
    expect(details.userConfig).toBeUndefined();
    expect(details.autoAck).toBe(false);
    expect(details.parallelism).toBe(1);
    expect(details.resources).toBeUndefined();
  });

  it('uses FAILOVER for ordered or effectively-once functions', () => {
    expect(toDetails({ ...base, retainOrdering: true }).source.subscriptionType).toBe(SubscriptionMode.FAILOVER);
    expect(
      toDetails({ ...base, processingGuarantees: ProcessingGuarantee.EFFECTIVELY_ONCE }).source.subscriptionType,
    ).toBe(SubscriptionMode.FAILOVER);
  });

  it('builds retry details only for bounded retries', () => {
    expect(toDetails({ ...base, maxMessageRetries: -1 }).retryDetails).toBeUndefined();
    expect(toDetails({ ...base, maxMessageRetries: 0 }).retryDetails).toEqual({ maxMessageRetries: 0 });
    expect(
      toDetails({ ...base, maxMessageRetries: 2, deadLetterTopic: 'persistent://t/ns/dlq' }).retryDetails,
    ).toEqual({ maxMessageRetries: 2, deadLetterTopic: 'persistent://t/ns/dlq' });
  });

  it('serializes a non-empty user config and skips an empty one', () => {
    expect(toDetails({ ...base, userConfig: {} }).userConfig).toBeUndefined();
    expect(toDetails({ ...base, userConfig: { k: 'v' } }).userConfig).toBe('{"k":"v"}');
  });

  it('attaches resolved types for JAVA functions', () => {
    const details = toDetails(base, { input: 'java.lang.String', output: 'java.lang.Integer' });

    expect(details.source.typeClassName).toBe('java.lang.String');
    expect(details.source.inputSpecs[IN].typeClassName).toBe('java.lang.String');
    expect(details.sink.typeClassName).toBe('java.lang.Integer');
  });

  it('ignores resolved types for other runtimes', () => {
    const details = toDetails(
      { ...base, runtime: Runtime.PYTHON },
      { input: 'java.lang.String', output: 'java.lang.Integer' },
    );

    expect(details.source.typeClassName).toBeUndefined();
    expect(details.sink.typeClassName).toBeUndefined();
  });

  it('swaps in the window executor and stashes the function class', () => {
    const config: FunctionConfig = {
      ...base,
      userConfig: { threshold: 5 },
      windowConfig: { windowLengthCount: 10, slidingIntervalCount: 5 },
    };

    const details = toDetails(config);

    expect(details.className).toBe(WINDOW_FUNCTION_EXECUTOR_CLASS);
    expect(JSON.parse(details.userConfig ?? '')).toEqual({
      threshold: 5,
      [WINDOW_CONFIG_KEY]: {
        windowLengthCount: 10,
        slidingIntervalCount: 5,
        actualWindowFunctionClassName: 'com.x.F',
      },
    });
    // input config is left alone
    expect(config.windowConfig).toEqual({ windowLengthCount: 10, slidingIntervalCount: 5 });
  });

  it('collapses every input form into one spec map', () => {
    const details = toDetails({
      ...base,
      inputs: ['persistent://t/ns/a'],
      topicsPattern: 'persistent://t/ns/p-.*',
      customSerdeInputs: { 'persistent://t/ns/b': 'com.x.Serde' },
      customSchemaInputs: { 'persistent://t/ns/c': 'JSON' },
    });

    expect(details.source.inputSpecs).toEqual({
      'persistent://t/ns/a': { isRegexPattern: false },
      'persistent://t/ns/p-.*': { isRegexPattern: true },
      'persistent://t/ns/b': { serdeClassName: 'com.x.Serde', isRegexPattern: false },
      'persistent://t/ns/c': { schemaType: 'JSON', isRegexPattern: false },
    });
  });
});

describe('fromDetails', () => {
  it('round-trips a full config', () => {
    expect(fromDetails(toDetails(full))).toEqual(full);
  });

  it('round-trips an ordered effectively-once config', () => {
    const config: FunctionConfig = {
      ...full,
      processingGuarantees: ProcessingGuarantee.EFFECTIVELY_ONCE,
      retainOrdering: true,
      timeoutMs: undefined,
      maxMessageRetries: undefined,
      deadLetterTopic: undefined,
    };

    expect(fromDetails(toDetails(config))).toEqual(config);
  });

  it('reads AT_MOST_ONCE back as AT_LEAST_ONCE', () => {
    const config = fromDetails(
      toDetails({ ...base, processingGuarantees: ProcessingGuarantee.AT_MOST_ONCE }),
    );

    expect(config.processingGuarantees).toBe(ProcessingGuarantee.AT_LEAST_ONCE);
    expect(config.retainOrdering).toBe(false);
  });

  it('returns legacy input forms as input specs', () => {
    const config = fromDetails(
      toDetails({
        ...base,
        inputs: ['persistent://t/ns/a'],
        customSerdeInputs: { 'persistent://t/ns/b': 'com.x.Serde' },
      }),
    );

    expect(config.inputs).toBeUndefined();
    expect(config.customSerdeInputs).toBeUndefined();
    expect(config.inputSpecs).toEqual({
      'persistent://t/ns/a': { isRegexPattern: false },
      'persistent://t/ns/b': { serdeClassName: 'com.x.Serde', isRegexPattern: false },
    });
  });

  it('restores the function class and window config from a windowed descriptor', () => {
    const config: FunctionConfig = {
      ...full,
      autoAck: false,
      windowConfig: { windowLengthDurationMs: 60000, slidingIntervalDurationMs: 10000 },
    };

    const restored = fromDetails(toDetails(config));

    expect(restored.className).toBe('com.x.F');
    expect(restored.windowConfig).toEqual({ windowLengthDurationMs: 60000, slidingIntervalDurationMs: 10000 });
    expect(restored.userConfig).toEqual({ threshold: 5, nested: { a: [1, 2] } });
    expect(restored).toEqual(config);
  });

  it('takes the class name directly when no window block is present', () => {
    const details = { ...toDetails(base), className: 'com.x.Other' };
    expect(fromDetails(details).className).toBe('com.x.Other');
  });

  it('leaves user config unset when the descriptor carries none', () => {
    const restored = fromDetails(toDetails(base));

    expect(restored.userConfig).toBeUndefined();
    expect(fromDetails(toDetails({ ...base, userConfig: { k: 'v' } })).userConfig).toEqual({ k: 'v' });
  });

  it('keeps a topic named __proto__ as an ordinary entry', () => {
    const details = toDetails({ ...base, inputs: ['__proto__'] });

    expect(Object.keys(details.source.inputSpecs)).toEqual(['__proto__']);
    expect(Object.keys(fromDetails(details).inputSpecs ?? {})).toEqual(['__proto__']);
  });
});
