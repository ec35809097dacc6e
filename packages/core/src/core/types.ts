// ── Runtime ──────────────────────────────────────────────────────────

export enum Runtime {
  JAVA = 'JAVA',
  PYTHON = 'PYTHON',
  GO = 'GO',
}

// ── Delivery semantics ───────────────────────────────────────────────

export enum ProcessingGuarantee {
  AT_LEAST_ONCE = 'AT_LEAST_ONCE',
  AT_MOST_ONCE = 'AT_MOST_ONCE',
  EFFECTIVELY_ONCE = 'EFFECTIVELY_ONCE',
}

export enum SubscriptionMode {
  SHARED = 'SHARED',
  FAILOVER = 'FAILOVER',
}

const RUNTIMES: ReadonlySet<string> = new Set(Object.values(Runtime));
const GUARANTEES: ReadonlySet<string> = new Set(Object.values(ProcessingGuarantee));
const SUBSCRIPTION_MODES: ReadonlySet<string> = new Set(Object.values(SubscriptionMode));

export function isRuntime(value: unknown): value is Runtime {
  return typeof value === 'string' && RUNTIMES.has(value);
}

export function isProcessingGuarantee(value: unknown): value is ProcessingGuarantee {
  return typeof value === 'string' && GUARANTEES.has(value);
}

export function isSubscriptionMode(value: unknown): value is SubscriptionMode {
  return typeof value === 'string' && SUBSCRIPTION_MODES.has(value);
}

// ── Defaults ─────────────────────────────────────────────────────────

export const DEFAULT_RUNTIME = Runtime.JAVA;
export const DEFAULT_PARALLELISM = 1;
export const DEFAULT_PROCESSING_GUARANTEE = ProcessingGuarantee.AT_LEAST_ONCE;

/** Negative retry counts mean "retry forever"; there is no dead-letter hand-off. */
export const UNBOUNDED_RETRIES = -1;

// ── Function config (user-facing) ────────────────────────────────────

export interface ConsumerConfig {
  readonly schemaType?: string;
  readonly serdeClassName?: string;
  readonly isRegexPattern?: boolean;
}

export interface Resources {
  readonly cpu?: number;
  readonly ram?: number;
  readonly disk?: number;
}

export interface WindowConfig {
  readonly windowLengthCount?: number;
  readonly windowLengthDurationMs?: number;
  readonly slidingIntervalCount?: number;
  readonly slidingIntervalDurationMs?: number;
  readonly lateDataTopic?: string;
  readonly maxLagMs?: number;
  readonly watermarkEmitIntervalMs?: number;
  readonly timestampExtractorClassName?: string;
  /** Class the windowing executor delegates to. Filled in during translation. */
  readonly actualWindowFunctionClassName?: string;
}

export type UserConfig = Record<string, unknown>;

export interface FunctionConfig {
  readonly tenant?: string;
  readonly namespace?: string;
  readonly name?: string;
  readonly className?: string;
  readonly runtime?: Runtime;

  // Input addressing. Every form below feeds the same topic → consumer spec map.
  readonly inputs?: readonly string[];
  readonly topicsPattern?: string;
  readonly customSerdeInputs?: Readonly<Record<string, string>>;
  readonly customSchemaInputs?: Readonly<Record<string, string>>;
  readonly inputSpecs?: Readonly<Record<string, ConsumerConfig>>;

  readonly output?: string;
  readonly outputSerdeClassName?: string;
  readonly outputSchemaType?: string;
  readonly logTopic?: string;

  readonly processingGuarantees?: ProcessingGuarantee;
  readonly retainOrdering?: boolean;
  readonly subName?: string;
  readonly timeoutMs?: number;
  readonly autoAck?: boolean;

  readonly maxMessageRetries?: number;
  readonly deadLetterTopic?: string;

  readonly parallelism?: number;
  readonly resources?: Resources;
  readonly jar?: string;
  readonly py?: string;
  readonly go?: string;

  readonly userConfig?: UserConfig;
  readonly windowConfig?: WindowConfig;
}

// ── Function details (runtime descriptor) ────────────────────────────

export interface ConsumerSpec {
  readonly serdeClassName?: string;
  readonly schemaType?: string;
  readonly isRegexPattern: boolean;
  readonly typeClassName?: string;
}

export interface SourceSpec {
  readonly inputSpecs: Readonly<Record<string, ConsumerSpec>>;
  readonly subscriptionType: SubscriptionMode;
  readonly subscriptionName?: string;
  readonly timeoutMs?: number;
  readonly typeClassName?: string;
}

export interface SinkSpec {
  readonly topic?: string;
  readonly serdeClassName?: string;
  readonly schemaType?: string;
  readonly typeClassName?: string;
}

export interface RetryDetails {
  readonly maxMessageRetries: number;
  readonly deadLetterTopic?: string;
}

export interface FunctionDetails {
  readonly tenant?: string;
  readonly namespace?: string;
  readonly name?: string;
  readonly className?: string;
  readonly logTopic?: string;
  readonly runtime: Runtime;
  readonly processingGuarantees: ProcessingGuarantee;
  readonly source: SourceSpec;
  readonly sink: SinkSpec;
  readonly retryDetails?: RetryDetails;
  /** Serialized user config, including the windowing block when present. */
  readonly userConfig?: string;
  readonly autoAck: boolean;
  readonly parallelism: number;
  readonly resources?: Resources;
}

// ── Resolved function types ──────────────────────────────────────────

/** Type class names a function declares for its input and output. */
export interface FunctionTypes {
  readonly input: string;
  readonly output: string;
}

/** Output type of a function that never emits. Output checks are skipped for it. */
export const VOID_TYPE = 'java.lang.Void';
