import type { WindowConfig } from '../core/types.js';
import { InvalidConfigurationError } from '../core/errors.js';

export const DEFAULT_MAX_LAG_MS = 0;
export const DEFAULT_WATERMARK_EMIT_INTERVAL_MS = 1000;

function fail(message: string, field: string): never {
  throw new InvalidConfigurationError(message, { field: `windowConfig.${field}` });
}

// ── validateWindowConfig ────────────────────────────────────────────

export function validateWindowConfig(window: WindowConfig): void {
  const { windowLengthCount, windowLengthDurationMs } = window;
  if (windowLengthCount == null && windowLengthDurationMs == null) {
    fail('Window length is not specified', 'windowLengthCount');
  }
  if (windowLengthCount != null && windowLengthDurationMs != null) {
    fail('Window length for time and count are set! Please set one or the other.', 'windowLengthCount');
  }
  if (windowLengthCount != null && windowLengthCount <= 0) {
    fail(`Window length must be positive [${windowLengthCount}]`, 'windowLengthCount');
  }
  if (windowLengthDurationMs != null && windowLengthDurationMs <= 0) {
    fail(`Window length must be positive [${windowLengthDurationMs}]`, 'windowLengthDurationMs');
  }

  const { slidingIntervalCount, slidingIntervalDurationMs } = window;
  if (slidingIntervalCount != null && slidingIntervalDurationMs != null) {
    fail('Sliding interval for time and count are set! Please set one or the other.', 'slidingIntervalCount');
  }
  if (slidingIntervalCount != null && slidingIntervalCount <= 0) {
    fail(`Sliding interval must be positive [${slidingIntervalCount}]`, 'slidingIntervalCount');
  }
  if (slidingIntervalDurationMs != null && slidingIntervalDurationMs <= 0) {
    fail(`Sliding interval must be positive [${slidingIntervalDurationMs}]`, 'slidingIntervalDurationMs');
  }

  // The sliding interval is measured in the same unit as the length.
  if (windowLengthCount != null && slidingIntervalDurationMs != null) {
    fail('A count window needs a count sliding interval', 'slidingIntervalDurationMs');
  }
  if (windowLengthDurationMs != null && slidingIntervalCount != null) {
    fail('A time window needs a time sliding interval', 'slidingIntervalCount');
  }

  if (window.timestampExtractorClassName == null) {
    if (window.maxLagMs != null) {
      fail('Lag duration needs a timestamp extractor', 'maxLagMs');
    }
    if (window.watermarkEmitIntervalMs != null) {
      fail('Watermark interval needs a timestamp extractor', 'watermarkEmitIntervalMs');
    }
    return;
  }
  if (window.maxLagMs != null && window.maxLagMs < 0) {
    fail(`Lag duration must be positive [${window.maxLagMs}]`, 'maxLagMs');
  }
  if (window.watermarkEmitIntervalMs != null && window.watermarkEmitIntervalMs <= 0) {
    fail(`Watermark interval must be positive [${window.watermarkEmitIntervalMs}]`, 'watermarkEmitIntervalMs');
  }
}

// ── inferMissingWindowArguments ─────────────────────────────────────

/**
 * Fill what the executor would otherwise assume: no sliding interval means a
 * tumbling window, and event-time windows get lag and watermark defaults.
 */
export function inferMissingWindowArguments(window: WindowConfig): WindowConfig {
  let result: WindowConfig = { ...window };

  if (result.slidingIntervalCount == null && result.slidingIntervalDurationMs == null) {
    result = result.windowLengthCount != null
      ? { ...result, slidingIntervalCount: result.windowLengthCount }
      : { ...result, slidingIntervalDurationMs: result.windowLengthDurationMs };
  }

  if (result.timestampExtractorClassName != null) {
    result = {
      ...result,
      maxLagMs: result.maxLagMs ?? DEFAULT_MAX_LAG_MS,
      watermarkEmitIntervalMs: result.watermarkEmitIntervalMs ?? DEFAULT_WATERMARK_EMIT_INTERVAL_MS,
    };
  }

  return result;
}
