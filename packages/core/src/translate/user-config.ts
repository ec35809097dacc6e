import type { UserConfig, WindowConfig } from '../core/types.js';
import { InvalidConfigurationError, errorMessage } from '../core/errors.js';
import { isRecord } from '../core/guards.js';
import { parseWindowConfig } from '../core/parse.js';

/** Reserved user-config key the windowing block travels under on the wire. */
export const WINDOW_CONFIG_KEY = '__WINDOWCONFIGS__';

// ── Serialization ───────────────────────────────────────────────────

export function serializeUserConfig(config: UserConfig): string {
  return JSON.stringify(config);
}

export function deserializeUserConfig(serialized: string): UserConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(serialized);
  } catch (err) {
    throw new InvalidConfigurationError(
      `userConfig is not valid JSON: ${errorMessage(err)}`,
      { field: 'userConfig', cause: err },
    );
  }
  if (!isRecord(parsed)) {
    throw new InvalidConfigurationError('userConfig must be a JSON object', { field: 'userConfig' });
  }
  return parsed;
}

// ── Windowing side channel ──────────────────────────────────────────

/**
 * The user-config bag as it goes on the wire: the caller's entries plus,
 * when windowing is on, the window block under {@link WINDOW_CONFIG_KEY}.
 */
export function mergeWindowConfig(
  userConfig: UserConfig | undefined,
  windowConfig: WindowConfig | undefined,
): UserConfig {
  const merged: UserConfig = { ...userConfig };
  if (windowConfig) {
    merged[WINDOW_CONFIG_KEY] = { ...windowConfig };
  }
  return merged;
}

export interface ExtractedUserConfig {
  readonly userConfig: UserConfig;
  readonly windowConfig?: WindowConfig;
}

/** Split a wire bag back into the caller's entries and the window block. */
export function extractWindowConfig(bag: UserConfig): ExtractedUserConfig {
  if (!(WINDOW_CONFIG_KEY in bag)) {
    return { userConfig: { ...bag } };
  }

  const { [WINDOW_CONFIG_KEY]: rawWindow, ...userConfig } = bag;
  return {
    userConfig,
    windowConfig: parseWindowConfig(rawWindow, `userConfig.${WINDOW_CONFIG_KEY}`),
  };
}
