import type { Resources } from '../core/types.js';
import { InvalidConfigurationError } from '../core/errors.js';

export function validateResourceLimits(resources: Resources): void {
  for (const key of ['cpu', 'ram', 'disk'] as const) {
    const value = resources[key];
    if (value != null && value <= 0) {
      throw new InvalidConfigurationError(
        `The ${key} allocation for the function must be positive`,
        { field: `resources.${key}` },
      );
    }
  }
}
