import { ProcessingGuarantee, SubscriptionMode } from '../core/types.js';

export interface DeliverySettings {
  readonly retainOrdering: boolean;
  readonly processingGuarantees: ProcessingGuarantee;
}

// ── deriveSubscriptionMode ──────────────────────────────────────────

/** Ordered delivery and effectively-once both need a single active consumer. */
export function deriveSubscriptionMode(
  retainOrdering: boolean,
  guarantee: ProcessingGuarantee | undefined,
): SubscriptionMode {
  return retainOrdering || guarantee === ProcessingGuarantee.EFFECTIVELY_ONCE
    ? SubscriptionMode.FAILOVER
    : SubscriptionMode.SHARED;
}

// ── reconstructDelivery ─────────────────────────────────────────────

/**
 * Inverse of {@link deriveSubscriptionMode}. Lossy: FAILOVER always comes
 * back as ordered + effectively-once, SHARED as unordered + at-least-once,
 * so AT_MOST_ONCE never survives a round trip.
 */
export function reconstructDelivery(mode: SubscriptionMode): DeliverySettings {
  if (mode === SubscriptionMode.FAILOVER) {
    return {
      retainOrdering: true,
      processingGuarantees: ProcessingGuarantee.EFFECTIVELY_ONCE,
    };
  }
  return {
    retainOrdering: false,
    processingGuarantees: ProcessingGuarantee.AT_LEAST_ONCE,
  };
}
