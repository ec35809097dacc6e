import { describe, it, expect } from 'vitest';
import { ProcessingGuarantee, SubscriptionMode } from '../../src/core/types.js';
import { deriveSubscriptionMode, reconstructDelivery } from '../../src/translate/subscription.js';

describe('deriveSubscriptionMode', () => {
  it('is SHARED for unordered at-least-once and at-most-once', () => {
    expect(deriveSubscriptionMode(false, ProcessingGuarantee.AT_LEAST_ONCE)).toBe(SubscriptionMode.SHARED);
    expect(deriveSubscriptionMode(false, ProcessingGuarantee.AT_MOST_ONCE)).toBe(SubscriptionMode.SHARED);
    expect(deriveSubscriptionMode(false, undefined)).toBe(SubscriptionMode.SHARED);
  });

  it('is FAILOVER when ordering is retained', () => {
    expect(deriveSubscriptionMode(true, ProcessingGuarantee.AT_LEAST_ONCE)).toBe(SubscriptionMode.FAILOVER);
  });

  it('is FAILOVER for effectively-once', () => {
    expect(deriveSubscriptionMode(false, ProcessingGuarantee.EFFECTIVELY_ONCE)).toBe(SubscriptionMode.FAILOVER);
  });
});

describe('reconstructDelivery', () => {
  it('reads FAILOVER as ordered effectively-once', () => {
    expect(reconstructDelivery(SubscriptionMode.FAILOVER)).toEqual({
      retainOrdering: true,
      processingGuarantees: ProcessingGuarantee.EFFECTIVELY_ONCE,
    });
  });

  it('reads SHARED as unordered at-least-once', () => {
    expect(reconstructDelivery(SubscriptionMode.SHARED)).toEqual({
      retainOrdering: false,
      processingGuarantees: ProcessingGuarantee.AT_LEAST_ONCE,
    });
  });
});
