/**
 * Hyphen-only names; BullMQ uses colon as its Redis key separator.
 */
export const queueNames = {
  precompute: "findings-precompute",
} as const;
