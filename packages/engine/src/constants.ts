/** Default worker poll period (1 second). */
export const DEFAULT_POLL_INTERVAL_MS = 1_000;

/** Default engine name bound into log context. */
export const DEFAULT_ENGINE_NAME = "engine";

/** Flush kinds in the order their slots are inspected. */
export const FLUSH_KINDS = ["append", "correction"] as const;
