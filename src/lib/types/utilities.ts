// src/lib/types/utilities.ts
// Common utility types used across the application

/** Basic reporter interface for debugging output */
export type Reporter = { debug: (...args: unknown[]) => void };

/** No-op reporter for silent operations */
export const NoopReporter: Reporter = { debug: () => {} };
