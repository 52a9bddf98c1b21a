/**
 * Metrics port used by the pipeline, listener and dispatcher.
 *
 * Emission is best-effort: implementations must never throw into the
 * routing path.
 */
export interface Metrics {
  increment(name: string, value?: number): void;
  gauge(name: string, value: number): void;
  timing(name: string, ms: number): void;
}

/** Used when no collector is configured. */
export const NOOP_METRICS: Metrics = {
  increment: () => undefined,
  gauge: () => undefined,
  timing: () => undefined,
};
