import invariant from "tiny-invariant";

export type TrackingConfig = {
  /** how deep a single wrap may descend before it is rejected */
  maxNestingDepth: number;
  /** how many parent hops a single change may travel */
  maxPropagationDepth: number;
  /** listener failures tolerated per propagation before the rest are skipped */
  maxListenerFailures: number;
};

const defaults: Readonly<TrackingConfig> = Object.freeze({
  maxNestingDepth: 100,
  maxPropagationDepth: 1000,
  maxListenerFailures: 10,
});

export const trackingConfig: TrackingConfig = { ...defaults };

export const configureTracking = (patch: Partial<TrackingConfig>): TrackingConfig => {
  for (const [name, value] of Object.entries(patch)) {
    invariant(
      typeof value === "number" && Number.isInteger(value) && value > 0,
      `tracking option ${name} should be a positive integer, got ${String(value)}`,
    );
  }
  return Object.assign(trackingConfig, patch);
};

export const resetTrackingConfig = (): TrackingConfig => Object.assign(trackingConfig, defaults);
