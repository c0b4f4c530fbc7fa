/**
 * Reporting seam for reactive runtimes.
 *
 * The core does not observe reads itself; it only reports them. Adapters (see entwine-mobx) install the hooks
 * to turn field reads into dependencies and propagated changes into invalidations.
 *
 * Keys reported:
 * - model fields: field name
 * - records and maps: the entry key
 * - lists and sets, and whole-container reads (length, iteration, key listing): {@link ALL_ITEMS}
 */
import { ALL_ITEMS } from "./globals";

export { ALL_ITEMS };

type TrackingHook = {
  access?: (node: object, key: unknown) => void;
  modification?: (node: object, key: unknown) => void;
  /** wraps one full propagation, e.g. to batch reactions */
  transaction?: <T>(run: () => T) => T;
};

export const trackingHook: TrackingHook = {};

export function trackAccess(node: object, key: unknown): void {
  trackingHook.access?.(node, key);
}

export function trackModification(node: object, key: unknown): void {
  trackingHook.modification?.(node, key);
}

export const inTransaction = <T>(run: () => T): T =>
  trackingHook.transaction ? trackingHook.transaction(run) : run();
