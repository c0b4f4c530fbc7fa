import invariant from "tiny-invariant";
import { administrationOf } from "./administration";
import { trackingConfig } from "./config";
import { isTrackingError, LinkInvariantViolationError, RecursionLimitExceededError } from "./errors";
import { ALL_ITEMS } from "./globals";
import { parentsOf } from "./link-registry";
import { inTransaction, trackModification } from "./tracking";

export type ChangeEvent = {
  /** node the change has arrived at */
  node: object;
  /** key of `node` through which the change arrived */
  key: unknown;
  /** node that was mutated */
  origin: object;
};

export type ChangeListener = (event: ChangeEvent) => void;

type Propagation = {
  origin: object;
  // nodes on the current walk; a parent already on it is not entered again
  path: Set<object>;
  failures: number;
  capped: boolean;
  /** a parentless node was reached */
  reachedBoundary: boolean;
  /** the walk stopped at a node inside a batch scope */
  deferred: boolean;
};

const boundaryListeners = new Set<ChangeListener>();

const emit = (listeners: Iterable<ChangeListener>, event: ChangeEvent, propagation: Propagation) => {
  // listeners may unsubscribe while being called
  for (const listener of Array.from(listeners)) {
    if (propagation.failures >= trackingConfig.maxListenerFailures) {
      if (!propagation.capped) {
        propagation.capped = true;
        console.warn(
          `${propagation.failures} change listeners failed, skipping the rest of this notification`,
        );
      }
      return;
    }
    try {
      listener(event);
    } catch (e) {
      if (isTrackingError(e)) {
        throw e;
      }
      propagation.failures++;
      console.error("Error in change listener:", e);
    }
  }
};

const propagate = (node: object, key: unknown, propagation: Propagation, depth: number): void => {
  if (depth > trackingConfig.maxPropagationDepth) {
    throw new RecursionLimitExceededError("propagate", trackingConfig.maxPropagationDepth);
  }
  const administration = administrationOf(node);
  if (!administration) {
    throw new LinkInvariantViolationError("change reached an object that is not tracked", { key });
  }
  if (administration.suppression > 0) {
    administration.pending = true;
    propagation.deferred = true;
    return;
  }
  const event: ChangeEvent = { node, key, origin: propagation.origin };
  trackModification(node, key);
  emit(administration.listeners, event, propagation);

  propagation.path.add(node);
  try {
    const parents = parentsOf(node);
    if (parents.length === 0) {
      propagation.reachedBoundary = true;
      emit(boundaryListeners, event, propagation);
      return;
    }
    // every live link is followed on its own, so shared children notify each parent.
    // A parent already on this walk closes a cycle; the walk ends there without a boundary.
    for (const parent of parents) {
      if (!propagation.path.has(parent.owner)) {
        propagate(parent.owner, parent.key, propagation, depth + 1);
      }
    }
  } finally {
    propagation.path.delete(node);
  }
};

/**
 * Bubbles a change from `node` through every live parent link, synchronously.
 * Called after the backing storage has been updated, so a failing notification never loses the write.
 */
export const notifyChange = (node: object, key: unknown = ALL_ITEMS): void => {
  inTransaction(() => {
    const propagation: Propagation = {
      origin: node,
      path: new Set(),
      failures: 0,
      capped: false,
      reachedBoundary: false,
      deferred: false,
    };
    propagate(node, key, propagation, 0);
    // a cycle that no root holds has no parentless node; the change surfaces where it was made
    if (!propagation.reachedBoundary && !propagation.deferred) {
      emit(boundaryListeners, { node, key, origin: node }, propagation);
    }
  });
};

/** Subscribes to changes arriving at a node, from itself or from anything below it. */
export const observe = (node: object, listener: ChangeListener): (() => void) => {
  const administration = administrationOf(node);
  invariant(administration, "only tracked nodes can be observed");
  administration.listeners.add(listener);
  return () => {
    administration.listeners.delete(listener);
  };
};

/**
 * Subscribes to propagation boundaries: nodes a change reaches that have no live parents.
 * A change inside a cycle that no such node holds surfaces once, at the node that changed.
 * This is where a persistence layer learns that one of its records became dirty.
 */
export const onBoundary = (listener: ChangeListener): (() => void) => {
  boundaryListeners.add(listener);
  return () => {
    boundaryListeners.delete(listener);
  };
};
