export type TrackingErrorCode = "RECURSION_LIMIT_EXCEEDED" | "LINK_INVARIANT_VIOLATION";

/**
 * Base class of every error the tracking core surfaces to callers.
 * Conditions the core recovers from on its own (dead owners, values it cannot track) never become errors.
 */
export class TrackingError extends Error {
  constructor(
    readonly code: TrackingErrorCode,
    message: string,
    readonly details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = "TrackingError";
  }
}

/**
 * Thrown when a value nests deeper than `maxNestingDepth` while being wrapped,
 * or a change travels more than `maxPropagationDepth` parent hops.
 * A rejected wrap leaves the target untouched.
 */
export class RecursionLimitExceededError extends TrackingError {
  constructor(
    readonly phase: "wrap" | "propagate",
    readonly limit: number,
  ) {
    super(
      "RECURSION_LIMIT_EXCEEDED",
      phase === "wrap"
        ? `value nests deeper than ${limit} levels and cannot be tracked`
        : `change propagation exceeded ${limit} parent hops`,
      { phase, limit },
    );
    this.name = "RecursionLimitExceededError";
  }
}

/** Link bookkeeping is corrupt. Never recovered from silently. */
export class LinkInvariantViolationError extends TrackingError {
  constructor(message: string, details: Readonly<Record<string, unknown>> = {}) {
    super("LINK_INVARIANT_VIOLATION", message, details);
    this.name = "LinkInvariantViolationError";
  }
}

export const isTrackingError = (error: unknown): error is TrackingError => error instanceof TrackingError;
