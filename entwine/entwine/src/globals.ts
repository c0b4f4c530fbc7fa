import type { TrackedConstructor } from "./TrackedModel";

export const modelClasses = new Map<string, TrackedConstructor>();

/**
 * Lists and sets do not key links by position: indices shift on every splice, and set members have no key at all.
 * Membership in such a container is recorded under this single key.
 */
export const ALL_ITEMS = Symbol("ALL_ITEMS");
