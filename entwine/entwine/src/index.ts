/**
 * @entwine/entwine
 *
 * Change tracking for nested mutable object graphs: lists, records, sets, maps and models, shared or cyclic,
 * each change bubbled through every owner up to the roots that persist or render them.
 */

export { OwnershipToken, issueToken, tokenOf } from "./token";
export { link, unlink, unlinkOwner, hasLink, parentsOf, clearLinks } from "./link-registry";
export type { LinkKey, ParentLink } from "./link-registry";
export { isTracked, nodeKind, resolveNode } from "./administration";
export type { NodeKind, TrackedRecord } from "./administration";
export { track, restoreTracking, wrap, createWrapContext } from "./wrap";
export type { WrapContext } from "./wrap";
export { materialize } from "./lazy";
export { notifyChange, observe, onBoundary } from "./propagation";
export type { ChangeEvent, ChangeListener } from "./propagation";
export { BatchScope, batch } from "./batch";

// models
export { TrackedModel, modelFromSnapshot } from "./TrackedModel";
export type { TrackedConstructor, ModelInit } from "./TrackedModel";
export { tracked } from "./decorators";
export type { FieldKind, FieldSlot, ModelSchema } from "./model-schema";
export { modelClasses } from "./globals";

// snapshots and persistence collaborators
export { toPlain, toSnapshot } from "./snapshot";
export { registerBinding, bindingFor } from "./bindings";
export type { PersistenceBinding } from "./bindings";

export * from "./errors";
export * from "./config";
export * from "./tracking";
export { collectLinkViolations, assertLinkInvariants } from "./inspect";
export type { LinkViolation } from "./inspect";
