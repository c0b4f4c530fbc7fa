import type { ChangeListener } from "./propagation";
import type { TrackedModel } from "./TrackedModel";
import { issueToken, OwnershipToken } from "./token";

export type TrackedRecord = Record<PropertyKey, unknown>;

export type NodeTarget =
  | { kind: "array"; target: unknown[] }
  | { kind: "record"; target: TrackedRecord }
  | { kind: "set"; target: Set<unknown> }
  | { kind: "map"; target: Map<unknown, unknown> };

export type NodeKind = NodeTarget["kind"] | "model";

type NodeState = {
  token: OwnershipToken;
  /** open batch scopes on this node */
  suppression: number;
  /** a change arrived while suppressed */
  pending: boolean;
  listeners: Set<ChangeListener>;
};

export type ContainerAdministration = NodeState & NodeTarget;
export type ModelAdministration = NodeState & {
  kind: "model";
  target: TrackedModel;
  /** initial values are being assigned; no notifications yet */
  constructing: boolean;
};
export type NodeAdministration = ContainerAdministration | ModelAdministration;

// node (container proxy or model) -> administration
const administrations = new WeakMap<object, NodeAdministration>();
// raw container -> its proxy; re-encountering a raw identity reuses the node
const proxies = new WeakMap<object, object>();

const isPlainRecord = (value: object): value is TrackedRecord => {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Containers the core knows how to track. Anything else (class instances, dates, typed arrays, frozen data...)
 * is left as-is and stays untracked.
 */
export const classifyContainer = (value: unknown): NodeTarget | null => {
  if (typeof value !== "object" || value === null || !Object.isExtensible(value)) {
    return null;
  }
  if (Array.isArray(value)) {
    return Object.getPrototypeOf(value) === Array.prototype ? { kind: "array", target: value } : null;
  }
  if (value instanceof Set) {
    return Object.getPrototypeOf(value) === Set.prototype ? { kind: "set", target: value } : null;
  }
  if (value instanceof Map) {
    return Object.getPrototypeOf(value) === Map.prototype ? { kind: "map", target: value } : null;
  }
  return isPlainRecord(value) ? { kind: "record", target: value } : null;
};

export const registerContainer = (proxy: object, node: NodeTarget): ContainerAdministration => {
  const administration: ContainerAdministration = {
    ...node,
    token: issueToken(proxy),
    suppression: 0,
    pending: false,
    listeners: new Set(),
  };
  administrations.set(proxy, administration);
  proxies.set(node.target, proxy);
  return administration;
};

/** undoes {@link registerContainer} for a proxy that never became reachable */
export const discardContainer = (proxy: object, raw: object) => {
  administrations.delete(proxy);
  proxies.delete(raw);
};

export const registerModel = (model: TrackedModel): ModelAdministration => {
  const administration: ModelAdministration = {
    kind: "model",
    target: model,
    token: issueToken(model),
    suppression: 0,
    pending: false,
    constructing: false,
    listeners: new Set(),
  };
  administrations.set(model, administration);
  return administration;
};

export const administrationOf = (node: object): NodeAdministration | undefined => administrations.get(node);

export const isTracked = (value: unknown): value is object =>
  typeof value === "object" && value !== null && administrations.has(value);

export const nodeKind = (value: unknown): NodeKind | null =>
  typeof value === "object" && value !== null ? (administrations.get(value)?.kind ?? null) : null;

/** the tracked node standing for a value: the value itself if tracked, or the proxy made from it */
export const resolveNode = (value: unknown): object | undefined => {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  return administrations.has(value) ? value : proxies.get(value);
};

export const proxyOf = (raw: object): object | undefined => proxies.get(raw);

/**
 * Narrows a wrapping result back to the type of the value it was produced from.
 * A proxy is typed as its raw target, and wrapping otherwise returns the value unchanged.
 */
export const isWrapperOf = <T>(candidate: unknown, raw: T): candidate is T =>
  candidate === raw || (typeof raw === "object" && raw !== null && proxies.get(raw) === candidate);
