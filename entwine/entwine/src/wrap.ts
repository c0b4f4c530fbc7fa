import {
  administrationOf,
  classifyContainer,
  discardContainer,
  isWrapperOf,
  NodeAdministration,
  NodeTarget,
  registerContainer,
  resolveNode,
} from "./administration";
import { trackingConfig } from "./config";
import { RecursionLimitExceededError } from "./errors";
import { ALL_ITEMS } from "./globals";
import { link, LinkKey, unlink } from "./link-registry";
import { schemaOf } from "./model-schema";
import { buildArrayProxy } from "./proxies/tracked-array";
import { buildMapProxy } from "./proxies/tracked-map";
import { buildRecordProxy } from "./proxies/tracked-record";
import { buildSetProxy } from "./proxies/tracked-set";
import { OwnershipToken } from "./token";
import { never } from "./utils";

export type WrapContext = {
  /** raw identity -> node produced for it during this walk */
  seen: Map<object, object>;
  /** containers above the value being wrapped */
  depth: number;
  /** walk into already tracked nodes and re-link their children too */
  restore: boolean;
  /** reverts the links and in-place replacements of a rejected wrap */
  undo: Array<() => void>;
};

export const createWrapContext = (restore = false): WrapContext => ({
  seen: new Map(),
  depth: 0,
  restore,
  undo: [],
});

const linkTo = (node: object, owner: OwnershipToken | null, key: LinkKey, context: WrapContext) => {
  if (owner && link(node, owner, key)) {
    context.undo.push(() => unlink(node, owner, key));
  }
};

const createProxy = (node: NodeTarget): object => {
  switch (node.kind) {
    case "array":
      return buildArrayProxy(node.target);
    case "record":
      return buildRecordProxy(node.target);
    case "set":
      return buildSetProxy(node.target);
    case "map":
      return buildMapProxy(node.target);
    default:
      return never(node);
  }
};

/** wraps every child of a node in place, linking it to the node */
const wrapChildren = (administration: NodeAdministration, context: WrapContext) => {
  if (context.depth >= trackingConfig.maxNestingDepth) {
    throw new RecursionLimitExceededError("wrap", trackingConfig.maxNestingDepth);
  }
  const { token } = administration;
  context.depth++;
  try {
    switch (administration.kind) {
      case "array": {
        const { target } = administration;
        for (let index = 0; index < target.length; index++) {
          const child = target[index];
          const node = wrap(child, token, ALL_ITEMS, context);
          if (node !== child) {
            target[index] = node;
            context.undo.push(() => {
              target[index] = child;
            });
          }
        }
        return;
      }
      case "record": {
        const { target } = administration;
        for (const key of Object.keys(target)) {
          const child = target[key];
          const node = wrap(child, token, key, context);
          if (node !== child) {
            target[key] = node;
            context.undo.push(() => {
              target[key] = child;
            });
          }
        }
        return;
      }
      case "set": {
        const { target } = administration;
        const members = Array.from(target);
        const nodes = members.map((member) => wrap(member, token, ALL_ITEMS, context));
        if (nodes.some((node, index) => node !== members[index])) {
          // re-adding keeps insertion order
          target.clear();
          nodes.forEach((node) => target.add(node));
          context.undo.push(() => {
            target.clear();
            members.forEach((member) => target.add(member));
          });
        }
        return;
      }
      case "map": {
        const { target } = administration;
        for (const [key, child] of Array.from(target)) {
          const node = wrap(child, token, key, context);
          if (node !== child) {
            target.set(key, node);
            context.undo.push(() => {
              target.set(key, child);
            });
          }
        }
        return;
      }
      case "model": {
        const model = administration.target;
        for (const slot of Object.values(schemaOf(model))) {
          slot.restore(model, context);
        }
        return;
      }
      default:
        never(administration);
    }
  } finally {
    context.depth--;
  }
};

/**
 * Turns a raw value into a tracked node linked to `owner` under `key`.
 *
 * - primitives are returned as they are, with no bookkeeping at all
 * - a value met before in this walk (or already tracked) is reused, never wrapped twice; this is what makes
 *   cyclic and shared structures come out with the same shape they went in with
 * - lists, plain records, sets and maps become proxies over themselves, registered before their children are
 *   visited, then have their children wrapped in place
 * - anything else is passed through untracked
 */
export const wrap = (
  value: unknown,
  owner: OwnershipToken | null,
  key: LinkKey,
  context: WrapContext = createWrapContext(),
): unknown => {
  if (typeof value !== "object" || value === null) {
    return value;
  }
  const seen = context.seen.get(value);
  if (seen) {
    linkTo(seen, owner, key, context);
    return seen;
  }
  const existing = resolveNode(value);
  if (existing) {
    context.seen.set(value, existing);
    context.seen.set(existing, existing);
    linkTo(existing, owner, key, context);
    const administration = administrationOf(existing);
    if (context.restore && administration) {
      wrapChildren(administration, context);
    }
    return existing;
  }
  const container = classifyContainer(value);
  if (!container) {
    return value;
  }
  const proxy = createProxy(container);
  const administration = registerContainer(proxy, container);
  context.undo.push(() => discardContainer(proxy, value));
  context.seen.set(value, proxy);
  context.seen.set(proxy, proxy);
  linkTo(proxy, owner, key, context);
  wrapChildren(administration, context);
  return proxy;
};

const rollback = (context: WrapContext) => {
  for (const revert of context.undo.reverse()) {
    revert();
  }
};

/**
 * Wraps several values for one owner as a single operation: either all of them get tracked,
 * or (when one nests too deep) none of them, with every link made on the way taken back.
 */
export const adoptEach = (values: readonly unknown[], owner: OwnershipToken | null, key: LinkKey): unknown[] => {
  const context = createWrapContext();
  try {
    return values.map((value) => wrap(value, owner, key, context));
  } catch (e) {
    rollback(context);
    throw e;
  }
};

export const adopt = (value: unknown, owner: OwnershipToken | null, key: LinkKey): unknown =>
  adoptEach([value], owner, key)[0];

/**
 * Makes a value a tracked root: a node without parents, so changes below it stop (and reach the boundary) there.
 * Already tracked values are returned unchanged.
 */
export const track = <T>(value: T): T => {
  const node = adopt(value, null, undefined);
  return isWrapperOf(node, value) ? node : value;
};

/**
 * Rebuilds the links below a root after its contents were replaced behind the tracker's back,
 * e.g. after being reconstructed from a snapshot. Tracking metadata is derived state: walking the
 * structure again is enough to recover it. Lazy model fields are left for their first read.
 */
export const restoreTracking = (root: object): void => {
  const context = createWrapContext(true);
  try {
    wrap(root, null, undefined, context);
  } catch (e) {
    rollback(context);
    throw e;
  }
};
