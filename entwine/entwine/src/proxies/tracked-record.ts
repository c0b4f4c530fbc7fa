import { resolveNode, TrackedRecord } from "../administration";
import { ALL_ITEMS } from "../globals";
import { materialize } from "../lazy";
import { unlink } from "../link-registry";
import { notifyChange } from "../propagation";
import { issueToken } from "../token";
import { trackAccess } from "../tracking";
import { adopt } from "../wrap";

/**
 * Plain object proxy. String keys are tracked, each child is linked under its own key.
 * Symbol-keyed properties are passed through untracked.
 */
export const buildRecordProxy = (target: TrackedRecord): TrackedRecord => {
  const token = () => issueToken(self);

  // unlinks what `previous` stood for, unless `next` is the same node
  const release = (previous: unknown, next: unknown, key: string) => {
    const node = resolveNode(previous);
    if (node && node !== resolveNode(next)) {
      unlink(node, token(), key);
    }
  };

  const assign = (key: string, node: unknown, write: () => boolean): boolean => {
    const existed = Object.hasOwn(target, key);
    const previous = target[key];
    if (existed && Object.is(previous, node)) {
      return true;
    }
    if (!write()) {
      release(node, existed ? previous : undefined, key);
      return false;
    }
    if (!existed) {
      notifyChange(self, key);
      return true;
    }
    release(previous, node, key);
    // the slot held the raw form of this very node: storing the node back changes nothing
    if (resolveNode(previous) !== node) {
      notifyChange(self, key);
    }
    return true;
  };

  const self: TrackedRecord = new Proxy(target, {
    get(_, key, receiver) {
      if (typeof key === "symbol" || !Object.hasOwn(target, key)) {
        if (typeof key === "string") {
          trackAccess(self, key);
        }
        return Reflect.get(target, key, receiver);
      }
      trackAccess(self, key);
      const stored = target[key];
      const node = materialize(self, key, stored);
      if (node !== stored) {
        target[key] = node;
      }
      return node;
    },
    set(_, key, value) {
      if (typeof key === "symbol") {
        return Reflect.set(target, key, value);
      }
      const node = adopt(value, token(), key);
      return assign(key, node, () => Reflect.set(target, key, node));
    },
    defineProperty(_, key, descriptor) {
      if (typeof key === "symbol" || !("value" in descriptor)) {
        return Reflect.defineProperty(target, key, descriptor);
      }
      const node = adopt(descriptor.value, token(), key);
      return assign(key, node, () => Reflect.defineProperty(target, key, { ...descriptor, value: node }));
    },
    deleteProperty(_, key) {
      if (typeof key === "symbol" || !Object.hasOwn(target, key)) {
        return Reflect.deleteProperty(target, key);
      }
      const previous = target[key];
      if (!Reflect.deleteProperty(target, key)) {
        return false;
      }
      release(previous, undefined, key);
      notifyChange(self, key);
      return true;
    },
    has(_, key) {
      if (typeof key === "string") {
        trackAccess(self, key);
      }
      return Reflect.has(target, key);
    },
    ownKeys() {
      trackAccess(self, ALL_ITEMS);
      return Reflect.ownKeys(target);
    },
  });
  return self;
};
