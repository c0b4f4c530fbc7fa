import { resolveNode } from "../administration";
import { ALL_ITEMS } from "../globals";
import { materialize } from "../lazy";
import { unlink } from "../link-registry";
import { notifyChange } from "../propagation";
import { issueToken } from "../token";
import { trackAccess } from "../tracking";
import { adopt } from "../wrap";

const valueIterators = new Set<string | symbol>(["values", "entries", Symbol.iterator]);

/**
 * Map proxy. Values are tracked and linked under their map key; keys are identities and stay as they are.
 */
export const buildMapProxy = (target: Map<unknown, unknown>): Map<unknown, unknown> => {
  const token = () => issueToken(self);

  // unlinks what `previous` stood for, unless `next` is the same node
  const release = (previous: unknown, next: unknown, key: unknown) => {
    const node = resolveNode(previous);
    if (node && node !== resolveNode(next)) {
      unlink(node, token(), key);
    }
  };

  // values written behind the proxy's back are wrapped, and lost links repaired, before anything iterates
  const heal = () => {
    for (const [key, stored] of Array.from(target)) {
      const node = materialize(self, key, stored);
      if (node !== stored) {
        target.set(key, node);
      }
    }
  };

  const methods = {
    get(key: unknown) {
      trackAccess(self, key);
      if (!target.has(key)) {
        return undefined;
      }
      const stored = target.get(key);
      const node = materialize(self, key, stored);
      if (node !== stored) {
        target.set(key, node);
      }
      return node;
    },
    set(key: unknown, value: unknown) {
      const existed = target.has(key);
      const previous = target.get(key);
      const node = adopt(value, token(), key);
      if (existed && Object.is(previous, node)) {
        return self;
      }
      target.set(key, node);
      if (existed) {
        release(previous, node, key);
        // the raw form of this very node was stored under the key: storing the node back changes nothing
        if (resolveNode(previous) === node) {
          return self;
        }
      }
      notifyChange(self, key);
      return self;
    },
    delete(key: unknown) {
      if (!target.has(key)) {
        return false;
      }
      const previous = target.get(key);
      target.delete(key);
      release(previous, undefined, key);
      notifyChange(self, key);
      return true;
    },
    clear() {
      if (target.size === 0) {
        return;
      }
      const entries = Array.from(target);
      target.clear();
      for (const [key, previous] of entries) {
        release(previous, undefined, key);
      }
      notifyChange(self, ALL_ITEMS);
    },
    has(key: unknown) {
      trackAccess(self, key);
      return target.has(key);
    },
    forEach(callback: (value: unknown, key: unknown, map: Map<unknown, unknown>) => void, thisArg?: unknown) {
      trackAccess(self, ALL_ITEMS);
      heal();
      target.forEach((value, key) => callback.call(thisArg, value, key, self));
    },
  };

  const self: Map<unknown, unknown> = new Proxy(target, {
    get(_, key) {
      if (typeof key === "string" && Object.hasOwn(methods, key)) {
        return Reflect.get(methods, key);
      }
      trackAccess(self, ALL_ITEMS);
      if (valueIterators.has(key)) {
        heal();
      }
      // Map internals only work with the real map as receiver
      const value: unknown = Reflect.get(target, key, target);
      return typeof value === "function" ? value.bind(target) : value;
    },
  });
  return self;
};
