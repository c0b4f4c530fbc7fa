import { isTracked, proxyOf } from "../administration";
import { ALL_ITEMS } from "../globals";
import { materialize } from "../lazy";
import { unlink } from "../link-registry";
import { notifyChange } from "../propagation";
import { issueToken } from "../token";
import { trackAccess } from "../tracking";
import { adopt } from "../wrap";

const memberIterators = new Set<string | symbol>(["values", "keys", "entries", Symbol.iterator]);

/**
 * Set proxy. Members are linked under ALL_ITEMS.
 * Membership checks accept either a tracked member or the raw value it was made from.
 */
export const buildSetProxy = (target: Set<unknown>): Set<unknown> => {
  const token = () => issueToken(self);

  // the stored member standing for `value`, if any
  const memberFor = (value: unknown): unknown => {
    if (target.has(value) || typeof value !== "object" || value === null) {
      return value;
    }
    return proxyOf(value) ?? value;
  };

  // members added behind the proxy's back are wrapped, and lost links repaired, before anything iterates
  const heal = () => {
    const members = Array.from(target);
    const nodes = members.map((member) => materialize(self, ALL_ITEMS, member));
    if (nodes.some((node, index) => node !== members[index])) {
      // re-adding keeps insertion order
      target.clear();
      nodes.forEach((node) => target.add(node));
    }
  };

  const methods = {
    add(value: unknown) {
      const node = adopt(value, token(), ALL_ITEMS);
      if (!target.has(node)) {
        target.add(node);
        notifyChange(self, ALL_ITEMS);
      }
      return self;
    },
    delete(value: unknown) {
      const member = memberFor(value);
      if (!target.delete(member)) {
        return false;
      }
      if (isTracked(member)) {
        unlink(member, token(), ALL_ITEMS);
      }
      notifyChange(self, ALL_ITEMS);
      return true;
    },
    clear() {
      if (target.size === 0) {
        return;
      }
      const members = Array.from(target);
      target.clear();
      for (const member of members) {
        if (isTracked(member)) {
          unlink(member, token(), ALL_ITEMS);
        }
      }
      notifyChange(self, ALL_ITEMS);
    },
    has(value: unknown) {
      trackAccess(self, ALL_ITEMS);
      return target.has(memberFor(value));
    },
    forEach(callback: (value: unknown, key: unknown, set: Set<unknown>) => void, thisArg?: unknown) {
      trackAccess(self, ALL_ITEMS);
      heal();
      target.forEach((value) => callback.call(thisArg, value, value, self));
    },
  };

  const self: Set<unknown> = new Proxy(target, {
    get(_, key) {
      if (typeof key === "string" && Object.hasOwn(methods, key)) {
        return Reflect.get(methods, key);
      }
      trackAccess(self, ALL_ITEMS);
      if (memberIterators.has(key)) {
        heal();
      }
      // Set internals only work with the real set as receiver
      const value: unknown = Reflect.get(target, key, target);
      return typeof value === "function" ? value.bind(target) : value;
    },
  });
  return self;
};
