import { isTracked } from "../administration";
import { ALL_ITEMS } from "../globals";
import { materialize } from "../lazy";
import { unlink } from "../link-registry";
import { notifyChange } from "../propagation";
import { issueToken } from "../token";
import { trackAccess } from "../tracking";
import { adopt, adoptEach } from "../wrap";

/**
 * Important implementation nuances
 *
 * Elements are linked to the list under ALL_ITEMS, not under their index: every splice would otherwise
 * have to re-key the links of everything after it. The price is that a value present more than once
 * holds a single link, so an element may only be unlinked when its last copy leaves the list.
 *
 * We cannot tell from set/deleteProperty traps alone what a native method intended (sort alone is a storm
 * of index writes), so every mutating method is redefined, and each of them is executed as:
 * - wrap the values being inserted (this links them), as one operation that is rejected as a whole
 * - run the native method on the raw storage
 * - unlink whatever is no longer contained, and notify if the contents differ from before
 *
 * Methods that return the array itself return the proxy, like they would if called natively on it.
 */

type ArrayMethod = (...args: never[]) => unknown;

const isIndex = (key: string | symbol): boolean =>
  typeof key === "string" && String(Number(key) >>> 0) === key && key !== "4294967295";

export const buildArrayProxy = (target: unknown[]): unknown[] => {
  const token = () => issueToken(self);

  const mutate = <R>(inserted: readonly unknown[], run: () => R): R => {
    const before = target.slice();
    try {
      return run();
    } finally {
      const contained = new Set(target);
      for (const item of new Set([...before, ...inserted])) {
        if (!contained.has(item) && isTracked(item)) {
          unlink(item, token(), ALL_ITEMS);
        }
      }
      if (before.length !== target.length || before.some((item, index) => !Object.is(item, target[index]))) {
        notifyChange(self, ALL_ITEMS);
      }
    }
  };

  const methods = new Map<string | symbol, ArrayMethod>([
    [
      "push",
      (...items: unknown[]) => {
        const nodes = adoptEach(items, token(), ALL_ITEMS);
        return mutate(nodes, () => target.push(...nodes));
      },
    ],
    [
      "unshift",
      (...items: unknown[]) => {
        const nodes = adoptEach(items, token(), ALL_ITEMS);
        return mutate(nodes, () => target.unshift(...nodes));
      },
    ],
    ["pop", () => mutate([], () => target.pop())],
    ["shift", () => mutate([], () => target.shift())],
    [
      "splice",
      (...args: unknown[]) => {
        if (args.length === 0) {
          // native splice() with no arguments removes nothing
          return [];
        }
        const [start, deleteCount, ...items] = args;
        const nodes = adoptEach(items, token(), ALL_ITEMS);
        return mutate(nodes, () =>
          args.length === 1
            ? target.splice(Number(start))
            : target.splice(Number(start), Number(deleteCount), ...nodes),
        );
      },
    ],
    [
      "reverse",
      () =>
        mutate([], () => {
          target.reverse();
          return self;
        }),
    ],
    [
      "sort",
      (compare?: (a: unknown, b: unknown) => number) =>
        mutate([], () => {
          target.sort(compare);
          return self;
        }),
    ],
    [
      "fill",
      (value: unknown, start?: number, end?: number) => {
        const node = adopt(value, token(), ALL_ITEMS);
        return mutate([node], () => {
          target.fill(node, start, end);
          return self;
        });
      },
    ],
    [
      "copyWithin",
      (index: number, start: number, end?: number) =>
        mutate([], () => {
          target.copyWithin(index, start, end);
          return self;
        }),
    ],
  ]);

  const self: unknown[] = new Proxy(target, {
    get(_, key, receiver) {
      const method = methods.get(key);
      if (method) {
        return method;
      }
      trackAccess(self, ALL_ITEMS);
      if (isIndex(key) && Object.hasOwn(target, key)) {
        const index = Number(key);
        const stored = target[index];
        const node = materialize(self, ALL_ITEMS, stored);
        if (node !== stored) {
          target[index] = node;
        }
        return node;
      }
      return Reflect.get(target, key, receiver);
    },
    set(_, key, value) {
      if (key === "length") {
        return mutate([], () => Reflect.set(target, key, value));
      }
      if (!isIndex(key)) {
        return Reflect.set(target, key, value);
      }
      const node = adopt(value, token(), ALL_ITEMS);
      if (Object.hasOwn(target, key) && Object.is(Reflect.get(target, key), node)) {
        return true;
      }
      return mutate([node], () => Reflect.set(target, key, node));
    },
    deleteProperty(_, key) {
      if (!isIndex(key) || !Object.hasOwn(target, key)) {
        return Reflect.deleteProperty(target, key);
      }
      return mutate([], () => Reflect.deleteProperty(target, key));
    },
    has(_, key) {
      trackAccess(self, ALL_ITEMS);
      return Reflect.has(target, key);
    },
    ownKeys() {
      trackAccess(self, ALL_ITEMS);
      return Reflect.ownKeys(target);
    },
  });
  return self;
};
