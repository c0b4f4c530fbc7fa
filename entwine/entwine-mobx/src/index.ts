import { ALL_ITEMS, nodeKind, trackingHook } from "@entwine/entwine";
import { createAtom, type IAtom, runInAction } from "mobx";

/**
 * MobX atoms standing for the reads made of one tracked node.
 *
 * Atoms exist only while some reaction depends on them: one is created by a read inside a derivation and
 * forgotten once its last observer goes away, so reading a large graph outside reactions allocates nothing.
 */
class NodeAtoms {
  // ALL_ITEMS for whole-container reads (length, iteration, key listing), else the field or entry key
  readonly #entries = new Map<unknown, { atom: IAtom; observed: boolean }>();

  constructor(readonly label: string) {}

  get empty() {
    return this.#entries.size === 0;
  }

  observe(key: unknown) {
    let entry = this.#entries.get(key);
    if (!entry) {
      const created = {
        atom: createAtom(
          `${this.label}.${key === ALL_ITEMS ? "*" : String(key)}`,
          () => {
            created.observed = true;
          },
          () => {
            created.observed = false;
            if (this.#entries.get(key) === created) {
              this.#entries.delete(key);
            }
          },
        ),
        observed: false,
      };
      this.#entries.set(key, created);
      entry = created;
    }
    // outside a derivation nothing will ever unobserve a fresh atom
    if (!entry.atom.reportObserved() && !entry.observed) {
      this.#entries.delete(key);
    }
  }

  changed(key: unknown) {
    if (key === ALL_ITEMS) {
      for (const { atom } of Array.from(this.#entries.values())) {
        atom.reportChanged();
      }
      return;
    }
    this.#entries.get(key)?.atom.reportChanged();
    this.#entries.get(ALL_ITEMS)?.atom.reportChanged();
  }
}

const atomsByNode = new WeakMap<object, NodeAtoms>();

const atomsOf = (node: object): NodeAtoms => {
  let atoms = atomsByNode.get(node);
  if (!atoms) {
    atoms = new NodeAtoms(nodeKind(node) ?? "node");
    atomsByNode.set(node, atoms);
  }
  return atoms;
};

let uninstall: (() => void) | null = null;

export const isMobXIntegrationEnabled = () => uninstall !== null;

/**
 * Makes tracked graphs observable by MobX: reads inside reactions become dependencies, and every change
 * propagated through the graph invalidates the reads it affects on each node it passes.
 *
 * - model fields, record entries and map entries are observed per key
 * - lists and sets have no keys worth observing: any change of their membership invalidates every read of them
 * - a whole propagation (and a whole `batch`) runs as one MobX action, so reactions re-run once
 *
 * Calling it again while enabled returns the same disposer; the disposer puts the previous hooks back.
 */
export const enableMobXIntegration = (): (() => void) => {
  if (uninstall) {
    return uninstall;
  }
  const { access, modification, transaction } = trackingHook;

  trackingHook.access = (node, key) => {
    const kind = nodeKind(node);
    atomsOf(node).observe(kind === "array" || kind === "set" ? ALL_ITEMS : key);
  };
  trackingHook.modification = (node, key) => {
    const atoms = atomsByNode.get(node);
    if (atoms && !atoms.empty) {
      atoms.changed(key);
    }
  };
  trackingHook.transaction = (run) => runInAction(run);

  const disposer = () => {
    if (uninstall !== disposer) {
      return;
    }
    trackingHook.access = access;
    trackingHook.modification = modification;
    trackingHook.transaction = transaction;
    uninstall = null;
  };
  uninstall = disposer;
  return disposer;
};
