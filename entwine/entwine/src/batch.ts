import invariant from "tiny-invariant";
import { administrationOf, NodeAdministration } from "./administration";
import { notifyChange } from "./propagation";
import { inTransaction } from "./tracking";

/**
 * Holds back changes arriving at a node until closed.
 * Scopes on the same node nest; when the outermost one closes, a single change is sent on
 * if anything arrived in the meantime, and nothing otherwise.
 */
export class BatchScope {
  readonly #administration: NodeAdministration;
  #open = true;

  constructor(readonly node: object) {
    const administration = administrationOf(node);
    invariant(administration, "batch scopes can only be opened on tracked nodes");
    administration.suppression++;
    this.#administration = administration;
  }

  get open() {
    return this.#open;
  }

  close(): void {
    if (!this.#open) {
      return;
    }
    this.#open = false;
    const administration = this.#administration;
    administration.suppression--;
    if (administration.suppression === 0 && administration.pending) {
      administration.pending = false;
      notifyChange(this.node);
    }
  }
}

/** Runs `fn` inside a batch scope on `node`. The scope is closed however `fn` exits, throwing included. */
export const batch = <T>(node: object, fn: () => T): T =>
  inTransaction(() => {
    const scope = new BatchScope(node);
    try {
      return fn();
    } finally {
      scope.close();
    }
  });
