import { nanoid } from "nanoid";

/**
 * Opaque identity of an owner.
 * All link bookkeeping is keyed by token identity, so owners never need stable equality of their own.
 * The owner keeps its token alive; the token only remembers the owner weakly.
 */
export class OwnershipToken {
  readonly id = nanoid();
  readonly #owner: WeakRef<object>;

  constructor(owner: object) {
    this.#owner = new WeakRef(owner);
  }

  deref(): object | undefined {
    return this.#owner.deref();
  }

  get alive(): boolean {
    return this.deref() !== undefined;
  }

  toString() {
    return `OwnershipToken(${this.id})`;
  }
}

// owner -> token; WeakMap values live exactly as long as their keys
const tokens = new WeakMap<object, OwnershipToken>();

export const issueToken = (owner: object): OwnershipToken => {
  let token = tokens.get(owner);
  if (!token) {
    token = new OwnershipToken(owner);
    tokens.set(owner, token);
  }
  return token;
};

export const tokenOf = (owner: object): OwnershipToken | undefined => tokens.get(owner);
