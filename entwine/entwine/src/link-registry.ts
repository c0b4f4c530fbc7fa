import { LinkInvariantViolationError } from "./errors";
import { OwnershipToken } from "./token";
import { DefaultedWeakMap } from "./utils";

/** field name, record key, map key or {@link ALL_ITEMS} */
export type LinkKey = unknown;

export type ParentLink = {
  token: OwnershipToken;
  owner: object;
  key: LinkKey;
};

// one canonical WeakRef per token, so it can serve as a Map key
const tokenRefs = new DefaultedWeakMap((token: OwnershipToken) => new WeakRef(token));

// node -> parent token (weakly) -> keys under which that parent reaches the node
const links = new WeakMap<object, Map<WeakRef<OwnershipToken>, Set<LinkKey>>>();

/**
 * Records that the owner of `token` reaches `node` under `key`.
 * Idempotent per (token, key); returns whether a new link was recorded.
 */
export const link = (node: object, token: OwnershipToken, key: LinkKey): boolean => {
  if (!token.alive) {
    throw new LinkInvariantViolationError(`cannot link to ${token}: its owner is gone`, { token: token.id });
  }
  let parents = links.get(node);
  if (!parents) {
    parents = new Map();
    links.set(node, parents);
  }
  const ref = tokenRefs.get(token);
  let keys = parents.get(ref);
  if (!keys) {
    keys = new Set();
    parents.set(ref, keys);
  }
  if (keys.has(key)) {
    return false;
  }
  keys.add(key);
  return true;
};

export const unlink = (node: object, token: OwnershipToken, key: LinkKey): boolean => {
  const parents = links.get(node);
  const ref = tokenRefs.get(token);
  const keys = parents?.get(ref);
  if (!parents || !keys?.delete(key)) {
    return false;
  }
  if (keys.size === 0) {
    parents.delete(ref);
  }
  return true;
};

export const unlinkOwner = (node: object, token: OwnershipToken): boolean =>
  links.get(node)?.delete(tokenRefs.get(token)) ?? false;

export const hasLink = (node: object, token: OwnershipToken, key: LinkKey): boolean =>
  links.get(node)?.get(tokenRefs.get(token))?.has(key) ?? false;

/**
 * Live parent links of a node, as a snapshot safe to iterate while links change.
 * Links whose owner has been collected are pruned here and never returned.
 */
export const parentsOf = (node: object): ParentLink[] => {
  const parents = links.get(node);
  if (!parents) {
    return [];
  }
  const result: ParentLink[] = [];
  for (const [ref, keys] of parents) {
    const token = ref.deref();
    const owner = token?.deref();
    if (!token || !owner) {
      parents.delete(ref);
      continue;
    }
    for (const key of keys) {
      result.push({ token, owner, key });
    }
  }
  return result;
};

export const clearLinks = (node: object): void => {
  links.delete(node);
};
