import { administrationOf, isTracked, NodeAdministration } from "./administration";
import { LinkInvariantViolationError } from "./errors";
import { ALL_ITEMS } from "./globals";
import { hasLink, parentsOf } from "./link-registry";
import { schemaOf } from "./model-schema";
import { describeKey, never } from "./utils";

export type LinkViolation = {
  /** "missing": the owner reaches the child but no link records it; "stale": a link the owner no longer backs */
  kind: "missing" | "stale";
  owner: object;
  child: object;
  key: unknown;
};

const childrenOf = (administration: NodeAdministration): Array<[key: unknown, child: unknown]> => {
  switch (administration.kind) {
    case "array":
      return administration.target.map((child): [unknown, unknown] => [ALL_ITEMS, child]);
    case "record":
      return Object.entries(administration.target);
    case "set":
      return Array.from(administration.target, (child): [unknown, unknown] => [ALL_ITEMS, child]);
    case "map":
      return Array.from(administration.target);
    case "model": {
      const model = administration.target;
      return Object.values(schemaOf(model)).map((slot): [unknown, unknown] => [slot.name, slot.read(model)]);
    }
    default:
      return never(administration);
  }
};

const reaches = (administration: NodeAdministration, key: unknown, child: object): boolean => {
  switch (administration.kind) {
    case "array":
      return key === ALL_ITEMS && administration.target.includes(child);
    case "set":
      return key === ALL_ITEMS && administration.target.has(child);
    case "record":
      return typeof key === "string" && Object.hasOwn(administration.target, key) && administration.target[key] === child;
    case "map":
      return administration.target.has(key) && administration.target.get(key) === child;
    case "model": {
      const slot = typeof key === "string" ? administration.target._schema[key] : undefined;
      return slot !== undefined && slot.read(administration.target) === child;
    }
    default:
      return never(administration);
  }
};

/**
 * Checks link bookkeeping of everything reachable from `root` against the actual structure, both ways:
 * every tracked child must be linked to the node holding it, and every link between two reachable nodes
 * must be backed by the structure. Lazy values that were never read are not nodes yet and are skipped.
 */
export const collectLinkViolations = (root: object): LinkViolation[] => {
  const violations: LinkViolation[] = [];
  const visited = new Map<object, NodeAdministration>();
  const queue: object[] = [root];
  for (let node = queue.shift(); node !== undefined; node = queue.shift()) {
    const administration = administrationOf(node);
    if (!administration || visited.has(node)) {
      continue;
    }
    visited.set(node, administration);
    for (const [key, child] of childrenOf(administration)) {
      if (!isTracked(child)) {
        continue;
      }
      if (!hasLink(child, administration.token, key)) {
        violations.push({ kind: "missing", owner: node, child, key });
      }
      queue.push(child);
    }
  }
  for (const child of visited.keys()) {
    for (const { owner, key } of parentsOf(child)) {
      const administration = visited.get(owner);
      if (administration && !reaches(administration, key, child)) {
        violations.push({ kind: "stale", owner, child, key });
      }
    }
  }
  return violations;
};

export const assertLinkInvariants = (root: object): void => {
  const violations = collectLinkViolations(root);
  if (violations.length > 0) {
    throw new LinkInvariantViolationError(
      `${violations.length} link violation(s): ${violations
        .map(({ kind, key }) => `${kind} link at ${describeKey(key)}`)
        .join(", ")}`,
      { violations },
    );
  }
};
