import { administrationOf, classifyContainer, NodeTarget } from "./administration";
import { schemaOf } from "./model-schema";
import type { TrackedModel } from "./TrackedModel";
import { never } from "./utils";

type Copies = Map<object, unknown>;

const copyModel = (model: TrackedModel, copies: Copies): Record<string, unknown> => {
  const copy: Record<string, unknown> = {};
  copies.set(model, copy);
  for (const slot of Object.values(schemaOf(model))) {
    copy[slot.name] = copyValue(slot.read(model), copies);
  }
  return copy;
};

// reads go to raw storage, so exporting neither reports accesses nor materializes lazy values
const copyContainer = (source: object, node: NodeTarget, copies: Copies): unknown => {
  switch (node.kind) {
    case "array": {
      const copy: unknown[] = [];
      copies.set(source, copy);
      for (const item of node.target) {
        copy.push(copyValue(item, copies));
      }
      return copy;
    }
    case "record": {
      const copy: Record<string, unknown> = {};
      copies.set(source, copy);
      for (const [key, value] of Object.entries(node.target)) {
        copy[key] = copyValue(value, copies);
      }
      return copy;
    }
    case "set": {
      const copy = new Set<unknown>();
      copies.set(source, copy);
      for (const member of node.target) {
        copy.add(copyValue(member, copies));
      }
      return copy;
    }
    case "map": {
      const copy = new Map<unknown, unknown>();
      copies.set(source, copy);
      for (const [key, value] of node.target) {
        copy.set(key, copyValue(value, copies));
      }
      return copy;
    }
    default:
      return never(node);
  }
};

const copyValue = (value: unknown, copies: Copies): unknown => {
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (copies.has(value)) {
    return copies.get(value);
  }
  const administration = administrationOf(value);
  if (administration?.kind === "model") {
    return copyModel(administration.target, copies);
  }
  // raw containers show up in lazy fields that were never read
  const node = administration ?? classifyContainer(value);
  return node ? copyContainer(value, node, copies) : value;
};

/**
 * Plain deep copy of a value with all tracking stripped: no proxies, no links, models turned into records of
 * their fields. Shared and cyclic parts are shared and cyclic in the copy too. Values the tracker does not know
 * (dates, class instances...) are carried over by reference.
 */
export const toPlain = (value: unknown): unknown => copyValue(value, new Map());

/**
 * The plain field record of a model, ready to be encoded by a persistence binding.
 * Nested models are flattened into records of their fields; the binding decoding it decides what to rebuild.
 */
export const toSnapshot = (model: TrackedModel): Record<string, unknown> => copyModel(model, new Map());
