import type { JsonObject, JsonValue } from "type-fest";
import { SerializationError } from "./errors";

const isPlainObject = (value: object): value is Record<string, unknown> => {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const encodeEntries = (
  entries: Iterable<[string, unknown]>,
  path: string[],
  ancestors: Set<object>,
): JsonObject => {
  const encoded: JsonObject = {};
  for (const [key, value] of entries) {
    // like JSON.stringify, absent values are dropped from objects
    if (value !== undefined) {
      encoded[key] = encode(value, [...path, key], ancestors);
    }
  }
  return encoded;
};

const encodeObject = (value: object, path: string[], ancestors: Set<object>): JsonValue => {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => encode(item ?? null, [...path, String(index)], ancestors));
  }
  if (value instanceof Set) {
    return Array.from(value, (item: unknown, index) => encode(item ?? null, [...path, String(index)], ancestors));
  }
  if (value instanceof Map) {
    const entries: Array<[string, unknown]> = [];
    for (const [key, item] of value) {
      if (typeof key !== "string") {
        throw new SerializationError(`map key ${String(key)} is not a string`, path);
      }
      entries.push([key, item]);
    }
    return encodeEntries(entries, path, ancestors);
  }
  if (isPlainObject(value)) {
    return encodeEntries(Object.entries(value), path, ancestors);
  }
  throw new SerializationError(`cannot encode an instance of ${value.constructor.name}`, path);
};

const encode = (value: unknown, path: string[], ancestors: Set<object>): JsonValue => {
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) {
        throw new SerializationError(`${value} has no JSON form`, path);
      }
      return value;
    case "object": {
      if (value === null) {
        return null;
      }
      if (ancestors.has(value)) {
        throw new SerializationError("cyclic structures cannot be encoded", path);
      }
      ancestors.add(value);
      try {
        return encodeObject(value, path, ancestors);
      } finally {
        ancestors.delete(value);
      }
    }
    default:
      throw new SerializationError(`values of type ${typeof value} cannot be encoded`, path);
  }
};

/**
 * Plain value (as produced by `toPlain`/`toSnapshot`) to JSON.
 * Sets become arrays, maps with string keys become objects, dates become ISO strings.
 * Shared substructure is duplicated; cycles are rejected.
 */
export const encodeJson = (value: unknown): JsonValue => encode(value, [], new Set());

export const encodeRecord = (record: Record<string, unknown>): JsonObject =>
  encodeEntries(Object.entries(record), [], new Set([record]));
