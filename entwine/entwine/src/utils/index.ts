export { DefaultedWeakMap } from "./defaulted-collections";

export function never(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}

export const isObject = (value: unknown): value is object =>
  (typeof value === "object" && value !== null) || typeof value === "function";

export const describeKey = (key: unknown): string =>
  typeof key === "symbol" ? key.toString() : typeof key === "string" ? key : String(key);
