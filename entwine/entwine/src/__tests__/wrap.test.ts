import { afterEach, describe, expect, it } from "vitest";
import {
  ALL_ITEMS,
  assertLinkInvariants,
  configureTracking,
  hasLink,
  isTracked,
  issueToken,
  nodeKind,
  parentsOf,
  RecursionLimitExceededError,
  resetTrackingConfig,
  resolveNode,
  track,
} from "../index";

afterEach(() => {
  resetTrackingConfig();
});

describe("track", () => {
  it("wraps plain containers into proxies over themselves", () => {
    const raw = { list: [1, 2], set: new Set([1]), map: new Map([["k", { v: 1 }]]) };
    const root = track(raw);
    expect(root).not.toBe(raw);
    expect(resolveNode(raw)).toBe(root);
    expect(nodeKind(root)).toBe("record");
    expect(nodeKind(root.list)).toBe("array");
    expect(nodeKind(root.set)).toBe("set");
    expect(nodeKind(root.map)).toBe("map");
    expect(nodeKind(root.map.get("k"))).toBe("record");
    expect(root.list).toEqual([1, 2]);
  });

  it("returns primitives and tracked values unchanged", () => {
    expect(track(5)).toBe(5);
    expect(track("text")).toBe("text");
    expect(track(null)).toBe(null);
    const root = track([]);
    expect(track(root)).toBe(root);
  });

  it("passes values it cannot track through untouched", () => {
    class Point {
      x = 1;
    }
    const date = new Date(0);
    const frozen = Object.freeze({ list: [1] });
    const point = new Point();
    const root = track({ date, frozen, point });
    expect(root.date).toBe(date);
    expect(root.frozen).toBe(frozen);
    expect(root.point).toBe(point);
    expect(isTracked(root.frozen)).toBe(false);
    expect(isTracked(root.point)).toBe(false);
  });

  it("terminates on a list containing itself, which comes out containing its own node", () => {
    const raw: unknown[] = [];
    raw.push(raw);
    const list = track(raw);
    expect(list[0]).toBe(list);
    expect(hasLink(list, issueToken(list), ALL_ITEMS)).toBe(true);
  });

  it("keeps shared substructure shared", () => {
    const shared = { n: 1 };
    const root = track({ a: shared, b: shared, list: [shared] });
    expect(root.a).toBe(root.b);
    expect(root.list[0]).toBe(root.a);
    expect(parentsOf(root.a).map(({ key }) => key)).toEqual(["a", "b", ALL_ITEMS]);
  });

  it("reuses the node of a raw value met in an earlier walk", () => {
    const raw = { n: 1 };
    const first = track(raw);
    const second = track({ again: raw });
    expect(second.again).toBe(first);
  });

  it("links every child to its container", () => {
    const root = track({ items: [{ id: 1, tags: new Set(["a"]) }], index: new Map([["first", { id: 1 }]]) });
    expect(() => assertLinkInvariants(root)).not.toThrow();
  });
});

describe("nesting limit", () => {
  it("accepts structures as deep as the limit", () => {
    configureTracking({ maxNestingDepth: 3 });
    const root = track({ a: { b: {} } });
    expect(isTracked(root.a.b)).toBe(true);
  });

  it("rejects deeper structures and leaves nothing of them tracked", () => {
    configureTracking({ maxNestingDepth: 3 });
    const inner = { c: {} };
    const raw = { a: { b: inner } };
    expect(() => track(raw)).toThrow(RecursionLimitExceededError);
    expect(resolveNode(raw)).toBeUndefined();
    expect(resolveNode(inner)).toBeUndefined();
    expect(isTracked(raw.a)).toBe(false);
    expect(raw.a.b).toBe(inner);
  });

  it("rejects a too deep assignment and keeps the previous value", () => {
    configureTracking({ maxNestingDepth: 2 });
    const initial: { slot: unknown } = { slot: [1] };
    const root = track(initial);
    const previous = root.slot;
    expect(() => {
      root.slot = [[[]]];
    }).toThrow(RecursionLimitExceededError);
    expect(root.slot).toBe(previous);
  });

  it("only accepts positive integers as limits", () => {
    expect(() => configureTracking({ maxNestingDepth: 0 })).toThrow(
      "tracking option maxNestingDepth should be a positive integer, got 0",
    );
  });
});
