import { describe, expect, it, vi } from "vitest";
import {
  clearLinks,
  hasLink,
  issueToken,
  link,
  LinkInvariantViolationError,
  parentsOf,
  tokenOf,
  unlink,
  unlinkOwner,
} from "../index";

describe("ownership tokens", () => {
  it("issues one token per owner", () => {
    const owner = {};
    const token = issueToken(owner);
    expect(issueToken(owner)).toBe(token);
    expect(tokenOf(owner)).toBe(token);
    expect(token.deref()).toBe(owner);
    expect(token.alive).toBe(true);
  });

  it("never shares tokens between owners, whatever their contents", () => {
    expect(issueToken({ a: 1 })).not.toBe(issueToken({ a: 1 }));
  });

  it("has no token before one is issued", () => {
    expect(tokenOf({})).toBeUndefined();
  });
});

describe("parent links", () => {
  it("records links idempotently per owner and key", () => {
    const node = {};
    const owner = {};
    const token = issueToken(owner);
    expect(link(node, token, "a")).toBe(true);
    expect(link(node, token, "a")).toBe(false);
    expect(link(node, token, "b")).toBe(true);
    expect(parentsOf(node)).toEqual([
      { token, owner, key: "a" },
      { token, owner, key: "b" },
    ]);
  });

  it("removes exactly the requested link", () => {
    const node = {};
    const token = issueToken({});
    link(node, token, "a");
    link(node, token, "b");
    expect(unlink(node, token, "a")).toBe(true);
    expect(unlink(node, token, "a")).toBe(false);
    expect(hasLink(node, token, "a")).toBe(false);
    expect(hasLink(node, token, "b")).toBe(true);
  });

  it("keeps links of different owners apart", () => {
    const node = {};
    const first = {};
    const second = {};
    link(node, issueToken(first), "k");
    link(node, issueToken(second), "k");
    expect(unlinkOwner(node, issueToken(first))).toBe(true);
    expect(parentsOf(node)).toEqual([{ token: issueToken(second), owner: second, key: "k" }]);
  });

  it("forgets every link of a cleared node", () => {
    const node = {};
    const token = issueToken({});
    link(node, token, "a");
    clearLinks(node);
    expect(parentsOf(node)).toEqual([]);
    expect(hasLink(node, token, "a")).toBe(false);
  });

  it("prunes links whose owner is gone instead of returning them", () => {
    const node = {};
    const token = issueToken({});
    link(node, token, "a");
    const deref = vi.spyOn(token, "deref").mockReturnValue(undefined);
    expect(parentsOf(node)).toEqual([]);
    deref.mockRestore();
    expect(hasLink(node, token, "a")).toBe(false);
  });

  it("refuses to link to an owner that is gone", () => {
    const token = issueToken({});
    vi.spyOn(token, "deref").mockReturnValue(undefined);
    expect(() => link({}, token, "a")).toThrow(LinkInvariantViolationError);
  });
});
