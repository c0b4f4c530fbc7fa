import { describe, expect, it } from "vitest";
import {
  ALL_ITEMS,
  collectLinkViolations,
  hasLink,
  issueToken,
  modelClasses,
  nodeKind,
  observe,
  onBoundary,
  parentsOf,
  resolveNode,
  toSnapshot,
  track,
  tracked,
  TrackedModel,
} from "../index";

@tracked
class Note extends TrackedModel {
  @tracked accessor title = "";
  @tracked accessor tags: string[] = [];
  @tracked accessor meta: Record<string, unknown> = {};
}

@tracked
class LazyNote extends TrackedModel {
  @tracked.lazy accessor title = "";
  @tracked.lazy accessor tags: string[] = [];
  @tracked.lazy accessor meta: Record<string, unknown> = {};
}

@tracked
class Pair extends TrackedModel {
  @tracked accessor a: Record<string, number> = {};
  @tracked accessor b: Record<string, number> = {};
}

@tracked
class Board extends TrackedModel {
  @tracked accessor notes: Note[] = [];
}

@tracked
class Task extends Note {
  @tracked accessor done = false;
}

const changesOf = (node: object) => {
  const keys: unknown[] = [];
  observe(node, ({ key }) => keys.push(key));
  return keys;
};

describe("model registration", () => {
  it("registers decorated classes under their name", () => {
    expect(Note.modelName).toBe("Note");
    expect(modelClasses.get("Note")).toBe(Note);
    expect(Object.keys(Note.schema)).toEqual(["title", "tags", "meta"]);
    expect(Note.schema.tags.kind).toBe("eager");
    expect(LazyNote.schema.tags.kind).toBe("lazy");
  });

  it("inherits the fields of decorated parents", () => {
    expect(Task.modelName).toBe("Task");
    expect(Object.keys(Task.schema)).toEqual(["title", "tags", "meta", "done"]);
    const task = Task.create({ title: "write tests", done: true });
    expect(toSnapshot(task)).toEqual({ title: "write tests", tags: [], meta: {}, done: true });
  });

  it("refuses a second class with the same name", () => {
    expect(() => {
      @tracked
      class Note extends TrackedModel {}
      return Note;
    }).toThrow("model class name Note is non-unique");
  });
});

describe("tracked fields", () => {
  it("reports each change of a nested list", () => {
    const note = Note.create();
    const keys = changesOf(note);
    note.tags.push("a");
    note.tags.push("b");
    expect(keys).toEqual(["tags", "tags"]);
  });

  it("reports the same changes once inside a batch", () => {
    const note = Note.create();
    const keys = changesOf(note);
    note.batch(() => {
      note.tags.push("a");
      note.tags.push("b");
    });
    expect(keys).toEqual([ALL_ITEMS]);
  });

  it("reports a change of a record shared by two fields once per field", () => {
    const pair = Pair.create();
    pair.b = pair.a;
    const keys = changesOf(pair);
    const boundaries: unknown[] = [];
    const stop = onBoundary(({ node }) => boundaries.push(node));
    pair.a.x = 1;
    stop();
    expect(keys).toEqual(["a", "b"]);
    expect(boundaries).toEqual([pair, pair]);
  });

  it("ignores assignments of the value already held", () => {
    const note = Note.create({ title: "t" });
    const keys = changesOf(note);
    note.title = note.title;
    note.tags = note.tags;
    note.meta = note.meta;
    expect(keys).toEqual([]);
    note.title = "u";
    expect(keys).toEqual(["title"]);
  });

  it("does not report initial values", () => {
    const boundaries: unknown[] = [];
    const stop = onBoundary(({ node }) => boundaries.push(node));
    const note = Note.create({ title: "t", tags: ["a"] });
    stop();
    expect(boundaries).toEqual([]);
    expect(nodeKind(note.tags)).toBe("array");
  });

  it("unlinks values replaced by an assignment", () => {
    const note = Note.create();
    const previous = note.tags;
    note.tags = ["n"];
    expect(parentsOf(previous)).toEqual([]);
    expect(hasLink(note.tags, issueToken(note), "tags")).toBe(true);
  });

  it("passes changes of a nested model up to its owners", () => {
    const note = Note.create();
    const board = Board.create({ notes: [note] });
    const keys = changesOf(board);
    note.title = "changed";
    expect(keys).toEqual(["notes"]);
  });

  it("serializes to its snapshot", () => {
    const note = Note.create({ title: "t", tags: ["a"] });
    expect(JSON.parse(JSON.stringify(note))).toEqual({ title: "t", tags: ["a"], meta: {} });
  });
});

describe("lazy fields", () => {
  it("wrap their value on first read only", () => {
    const meta = { nested: { list: [1] } };
    const note = LazyNote.create({ meta });
    expect(resolveNode(meta)).toBeUndefined();
    const node = note.meta;
    expect(resolveNode(meta)).toBe(node);
    expect(nodeKind(node.nested)).toBe("record");
    expect(collectLinkViolations(note)).toEqual([]);
  });

  it("end up in the same state as eager fields", () => {
    const data = () => ({ title: "t", tags: ["a", "b"], meta: { nested: { list: [1, 2] } } });
    const eager = Note.create(data());
    const lazy = LazyNote.create(data());
    expect(toSnapshot(lazy)).toEqual(toSnapshot(eager));
    expect(nodeKind(lazy.meta.nested)).toBe(nodeKind(eager.meta.nested));
    expect(nodeKind(lazy.tags)).toBe(nodeKind(eager.tags));
    expect(collectLinkViolations(lazy)).toEqual([]);
    expect(collectLinkViolations(eager)).toEqual([]);

    const eagerKeys = changesOf(eager);
    const lazyKeys = changesOf(lazy);
    eager.tags.push("c");
    lazy.tags.push("c");
    expect(lazyKeys).toEqual(eagerKeys);
    expect(lazyKeys).toEqual(["tags"]);
  });

  it("link tracked values as soon as they are assigned", () => {
    const note = LazyNote.create();
    const shared = track({ n: 1 });
    note.meta = shared;
    expect(hasLink(shared, issueToken(note), "meta")).toBe(true);
  });
});
