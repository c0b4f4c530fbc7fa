/**
 * Tests for enableMobXIntegration: reads of tracked graphs inside reactions become MobX dependencies,
 * and changes propagated through the graph re-run them.
 */

import { tracked, TrackedModel, trackingHook } from "@entwine/entwine";
import { autorun, computed } from "mobx";
import { beforeEach, describe, expect, it } from "vitest";
import { enableMobXIntegration, isMobXIntegrationEnabled } from "../index";

@tracked
class Counter extends TrackedModel {
  @tracked accessor count = 0;
  @tracked accessor name = "test";
  @tracked accessor items: string[] = [];
  @tracked accessor labels: Record<string, string> = {};
}

describe("enableMobXIntegration", () => {
  let counter: Counter;

  beforeEach(() => {
    enableMobXIntegration();
    counter = Counter.create();
  });

  it("should track field access automatically", () => {
    const values: number[] = [];
    const dispose = autorun(() => {
      values.push(counter.count);
    });
    expect(values).toEqual([0]);

    counter.count = 5;
    expect(values).toEqual([0, 5]);

    counter.count = 10;
    expect(values).toEqual([0, 5, 10]);

    dispose();
  });

  it("should track fields independently", () => {
    const values: number[] = [];
    const dispose = autorun(() => {
      values.push(counter.count);
    });

    counter.name = "renamed";
    expect(values).toEqual([0]);

    dispose();
  });

  it("should not re-run for assignments of the same value", () => {
    const values: number[] = [];
    const dispose = autorun(() => {
      values.push(counter.count);
    });

    counter.count = counter.count;
    expect(values).toEqual([0]);

    dispose();
  });

  it("should re-run when a nested container changes", () => {
    const lengths: number[] = [];
    const dispose = autorun(() => {
      lengths.push(counter.items.length);
    });

    counter.items.push("a");
    expect(lengths).toEqual([0, 1]);

    dispose();
  });

  it("should re-run once for a batch", () => {
    const lengths: number[] = [];
    const dispose = autorun(() => {
      lengths.push(counter.items.length);
    });

    counter.batch(() => {
      counter.items.push("a");
      counter.items.push("b");
    });
    expect(lengths).toEqual([0, 2]);

    dispose();
  });

  it("should track record entries that do not exist yet", () => {
    const values: Array<string | undefined> = [];
    const dispose = autorun(() => {
      values.push(counter.labels.a);
    });

    counter.labels.a = "x";
    expect(values).toEqual([undefined, "x"]);

    dispose();
  });

  it("should work with computed values", () => {
    const doubled = computed(() => counter.count * 2);
    const values: number[] = [];
    const dispose = autorun(() => {
      values.push(doubled.get());
    });

    counter.count = 3;
    expect(values).toEqual([0, 6]);

    dispose();
  });

  it("should keep re-running after the same field is read outside any reaction", () => {
    const values: number[] = [];
    const dispose = autorun(() => {
      values.push(counter.count);
    });

    expect(counter.count).toBe(0);
    counter.count = 4;
    expect(values).toEqual([0, 4]);

    dispose();
  });

  it("should track a field first read outside any reaction", () => {
    expect(counter.count).toBe(0);
    const values: number[] = [];
    const dispose = autorun(() => {
      values.push(counter.count);
    });

    counter.count = 2;
    expect(values).toEqual([0, 2]);

    dispose();
  });

  it("should install the hooks only once", () => {
    const { access, modification, transaction } = trackingHook;
    const disable = enableMobXIntegration();
    expect(enableMobXIntegration()).toBe(disable);
    expect(isMobXIntegrationEnabled()).toBe(true);
    expect(trackingHook.access).toBe(access);
    expect(trackingHook.modification).toBe(modification);
    expect(trackingHook.transaction).toBe(transaction);
  });

  it("should put the previous hooks back when disabled", () => {
    const disable = enableMobXIntegration();
    disable();

    expect(isMobXIntegrationEnabled()).toBe(false);
    expect(trackingHook.access).toBeUndefined();
    expect(trackingHook.modification).toBeUndefined();
    expect(trackingHook.transaction).toBeUndefined();

    const values: number[] = [];
    const dispose = autorun(() => {
      values.push(counter.count);
    });
    counter.count = 1;
    expect(values).toEqual([0]);

    dispose();
  });
});
