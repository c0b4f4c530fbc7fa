import invariant from "tiny-invariant";
import { ModelAdministration, registerModel } from "./administration";
import { batch } from "./batch";
import type { ModelSchema } from "./model-schema";
import { schemaOf } from "./model-schema";
import { toSnapshot } from "./snapshot";
import { restoreTracking } from "./wrap";

export type TrackedConstructor<T extends TrackedModel = TrackedModel> = (abstract new () => T) & {
  modelName: string;
  schema: ModelSchema;
};

/** Field values accepted by {@link TrackedModel.create}: every own data field, all optional. */
export type ModelInit<T extends TrackedModel> = {
  [key in keyof T as key extends keyof TrackedModel
    ? never
    : T[key] extends (...args: never[]) => unknown
      ? never
      : key]?: T[key];
};

const administrations = new WeakMap<TrackedModel, ModelAdministration>();

export const modelAdministration = (model: TrackedModel): ModelAdministration => {
  const administration = administrations.get(model);
  invariant(administration, "model was not constructed through TrackedModel");
  return administration;
};

const createModel = <M extends TrackedModel>(ModelClass: new () => M, init?: ModelInit<M>): M => {
  const model = new ModelClass();
  if (init) {
    const administration = modelAdministration(model);
    administration.constructing = true;
    try {
      Object.assign(model, init);
    } finally {
      administration.constructing = false;
    }
  }
  return model;
};

export const modelFromSnapshot = <M extends TrackedModel>(ModelClass: new () => M, snapshot: ModelInit<M>): M => {
  const model = createModel(ModelClass, snapshot);
  restoreTracking(model);
  return model;
};

/**
 * Base class of owners: objects whose `@tracked` fields report every change made to them or to anything
 * they contain, and which are themselves nodes that can be shared, nested in containers, or batched.
 *
 * ```
 * @tracked
 * class Project extends TrackedModel {
 *   @tracked accessor name = "";
 *   @tracked accessor tags: string[] = [];
 *   @tracked.lazy accessor history: Record<string, string[]> = {};
 * }
 *
 * const project = Project.create({ name: "demo" });
 * observe(project, ({ key }) => console.log("changed", key));
 * project.tags.push("a"); // changed tags
 * ```
 */
export abstract class TrackedModel {
  static modelName: string;
  static schema: ModelSchema = {};

  constructor() {
    administrations.set(this, registerModel(this));
  }

  /** creates a model and assigns its initial field values without reporting them as changes */
  static create<M extends TrackedModel>(this: new () => M, init?: ModelInit<M>): M {
    return createModel(this, init);
  }

  /**
   * Rebuilds a model from a plain snapshot (see {@link toSnapshot}), re-linking everything it contains.
   * Lazy fields are linked on first read.
   *
   * Snapshots carry no class names: a model nested in a field comes back as a plain record. Persistence
   * bindings rebuild such fields in their `decode` (the schema of `bindModel` can `transform` them into models).
   */
  static fromSnapshot<M extends TrackedModel>(this: new () => M, snapshot: ModelInit<M>): M {
    return modelFromSnapshot(this, snapshot);
  }

  get _schema(): ModelSchema {
    return schemaOf(this);
  }

  /** runs `fn` with this model's notifications coalesced into one */
  batch<T>(fn: () => T): T {
    return batch(this, fn);
  }

  toJSON() {
    return toSnapshot(this);
  }
}
