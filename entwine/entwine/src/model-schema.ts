import invariant from "tiny-invariant";
import type { TrackedModel } from "./TrackedModel";
import type { WrapContext } from "./wrap";

export type FieldKind = "eager" | "lazy";

/** Access to one tracked field of a model class, independent of the field's declared type. */
export interface FieldSlot {
  readonly name: string;
  readonly kind: FieldKind;
  read(model: TrackedModel): unknown;
  /** re-wraps the stored value and re-links it to the model */
  restore(model: TrackedModel, context: WrapContext): void;
}

export type ModelSchema = Readonly<Record<string, FieldSlot>>;

// model class -> frozen field schema, filled in by the @tracked class decorator
const classSchemas = new WeakMap<object, ModelSchema>();

export const defineModelSchema = (modelClass: object, schema: ModelSchema) => {
  classSchemas.set(modelClass, Object.freeze({ ...schema }));
};

export const schemaOf = (model: TrackedModel): ModelSchema => {
  const schema = classSchemas.get(model.constructor);
  invariant(schema, `model class ${model.constructor.name} is not decorated with @tracked`);
  return schema;
};
