import invariant from "tiny-invariant";
import { TrackedConstructor, TrackedModel } from "./TrackedModel";
import { isObject } from "./utils";

/**
 * Knows how to turn one model class into its persisted form and back.
 * The core never encodes anything itself; it only keeps track of which binding belongs to which class.
 */
export interface PersistenceBinding<M extends TrackedModel = TrackedModel, Encoded = unknown> {
  readonly model: TrackedConstructor<M>;
  encode(model: M): Encoded;
  decode(encoded: unknown): M;
}

const bindings = new Map<object, PersistenceBinding>();

export const registerBinding = <M extends TrackedModel, Encoded>(
  binding: PersistenceBinding<M, Encoded>,
): PersistenceBinding<M, Encoded> => {
  invariant(
    !bindings.has(binding.model),
    `model ${binding.model.name} already has a persistence binding`,
  );
  bindings.set(binding.model, binding);
  return binding;
};

/** The binding of a model (or model class), inherited from the closest bound ancestor class. */
export const bindingFor = (modelOrClass: TrackedModel | TrackedConstructor): PersistenceBinding | undefined => {
  let current: unknown = modelOrClass instanceof TrackedModel ? modelOrClass.constructor : modelOrClass;
  while (isObject(current) && current !== TrackedModel) {
    const binding = bindings.get(current);
    if (binding) {
      return binding;
    }
    current = Object.getPrototypeOf(current);
  }
  return undefined;
};
