import invariant from "tiny-invariant";
import { isWrapperOf, resolveNode } from "./administration";
import { LinkInvariantViolationError } from "./errors";
import { modelClasses } from "./globals";
import { materialize } from "./lazy";
import { link, unlink } from "./link-registry";
import { defineModelSchema, FieldKind, FieldSlot, ModelSchema } from "./model-schema";
import { notifyChange } from "./propagation";
import { modelAdministration, TrackedConstructor, TrackedModel } from "./TrackedModel";
import { trackAccess } from "./tracking";
import { isObject } from "./utils";
import { adopt, wrap, WrapContext } from "./wrap";

// stage-3 decorator metadata needs Symbol.metadata, which Node 20 does not ship yet
if (!("metadata" in Symbol)) {
  Object.defineProperty(Symbol, "metadata", { value: Symbol.for("Symbol.metadata") });
}

type ClassDecoratorArgs = [TrackedConstructor, ClassDecoratorContext<TrackedConstructor>];
type AccessorDecoratorArgs = [
  ClassAccessorDecoratorTarget<TrackedModel, unknown>,
  ClassAccessorDecoratorContext<TrackedModel, unknown>,
];

const argsAreClassDecoratorArgs = (
  args: ClassDecoratorArgs | AccessorDecoratorArgs,
): args is ClassDecoratorArgs => args[1].kind === "class";

// decorator metadata object -> field slots declared on that class
const declaredSchemas = new WeakMap<object, Record<string, FieldSlot>>();

/**
 * Field slots visible from a class's metadata, inherited ones included.
 * Metadata objects of subclasses have their parent's metadata as prototype.
 */
const inheritedSchema = (metadata: unknown): Record<string, FieldSlot> => {
  for (let current = metadata; isObject(current); current = Object.getPrototypeOf(current)) {
    const schema = declaredSchemas.get(current);
    if (schema) {
      return schema;
    }
  }
  return {};
};

const declareSlot = (metadata: DecoratorMetadataObject, slot: FieldSlot) => {
  let schema = declaredSchemas.get(metadata);
  if (!schema) {
    // parent declarations are complete by the time a subclass is declared, so copying them is enough
    schema = { ...inheritedSchema(Object.getPrototypeOf(metadata)) };
    declaredSchemas.set(metadata, schema);
  }
  schema[slot.name] = slot;
};

const release = (owner: TrackedModel, key: string, previous: unknown, next: unknown) => {
  const node = resolveNode(previous);
  if (node && node !== resolveNode(next)) {
    unlink(node, modelAdministration(owner).token, key);
  }
};

/**
 * Accessor handlers for a tracked field.
 *
 * Eager fields wrap whatever is assigned to them right away.
 * Lazy fields store assigned values raw and only link values that are tracked already; the wrapping itself
 * happens on first read, through {@link materialize}, which also repairs links lost out of band.
 */
const createHandlers = <Model extends TrackedModel, Value>(
  target: ClassAccessorDecoratorTarget<Model, Value>,
  context: ClassAccessorDecoratorContext<Model, Value>,
  kind: FieldKind,
): ClassAccessorDecoratorResult<Model, Value> => {
  const { name, metadata } = context;
  invariant(typeof name === "string", "tracked fields should have string names");
  invariant(!context.static, `static field ${name} cannot be tracked`);
  invariant(metadata, "decorator metadata is unavailable");

  // stores `value` the way this field keeps its values, linked to `model`
  const store = (model: Model, value: Value): Value => {
    const { token } = modelAdministration(model);
    if (kind === "lazy") {
      const node = resolveNode(value);
      if (node) {
        link(node, token, name);
      }
      return value;
    }
    const node = adopt(value, token, name);
    if (!isWrapperOf(node, value)) {
      throw new LinkInvariantViolationError(`field ${name} was wrapped into an unrelated value`);
    }
    return node;
  };

  declareSlot(metadata, {
    name,
    kind,
    read(model: Model) {
      return target.get.call(model);
    },
    restore(model: Model, wrapContext: WrapContext) {
      if (kind === "lazy") {
        return;
      }
      const stored = target.get.call(model);
      const node = wrap(stored, modelAdministration(model).token, name, wrapContext);
      if (node !== stored && isWrapperOf(node, stored)) {
        target.set.call(model, node);
        wrapContext.undo.push(() => target.set.call(model, stored));
      }
    },
  });

  return {
    get(this: Model): Value {
      trackAccess(this, name);
      const stored = target.get.call(this);
      const node = materialize(this, name, stored);
      if (node !== stored && isWrapperOf(node, stored)) {
        target.set.call(this, node);
        return node;
      }
      return stored;
    },
    set(this: Model, value: Value) {
      const previous = target.get.call(this);
      if (Object.is(previous, value) || (resolveNode(value) ?? value) === previous) {
        return;
      }
      const next = store(this, value);
      target.set.call(this, next);
      release(this, name, previous, next);
      if (!modelAdministration(this).constructing) {
        notifyChange(this, name);
      }
    },
    init(this: Model, value: Value): Value {
      return store(this, value);
    },
  };
};

function trackedDecorator<Constructor extends TrackedConstructor>(
  target: Constructor,
  context: ClassDecoratorContext<Constructor>,
): Constructor;
function trackedDecorator<Model extends TrackedModel, Value>(
  target: ClassAccessorDecoratorTarget<Model, Value>,
  context: ClassAccessorDecoratorContext<Model, Value>,
): ClassAccessorDecoratorResult<Model, Value>;
function trackedDecorator(...args: ClassDecoratorArgs | AccessorDecoratorArgs): unknown {
  if (argsAreClassDecoratorArgs(args)) {
    const [target, context] = args;
    const name = context.name ?? target.name;
    invariant(name, "tracked model classes should have a name");
    invariant(!modelClasses.has(name), `model class name ${name} is non-unique`);
    const schema: ModelSchema = inheritedSchema(context.metadata);
    target.modelName = name;
    target.schema = schema;
    defineModelSchema(target, schema);
    modelClasses.set(name, target);
    return target;
  }
  const [target, context] = args;
  return createHandlers(target, context, "eager");
}

const lazyDecorator = <Model extends TrackedModel, Value>(
  target: ClassAccessorDecoratorTarget<Model, Value>,
  context: ClassAccessorDecoratorContext<Model, Value>,
): ClassAccessorDecoratorResult<Model, Value> => createHandlers(target, context, "lazy");

/**
 * `@tracked` on a model class registers it; on an `accessor` field it tracks the field eagerly.
 * `@tracked.lazy` tracks a field but defers wrapping its value until it is first read.
 */
export const tracked = Object.assign(trackedDecorator, { lazy: lazyDecorator });
