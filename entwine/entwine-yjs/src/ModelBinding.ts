import {
  ModelInit,
  modelFromSnapshot,
  PersistenceBinding,
  registerBinding,
  toSnapshot,
  TrackedConstructor,
  TrackedModel,
} from "@entwine/entwine";
import type { JsonObject } from "type-fest";
import { z } from "zod";
import { encodeRecord } from "./encoding";
import { DeserializationError } from "./errors";

export type ModelSnapshotSchema<M extends TrackedModel> = z.ZodType<ModelInit<M>, z.ZodTypeDef, unknown>;

/**
 * Registers the JSON binding of a model class: snapshots are encoded as JSON objects, and decoded ones are
 * validated against `schema` before the model is rebuilt from them.
 *
 * ```
 * bindModel(Project, z.object({ name: z.string(), tags: z.array(z.string()) }));
 * ```
 */
export const bindModel = <M extends TrackedModel>(
  ModelClass: TrackedConstructor<M> & (new () => M),
  schema: ModelSnapshotSchema<M>,
): PersistenceBinding<M, JsonObject> =>
  registerBinding<M, JsonObject>({
    model: ModelClass,
    encode: (model) => encodeRecord(toSnapshot(model)),
    decode: (encoded) => {
      const parsed = schema.safeParse(encoded);
      if (!parsed.success) {
        throw new DeserializationError(
          `invalid ${ModelClass.modelName} snapshot: ${parsed.error.message}`,
          undefined,
          parsed.error,
        );
      }
      return modelFromSnapshot(ModelClass, parsed.data);
    },
  });
