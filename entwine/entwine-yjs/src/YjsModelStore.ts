import { bindingFor, modelClasses, observe, TrackedModel } from "@entwine/entwine";
import { nanoid } from "nanoid";
import invariant from "tiny-invariant";
import * as Y from "yjs";
import { DeserializationError } from "./errors";
import { YJS_RECORDS } from "./YJS_RECORDS";

type Attachment = {
  model: TrackedModel;
  stopObserving: () => void;
};

/**
 * Keeps tracked models as records of a Yjs document.
 *
 * Every stored model is observed: any change reaching it marks its record dirty, and `flush()` writes all
 * dirty records in a single document transaction. Records changed by remote updates are dropped from the
 * cache, so the next `load()` decodes their new state.
 *
 * Document layout: `records` map of id -> { __type__: model name, data: encoded snapshot }.
 */
export class YjsModelStore {
  readonly #records: Y.Map<Y.Map<unknown>>;
  readonly #attached = new Map<string, Attachment>();
  readonly #ids = new WeakMap<TrackedModel, string>();
  readonly #dirty = new Set<string>();

  constructor(readonly doc: Y.Doc) {
    this.#records = doc.getMap(YJS_RECORDS.records);
    this.#records.observeDeep(this.#onDocumentChange);
  }

  #onDocumentChange = (events: Array<Y.YEvent<Y.AbstractType<unknown>>>, transaction: Y.Transaction) => {
    if (transaction.local) {
      return;
    }
    for (const event of events) {
      const ids = event.path.length > 0 ? [String(event.path[0])] : Array.from(event.changes.keys.keys());
      for (const id of ids) {
        this.detach(id);
      }
    }
  };

  #attach(id: string, model: TrackedModel) {
    const stopObserving = observe(model, () => {
      this.#dirty.add(id);
    });
    this.#attached.set(id, { model, stopObserving });
    this.#ids.set(model, id);
  }

  #write(id: string) {
    const attachment = this.#attached.get(id);
    invariant(attachment, `record ${id} is not attached to this store`);
    const binding = bindingFor(attachment.model);
    invariant(binding, `model ${attachment.model.constructor.name} has no persistence binding`);
    const data = binding.encode(attachment.model);
    let record = this.#records.get(id);
    if (!record) {
      record = new Y.Map<unknown>();
      record.set(YJS_RECORDS.recordFields.type, binding.model.modelName);
      record.set(YJS_RECORDS.recordFields.data, data);
      this.#records.set(id, record);
    } else {
      record.set(YJS_RECORDS.recordFields.data, data);
    }
  }

  /** Stores a model (once; storing it again returns its id) and starts tracking its changes. */
  put(model: TrackedModel, id: string = nanoid()): string {
    const existing = this.#ids.get(model);
    if (existing !== undefined) {
      return existing;
    }
    invariant(!this.#attached.has(id), `record ${id} is already attached to another model`);
    invariant(bindingFor(model), `model ${model.constructor.name} has no persistence binding`);
    this.#attach(id, model);
    this.doc.transact(() => this.#write(id));
    return id;
  }

  idOf(model: TrackedModel): string | undefined {
    return this.#ids.get(model);
  }

  isDirty(id: string): boolean {
    return this.#dirty.has(id);
  }

  /** Writes every dirty record in one transaction and returns their ids. */
  flush(): string[] {
    const ids = Array.from(this.#dirty);
    if (ids.length === 0) {
      return ids;
    }
    this.doc.transact(() => {
      for (const id of ids) {
        this.#write(id);
      }
    });
    this.#dirty.clear();
    return ids;
  }

  load(id: string): TrackedModel | undefined {
    const attached = this.#attached.get(id);
    if (attached) {
      return attached.model;
    }
    const record = this.#records.get(id);
    if (!record) {
      return undefined;
    }
    const type = record.get(YJS_RECORDS.recordFields.type);
    const ModelClass = typeof type === "string" ? modelClasses.get(type) : undefined;
    if (!ModelClass) {
      throw new DeserializationError(`record ${id} has unknown model type ${String(type)}`, id);
    }
    const binding = bindingFor(ModelClass);
    if (!binding) {
      throw new DeserializationError(`model ${ModelClass.modelName} has no persistence binding`, id);
    }
    let model: TrackedModel;
    try {
      model = binding.decode(record.get(YJS_RECORDS.recordFields.data));
    } catch (e) {
      throw e instanceof DeserializationError
        ? new DeserializationError(e.message, id, e.cause)
        : new DeserializationError(`record ${id} cannot be decoded`, id, e);
    }
    this.#attach(id, model);
    return model;
  }

  loadAs<M extends TrackedModel>(ModelClass: abstract new () => M, id: string): M | undefined {
    const model = this.load(id);
    if (model === undefined) {
      return undefined;
    }
    if (!(model instanceof ModelClass)) {
      throw new DeserializationError(`record ${id} does not hold a ${ModelClass.name}`, id);
    }
    return model;
  }

  /** Stops tracking a record; unflushed changes of it are dropped. The stored record stays. */
  detach(id: string): void {
    const attachment = this.#attached.get(id);
    if (!attachment) {
      return;
    }
    attachment.stopObserving();
    this.#attached.delete(id);
    this.#ids.delete(attachment.model);
    this.#dirty.delete(id);
  }

  dispose(): void {
    this.#records.unobserveDeep(this.#onDocumentChange);
    for (const id of Array.from(this.#attached.keys())) {
      this.detach(id);
    }
  }
}
