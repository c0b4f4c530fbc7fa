/** A model snapshot holds a value that has no JSON form. */
export class SerializationError extends Error {
  constructor(
    message: string,
    readonly path: readonly string[] = [],
  ) {
    super(path.length > 0 ? `${message} (at ${path.join(".")})` : message);
    this.name = "SerializationError";
  }
}

/** A stored record cannot be turned back into a model. */
export class DeserializationError extends Error {
  constructor(
    message: string,
    readonly recordId?: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "DeserializationError";
  }
}
