export * from "./YJS_RECORDS";
export * from "./errors";
export { encodeJson, encodeRecord } from "./encoding";
export { bindModel } from "./ModelBinding";
export type { ModelSnapshotSchema } from "./ModelBinding";
export { YjsModelStore } from "./YjsModelStore";
