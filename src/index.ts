export { BatchWriter } from "./BatchWriter";
export { DocumentClientBackend } from "./DocumentClientBackend";
export { Table } from "./Table";
export type { TableConstructorConfig } from "./Table";
export { WriteBufferError, WriteBufferConfigError, MissingKeyAttributeError } from "./errors";
export * from "./types";
