import { WriteRequest } from "./types";

export class WriteBufferError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WriteBufferError";
  }
}

export class WriteBufferConfigError extends WriteBufferError {
  readonly option: string;

  constructor(option: string, message: string) {
    super(message);
    this.name = "WriteBufferConfigError";
    this.option = option;
  }
}

/**
 * Thrown when a request is missing one of the configured overwrite key attributes.
 */
export class MissingKeyAttributeError extends WriteBufferError {
  readonly attribute: string;
  readonly request: WriteRequest;

  constructor(attribute: string, request: WriteRequest) {
    super(`Request is missing overwrite key attribute "${attribute}"`);
    this.name = "MissingKeyAttributeError";
    this.attribute = attribute;
    this.request = request;
  }
}
