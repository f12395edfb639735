import { NativeAttributeValue } from "@aws-sdk/util-dynamodb";
import isEqual from "lodash/isEqual";
import { MissingKeyAttributeError } from "../errors";
import { AttributeMap, WriteRequest } from "../types";

export function requestAttributes(request: WriteRequest): AttributeMap {
  return "PutRequest" in request ? request.PutRequest.Item : request.DeleteRequest.Key;
}

/**
 * Reads the named key attributes out of a put's item or a delete's key, in the order given.
 */
export function extractKeyValues(request: WriteRequest, keyNames: readonly string[]): NativeAttributeValue[] {
  const attributes = requestAttributes(request);

  return keyNames.map((name) => {
    if (!Object.prototype.hasOwnProperty.call(attributes, name)) {
      throw new MissingKeyAttributeError(name, request);
    }
    return attributes[name];
  });
}

export function keyValuesEqual(lhs: readonly NativeAttributeValue[], rhs: readonly NativeAttributeValue[]): boolean {
  return lhs.length === rhs.length && lhs.every((value, i) => isEqual(value, rhs[i]));
}

export function describeRequest(request: WriteRequest): string {
  return "PutRequest" in request
    ? `PutRequest ${JSON.stringify(request.PutRequest.Item, jsonReplacer)}`
    : `DeleteRequest ${JSON.stringify(request.DeleteRequest.Key, jsonReplacer)}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// sets and bigints are valid attribute values but not valid JSON
function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Set) {
    return Array.from(value);
  }
  return value;
}
