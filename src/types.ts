import { NativeAttributeValue } from "@aws-sdk/util-dynamodb";

export type AttributeMap = Record<string, NativeAttributeValue>;

export type PutRequest = { readonly PutRequest: { readonly Item: AttributeMap } };
export type DeleteRequest = { readonly DeleteRequest: { readonly Key: AttributeMap } };

/**
 * A single buffered mutation, in the same shape DynamoDB uses for batch write request items.
 */
export type WriteRequest = PutRequest | DeleteRequest;

export interface BulkWriteResult {
  /**
   * Requests the backend declined to apply, keyed by table name. Absent or empty means every request was applied.
   */
  unprocessed?: Record<string, WriteRequest[] | undefined>;
}

/**
 * Anything that can apply a batch of write requests to a single table.
 */
export interface BulkWriteBackend {
  bulkWrite(tableName: string, requests: WriteRequest[]): Promise<BulkWriteResult>;
}

export interface BatchWriterOptions {
  /**
   * The number of requests to hold before sending a bulk write. Also the maximum size of each bulk write.
   *
   * @default 25
   */
  flushAmount?: number;
  /**
   * Primary key attribute names. When set, a buffered request with the same key values as a new request
   * is discarded before the new one is added, so only the latest write for a row is sent.
   *
   * @default undefined
   */
  overwriteByKeys?: string[];
  /**
   * Milliseconds to wait between flushes while draining on close, when the backend keeps returning
   * unprocessed items.
   *
   * @default 0
   */
  exitBackoff?: number;
}

export interface BatchWriterConfig extends BatchWriterOptions {
  tableName: string;
  backend: BulkWriteBackend;
}
