import { AttributeMap, BulkWriteBackend, BulkWriteResult, DeleteRequest, PutRequest, WriteRequest } from "../src";

export const TEST_TABLE = "write-buffer-test";

export type BulkWriteMock = jest.Mock<Promise<BulkWriteResult>, [string, WriteRequest[]]>;

/**
 * An in-process backend. Each argument answers one bulk write in order, an Error rejects that call.
 * Calls beyond the supplied results succeed with nothing unprocessed.
 */
export function createBackend(...results: (BulkWriteResult | Error)[]): BulkWriteBackend & { bulkWrite: BulkWriteMock } {
  const bulkWrite: BulkWriteMock = jest.fn();

  results.forEach((result) => {
    if (result instanceof Error) {
      bulkWrite.mockRejectedValueOnce(result);
    } else {
      bulkWrite.mockResolvedValueOnce(result);
    }
  });
  bulkWrite.mockResolvedValue({});

  return { bulkWrite };
}

export function put(item: AttributeMap): PutRequest {
  return { PutRequest: { Item: item } };
}

export function del(key: AttributeMap): DeleteRequest {
  return { DeleteRequest: { Key: key } };
}

export function unprocessed(...requests: WriteRequest[]): BulkWriteResult {
  return { unprocessed: { [TEST_TABLE]: requests } };
}
