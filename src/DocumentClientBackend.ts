import { BatchWriteCommand, DynamoDBDocumentClient as DocumentClient } from "@aws-sdk/lib-dynamodb";
import { AttributeMap, BulkWriteBackend, BulkWriteResult, WriteRequest } from "./types";

type RawWriteRequest = {
  PutRequest?: { Item?: AttributeMap };
  DeleteRequest?: { Key?: AttributeMap };
};

/**
 * Sends bulk writes through an aws-sdk v3 document client. Errors from the client are not caught here.
 */
export class DocumentClientBackend implements BulkWriteBackend {
  private client: DocumentClient;

  constructor(client: DocumentClient) {
    this.client = client;
  }

  async bulkWrite(tableName: string, requests: WriteRequest[]): Promise<BulkWriteResult> {
    const output = await this.client.send(
      new BatchWriteCommand({
        RequestItems: {
          [tableName]: requests,
        },
      })
    );

    if (!output || !output.UnprocessedItems) {
      return {};
    }

    return {
      unprocessed: Object.fromEntries(
        Object.entries(output.UnprocessedItems).map(([table, items]) => [table, items.map(toWriteRequest)])
      ),
    };
  }
}

function toWriteRequest(raw: RawWriteRequest): WriteRequest {
  if (raw.PutRequest?.Item) {
    return { PutRequest: { Item: raw.PutRequest.Item } };
  }

  if (raw.DeleteRequest?.Key) {
    return { DeleteRequest: { Key: raw.DeleteRequest.Key } };
  }

  throw new Error("Unprocessed item is neither a put nor a delete request");
}
