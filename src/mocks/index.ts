import { BatchWriteCommand, BatchWriteCommandOutput, DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";

type Spy<TInput, TOutput> = jest.MockContext<Promise<TOutput>, [TInput]>;
type WrappedFn<TInput, TOutput> = (client: DynamoDBDocumentClient, spy: Spy<TInput, TOutput>) => Promise<void>;
type MockReturn<TOutput> =
  | { err?: Error; data?: Omit<TOutput, "$metadata"> }
  | { err?: Error; data?: Omit<TOutput, "$metadata"> }[];

/**
 * Wraps a test so every BatchWriteCommand sent through a document client resolves or rejects with `returns`
 * instead of reaching DynamoDB. When `returns` is an array, each call takes the next entry.
 * Clients created with `DynamoDBDocumentClient.from` inside the test are replaced by the mocked client.
 */
export function mockBatchWrite(
  fn: WrappedFn<BatchWriteCommand, BatchWriteCommandOutput>,
  returns?: MockReturn<BatchWriteCommandOutput>,
  delay?: number
): () => Promise<void> {
  return async () => {
    const client = DynamoDBDocumentClient.from(new DynamoDBClient({}));
    const { spy, restore } = setupMock(client, returns, delay);

    try {
      await fn(client, spy.mock);
    } finally {
      restore();
    }
  };
}

function setupMock(
  client: DynamoDBDocumentClient,
  returns: MockReturn<BatchWriteCommandOutput> = {},
  delay?: number
) {
  // records inputs to the request, only for batch writes
  const spy = jest.fn<Promise<BatchWriteCommandOutput>, [BatchWriteCommand]>();

  // array iterator when 'returns' includes an array
  let callCount = 0;

  const callback = (): Promise<unknown> => {
    const result = Array.isArray(returns) ? returns[callCount] : returns;
    if (Array.isArray(returns)) {
      callCount += 1;
    }

    return new Promise((resolve, reject) => {
      const settle = () => (result?.err ? reject(result.err) : resolve(result?.data));
      if (typeof delay === "number") {
        setTimeout(settle, delay);
      } else {
        settle();
      }
    });
  };

  const sendSpy = jest.spyOn(client, "send").mockImplementation((...args) => {
    const [command] = args;
    if (!(command instanceof BatchWriteCommand)) {
      return Promise.reject(new Error(`Unexpected command sent to mocked client: ${command.constructor.name}`));
    }
    void spy(command);
    return callback();
  });

  // also mock the document client factory, so code that creates its own client is mocked too
  const fromSpy = jest.spyOn(DynamoDBDocumentClient, "from").mockImplementation(() => client);

  return {
    spy,
    restore: () => {
      sendSpy.mockRestore();
      fromSpy.mockRestore();
    },
  };
}
