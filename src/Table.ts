import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient as DocumentClient } from "@aws-sdk/lib-dynamodb";
import { BatchWriter } from "./BatchWriter";
import { DocumentClientBackend } from "./DocumentClientBackend";
import { BatchWriterOptions } from "./types";

export interface TableConstructorConfig extends BatchWriterOptions {
  /**
   * Must be an aws-sdk v3 document client. A default client is created if one is not supplied.
   * Passing in a client is helpful if you need to configure authorisation, region or a custom logger.
   *
   * @default DynamoDBDocumentClient.from(new DynamoDBClient({}))
   */
  client?: DocumentClient;
}

interface InstanceConfig {
  client: DocumentClient;
  /**
   * Name of the table
   */
  table: string;
  /**
   * @see BatchWriterOptions["flushAmount"]
   */
  flushAmount: number;
  /**
   * @see BatchWriterOptions["overwriteByKeys"]
   */
  overwriteByKeys?: string[];
  /**
   * @see BatchWriterOptions["exitBackoff"]
   */
  exitBackoff: number;
}

export class Table {
  config: InstanceConfig;

  constructor(tableName: string, config?: TableConstructorConfig) {
    this.config = this.createConfig(tableName, config);

    return this;
  }

  protected createConfig(tableName: string, config?: TableConstructorConfig): InstanceConfig {
    return {
      table: tableName,
      flushAmount: checkFlushAmount(config?.flushAmount ?? 25),
      overwriteByKeys: config?.overwriteByKeys,
      exitBackoff: checkExitBackoff(config?.exitBackoff ?? 0),
      client: (config && config.client) || DocumentClient.from(new DynamoDBClient({})),
    };
  }

  /**
   * A convenience long-form method to set the flush amount.
   * @param flushAmount Requests held before each bulk write, at most 25 for DynamoDB
   * @returns this
   */
  withFlushAmount(flushAmount = 25): this {
    this.config.flushAmount = checkFlushAmount(flushAmount);
    return this;
  }

  withExitBackoff(exitBackoff = 0): this {
    this.config.exitBackoff = checkExitBackoff(exitBackoff);
    return this;
  }

  withOverwriteByKeys(overwriteByKeys: string[]): this {
    this.config.overwriteByKeys = overwriteByKeys;
    return this;
  }

  /**
   * Creates a writer for this table. The caller is responsible for closing it.
   * @param options Overrides for the table's writer configuration
   */
  batchWriter(options?: BatchWriterOptions): BatchWriter {
    return new BatchWriter({
      tableName: this.config.table,
      backend: new DocumentClientBackend(this.config.client),
      flushAmount: options?.flushAmount ?? this.config.flushAmount,
      overwriteByKeys: options?.overwriteByKeys ?? this.config.overwriteByKeys,
      exitBackoff: options?.exitBackoff ?? this.config.exitBackoff,
    });
  }

  /**
   * Runs `fn` with a new writer and sends every remaining request once `fn` settles.
   */
  withBatchWriter<T>(fn: (writer: BatchWriter) => Promise<T>, options?: BatchWriterOptions): Promise<T> {
    return this.batchWriter(options).use(fn);
  }
}

// DynamoDB accepts at most 25 requests in a batch write
function checkFlushAmount(flushAmount: number): number {
  if (!Number.isInteger(flushAmount) || flushAmount < 1 || flushAmount > 25) {
    throw new Error("Flush amount out of range");
  }
  return flushAmount;
}

function checkExitBackoff(exitBackoff: number): number {
  if (!Number.isFinite(exitBackoff) || exitBackoff < 0) {
    throw new Error("Exit backoff out of range");
  }
  return exitBackoff;
}
