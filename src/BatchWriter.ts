import { WriteBufferConfigError } from "./errors";
import { describeRequest, extractKeyValues, keyValuesEqual, sleep } from "./helpers";
import { AttributeMap, BatchWriterConfig, BulkWriteBackend, BulkWriteResult, WriteRequest } from "./types";

/**
 * Buffers puts and deletes for a single table and sends them as bulk writes of `flushAmount` requests.
 *
 * Requests the backend reports as unprocessed are queued again behind whatever was buffered while the
 * bulk write was in flight. A bulk write that fails outright is not retried: the error is rethrown to the
 * caller of the operation that triggered the flush, and the requests in that batch have an unknown delivery
 * status.
 *
 * Always call `close()` (or run the writer through `use()`) so the remaining requests are sent.
 */
export class BatchWriter {
  readonly tableName: string;
  private backend: BulkWriteBackend;
  private buffer: WriteRequest[] = [];
  private activeRequests: Promise<void>[] = [];
  private flushAmount = 25;
  private exitBackoff = 0;
  private overwriteByKeys: string[] | undefined;

  constructor(config: BatchWriterConfig) {
    if (!config.tableName) {
      throw new WriteBufferConfigError("tableName", "Table name is required");
    }

    if (typeof config.flushAmount === "number" && (!Number.isInteger(config.flushAmount) || config.flushAmount < 1)) {
      throw new WriteBufferConfigError("flushAmount", "Flush amount out of range");
    }

    if (
      typeof config.exitBackoff === "number" &&
      (!Number.isFinite(config.exitBackoff) || config.exitBackoff < 0)
    ) {
      throw new WriteBufferConfigError("exitBackoff", "Exit backoff out of range");
    }

    this.tableName = config.tableName;
    this.backend = config.backend;
    this.flushAmount = config.flushAmount ?? this.flushAmount;
    this.exitBackoff = config.exitBackoff ?? this.exitBackoff;
    this.overwriteByKeys = config.overwriteByKeys?.length ? [...config.overwriteByKeys] : undefined;
  }

  /**
   * A copy of the requests waiting to be sent, oldest first.
   */
  get bufferedRequests(): WriteRequest[] {
    return [...this.buffer];
  }

  put(item: AttributeMap): Promise<void> {
    return this.addRequestAndProcess({ PutRequest: { Item: item } });
  }

  delete(key: AttributeMap): Promise<void> {
    return this.addRequestAndProcess({ DeleteRequest: { Key: key } });
  }

  /**
   * Sends the oldest `flushAmount` buffered requests in one bulk write. Does nothing when the buffer is empty.
   */
  async flush(): Promise<void> {
    if (!this.buffer.length) {
      return;
    }

    // take the batch before awaiting, requests added during the write queue up behind it
    const batch = this.buffer.splice(0, this.flushAmount);

    const request: Promise<void> = this.writeBatch(batch).finally(() => {
      this.activeRequests = this.activeRequests.filter((r) => r !== request);
    });
    this.activeRequests.push(request);

    await request;
  }

  /**
   * Waits for writes already in flight, then flushes until the buffer is empty, waiting `exitBackoff`
   * milliseconds between flushes that leave requests behind. If a flush fails, the error is rethrown and
   * the requests still buffered are not sent. Failures of writes started by `put` or `delete` are left
   * to those callers.
   */
  async close(): Promise<void> {
    await this.settleActiveRequests();

    while (!this.isDone()) {
      await this.flush();
      await this.settleActiveRequests();

      if (this.buffer.length && this.exitBackoff > 0) {
        await sleep(this.exitBackoff);
      }
    }
  }

  /**
   * Runs `fn` with this writer and closes the writer afterwards, including when `fn` throws.
   * An error from closing takes the place of any error thrown by `fn`.
   */
  async use<T>(fn: (writer: this) => Promise<T>): Promise<T> {
    try {
      return await fn(this);
    } finally {
      await this.close();
    }
  }

  private async addRequestAndProcess(request: WriteRequest): Promise<void> {
    if (this.overwriteByKeys) {
      this.removeDuplicateKeyRequest(request, this.overwriteByKeys);
    }

    this.buffer.push(request);
    await this.flushIfNeeded();
  }

  private removeDuplicateKeyRequest(request: WriteRequest, keyNames: string[]): void {
    const keyValues = extractKeyValues(request, keyNames);
    const matches = this.buffer.filter((buffered) => keyValuesEqual(extractKeyValues(buffered, keyNames), keyValues));
    const [duplicate] = matches;

    if (!duplicate) {
      return;
    }

    if (matches.length > 1) {
      // only possible when an unprocessed request came back after a newer write to the same key
      console.warn(`Warning: ${matches.length} buffered requests share the key of ${describeRequest(request)}`);
    }

    this.buffer.splice(this.buffer.indexOf(duplicate), 1);
    console.debug(`With overwriteByKeys enabled, skipping request: ${describeRequest(duplicate)}`);
  }

  private async writeBatch(batch: WriteRequest[]): Promise<void> {
    let result: BulkWriteResult;
    try {
      result = await this.backend.bulkWrite(this.tableName, batch);
    } catch (e) {
      console.error("Error: AWS Error, Batch Write", e);
      throw e;
    }

    this.processResult(batch, result);
  }

  private async settleActiveRequests(): Promise<void> {
    while (this.activeRequests.length) {
      await Promise.allSettled(this.activeRequests);
    }
  }

  private async flushIfNeeded(): Promise<void> {
    if (this.buffer.length >= this.flushAmount) {
      await this.flush();
    }
  }

  private processResult(batch: WriteRequest[], result: BulkWriteResult): void {
    const unprocessed = result.unprocessed?.[this.tableName] ?? [];

    this.buffer.push(...unprocessed);

    console.debug(
      `Batch write sent ${batch.length}, unprocessed: ${unprocessed.length}, buffer ${this.buffer.length}`
    );
  }

  private isDone(): boolean {
    return this.buffer.length === 0 && this.activeRequests.length === 0;
  }
}
