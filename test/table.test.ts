import { Table } from "../src";
import { mockBatchWrite } from "../src/mocks";
import { del, put, TEST_TABLE } from "./helpers";

describe("Table", () => {
  test(
    "creates a table with default writer configuration",
    mockBatchWrite(async (client, _spy) => {
      const table = new Table(TEST_TABLE, { client });
      expect(table.config.table).toEqual(TEST_TABLE);
      expect(table.config.flushAmount).toEqual(25);
      expect(table.config.exitBackoff).toEqual(0);
      expect(table.config.overwriteByKeys).toBeUndefined();
      expect(table.config.client).toBe(client);
    })
  );

  test(
    "updates table config",
    mockBatchWrite(async (client, _spy) => {
      const table = new Table(TEST_TABLE, { client });
      table.withFlushAmount(10).withExitBackoff(200).withOverwriteByKeys(["id", "sk"]);
      expect(table.config.flushAmount).toEqual(10);
      expect(table.config.exitBackoff).toEqual(200);
      expect(table.config.overwriteByKeys).toStrictEqual(["id", "sk"]);

      expect(() => table.withFlushAmount(0)).toThrow("Flush amount out of range");
      expect(() => table.withFlushAmount(26)).toThrow("Flush amount out of range");
      expect(() => table.withExitBackoff(-1)).toThrow("Exit backoff out of range");
      expect(() => table.withExitBackoff(NaN)).toThrow("Exit backoff out of range");
    })
  );

  test(
    "rejects out of range configuration when the table is created",
    mockBatchWrite(async (client, _spy) => {
      expect(() => new Table(TEST_TABLE, { client, flushAmount: 26 })).toThrow("Flush amount out of range");
      expect(() => new Table(TEST_TABLE, { client, flushAmount: 0 })).toThrow("Flush amount out of range");
      expect(() => new Table(TEST_TABLE, { client, exitBackoff: -1 })).toThrow("Exit backoff out of range");
      expect(() => new Table(TEST_TABLE, { client, exitBackoff: Infinity })).toThrow("Exit backoff out of range");
    })
  );

  test(
    "batch writers use the table's flush amount",
    mockBatchWrite(async (client, spy) => {
      const table = new Table(TEST_TABLE, { client }).withFlushAmount(2);
      const writer = table.batchWriter();

      await writer.put({ id: "1" });
      await writer.put({ id: "2" });

      expect(writer.tableName).toEqual(TEST_TABLE);
      expect(spy.calls.length).toEqual(1);
    })
  );

  test(
    "batch writer options override the table configuration",
    mockBatchWrite(async (client, spy) => {
      const table = new Table(TEST_TABLE, { client, flushAmount: 2 });
      const writer = table.batchWriter({ flushAmount: 3 });

      await writer.put({ id: "1" });
      await writer.put({ id: "2" });
      expect(spy.calls.length).toEqual(0);

      await writer.close();
      expect(spy.calls.length).toEqual(1);
    })
  );

  test(
    "withBatchWriter deduplicates by the table's overwrite keys and drains on completion",
    mockBatchWrite(async (client, spy) => {
      const table = new Table(TEST_TABLE, { client, overwriteByKeys: ["id", "sk"] });

      await table.withBatchWriter(async (writer) => {
        await writer.put({ id: "1", sk: "a", version: 1 });
        await writer.put({ id: "1", sk: "a", version: 2 });
        await writer.delete({ id: "2", sk: "b" });
      });

      expect(spy.calls.length).toEqual(1);
      expect(spy.calls[0][0].input.RequestItems).toStrictEqual({
        [TEST_TABLE]: [put({ id: "1", sk: "a", version: 2 }), del({ id: "2", sk: "b" })],
      });
    })
  );

  test(
    "withBatchWriter drains when the callback throws",
    mockBatchWrite(async (client, spy) => {
      const table = new Table(TEST_TABLE, { client });

      await expect(
        table.withBatchWriter(async (writer) => {
          await writer.put({ id: "1" });
          throw new Error("application failure");
        })
      ).rejects.toThrow("application failure");

      expect(spy.calls.length).toEqual(1);
    })
  );

  test(
    "a table without a client uses a default document client",
    mockBatchWrite(async (_client, spy) => {
      const table = new Table(TEST_TABLE);

      await table.withBatchWriter((writer) => writer.put({ id: "1" }));

      expect(spy.calls.length).toEqual(1);
    })
  );
});
