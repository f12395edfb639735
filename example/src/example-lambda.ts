// import { Table } from "dynamo-write-buffer";
import { Table } from "../../src";
const TABLE_NAME = process.env.TABLE_NAME || "calendar-example";

interface ImportUserCalendar {
  userId: string;
  events: { startDateTime: string; title: string }[]; // ISO 8601 start times
  cancelled: string[]; // start times of events to remove
}

interface CalendarItem {
  id: string;
  sort: string;
  title: string;
  start: string; // ISO 8601
}

/**
 * 1. Validate every start time in the import
 * 2. Write each new calendar item
 * 3. Remove cancelled calendar items, a cancellation in the same import replaces the new item
 * @param event The calendar import for a single user
 */
export async function handler(event: ImportUserCalendar): Promise<{ error: string } | { requested: number }> {
  const table = new Table(TABLE_NAME, { overwriteByKeys: ["id", "sort"] }).withExitBackoff(100);

  const invalid = [...event.events.map((e) => e.startDateTime), ...event.cancelled].find(
    (start) => Number.isNaN(new Date(start).getTime())
  );

  if (invalid !== undefined) {
    console.error("Error: Data format error. Invalid startDateTime", invalid);
    return { error: "Invalid startDateTime in Event" };
  }

  // the writer is drained once the callback settles, even if it throws
  await table.withBatchWriter(async (writer) => {
    for (const calendarEvent of event.events) {
      const item: CalendarItem = {
        id: event.userId,
        sort: `event#${calendarEvent.startDateTime}`,
        title: calendarEvent.title,
        start: calendarEvent.startDateTime,
      };
      await writer.put(item);
    }

    for (const start of event.cancelled) {
      await writer.delete({ id: event.userId, sort: `event#${start}` });
    }
  });

  return { requested: event.events.length + event.cancelled.length };
}
