/**
 * Daily usage counters, one row per calendar day.
 */

import type { DailyStatistics, Logger, StatisticsCounter } from "@calendar-bot/core";
import { createLogger, todayIso } from "@calendar-bot/core";
import type { CalendarDatabase } from "../db/database.js";

/** Counter → column. Column names never come from user input. */
const COLUMNS: Record<StatisticsCounter, string> = {
  userCount: "user_count",
  eventCount: "event_count",
  editedEvents: "edited_events",
  cancelledEvents: "cancelled_events",
  invitationsCreated: "invitations_created",
  invitationsConfirmed: "invitations_confirmed",
  invitationsDeclined: "invitations_declined",
  invitationsCancelled: "invitations_cancelled",
};

interface StatisticsRow {
  date: string;
  user_count: number;
  event_count: number;
  edited_events: number;
  cancelled_events: number;
  invitations_created: number;
  invitations_confirmed: number;
  invitations_declined: number;
  invitations_cancelled: number;
}

function rowToStatistics(row: StatisticsRow): DailyStatistics {
  return {
    date: row.date,
    userCount: row.user_count,
    eventCount: row.event_count,
    editedEvents: row.edited_events,
    cancelledEvents: row.cancelled_events,
    invitationsCreated: row.invitations_created,
    invitationsConfirmed: row.invitations_confirmed,
    invitationsDeclined: row.invitations_declined,
    invitationsCancelled: row.invitations_cancelled,
  };
}

export class StatisticsTracker {
  constructor(
    private database: CalendarDatabase,
    private now: () => Date = () => new Date(),
    private logger: Logger = createLogger("statistics"),
  ) {}

  /**
   * Bump today's counter. Called after the counted write has committed, so
   * a failure here is logged and never reported to the caller: the write
   * must not look failed and be retried.
   */
  increment(counter: StatisticsCounter): void {
    const column = COLUMNS[counter];
    try {
      this.database.run("incrementStatistic", (db) =>
        db
          .prepare<[string]>(
            `INSERT INTO bot_statistics (date, ${column}) VALUES (?, 1)
             ON CONFLICT(date) DO UPDATE SET ${column} = ${column} + 1`,
          )
          .run(todayIso(this.now())),
      );
    } catch (err) {
      this.logger.warn({ err, counter }, "Statistics counter not updated");
    }
  }

  /**
   * Most recent days first
   */
  list(limit = 30): DailyStatistics[] {
    const rows = this.database.run("listStatistics", (db) =>
      db
        .prepare<[number], StatisticsRow>(
          "SELECT * FROM bot_statistics ORDER BY date DESC LIMIT ?",
        )
        .all(limit),
    );
    return rows.map(rowToStatistics);
  }

  /**
   * Totals across all recorded days
   */
  totals(): Omit<DailyStatistics, "date"> {
    const sums = Object.values(COLUMNS)
      .map((column) => `COALESCE(SUM(${column}), 0) AS ${column}`)
      .join(", ");
    const row = this.database.run("sumStatistics", (db) =>
      db.prepare<[], StatisticsRow>(`SELECT 'total' AS date, ${sums} FROM bot_statistics`).get(),
    );
    if (!row) {
      throw new Error("Aggregate query returned no row");
    }
    const { date: _total, ...totals } = rowToStatistics(row);
    return totals;
  }
}
