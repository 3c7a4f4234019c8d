/**
 * Event Store
 *
 * Owner-scoped CRUD over the events table. Every lookup is filtered by
 * owner, so a foreign event reads exactly like a missing one.
 */

import type { CalendarEvent, CreateEventInput, Identity } from "@calendar-bot/core";
import { NotFoundError, NotOwnerError, ParseError, parseDate, parseTime } from "@calendar-bot/core";
import type { CalendarDatabase } from "../db/database.js";

interface EventRow {
  id: number;
  owner: number;
  title: string;
  date: string;
  time: string;
  details: string;
  is_public: number;
}

function rowToEvent(row: EventRow): CalendarEvent {
  return {
    id: row.id,
    owner: row.owner,
    title: row.title,
    date: row.date,
    time: row.time,
    details: row.details,
    isPublic: row.is_public === 1,
  };
}

export class EventStore {
  constructor(private database: CalendarDatabase) {}

  /**
   * Create an event. Date and time must already be in canonical form.
   */
  create(owner: Identity, input: CreateEventInput): CalendarEvent {
    const title = input.title.trim();
    if (!title) {
      throw new ParseError("Event title cannot be empty");
    }
    const date = parseDate(input.date);
    if (!date) {
      throw new ParseError(`Invalid date "${input.date}", expected YYYY-MM-DD`);
    }
    const time = parseTime(input.time);
    if (!time) {
      throw new ParseError(`Invalid time "${input.time}", expected HH:MM`);
    }

    return this.database.run("createEvent", (db) => {
      const result = db
        .prepare<[number, string, string, string, string, number]>(
          `INSERT INTO events (owner, title, date, time, details, is_public)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(owner, title, date, time, input.details, input.isPublic ? 1 : 0);

      return {
        id: Number(result.lastInsertRowid),
        owner,
        title,
        date,
        time,
        details: input.details,
        isPublic: input.isPublic ?? false,
      };
    });
  }

  /**
   * Get one of the owner's events
   */
  get(owner: Identity, id: number): CalendarEvent | null {
    const row = this.database.run("getEvent", (db) =>
      db
        .prepare<[number, number], EventRow>("SELECT * FROM events WHERE id = ? AND owner = ?")
        .get(id, owner),
    );
    return row ? rowToEvent(row) : null;
  }

  /**
   * Get an event that must belong to `owner`.
   * Throws NotFoundError if it does not exist, NotOwnerError if it is someone else's.
   */
  requireOwned(owner: Identity, id: number): CalendarEvent {
    const row = this.database.run("requireOwnedEvent", (db) =>
      db.prepare<[number], EventRow>("SELECT * FROM events WHERE id = ?").get(id),
    );
    if (!row) {
      throw new NotFoundError("Event", id);
    }
    if (row.owner !== owner) {
      throw new NotOwnerError();
    }
    return rowToEvent(row);
  }

  /**
   * All of the owner's events, chronologically
   */
  listByOwner(owner: Identity): CalendarEvent[] {
    const rows = this.database.run("listEvents", (db) =>
      db
        .prepare<[number], EventRow>(
          "SELECT * FROM events WHERE owner = ? ORDER BY date, time, id",
        )
        .all(owner),
    );
    return rows.map(rowToEvent);
  }

  /**
   * The owner's events marked public, chronologically
   */
  listPublic(owner: Identity): CalendarEvent[] {
    const rows = this.database.run("listPublicEvents", (db) =>
      db
        .prepare<[number], EventRow>(
          "SELECT * FROM events WHERE owner = ? AND is_public = 1 ORDER BY date, time, id",
        )
        .all(owner),
    );
    return rows.map(rowToEvent);
  }

  /**
   * Replace an event's details. Returns the updated event, or null if not found.
   */
  updateDetails(owner: Identity, id: number, details: string): CalendarEvent | null {
    const changed = this.database.run(
      "updateEventDetails",
      (db) =>
        db
          .prepare<[string, number, number]>(
            "UPDATE events SET details = ? WHERE id = ? AND owner = ?",
          )
          .run(details, id, owner).changes,
    );
    return changed > 0 ? this.get(owner, id) : null;
  }

  /**
   * Toggle public visibility. Returns the updated event, or null if not found.
   */
  setPublic(owner: Identity, id: number, isPublic: boolean): CalendarEvent | null {
    const changed = this.database.run(
      "setEventPublic",
      (db) =>
        db
          .prepare<[number, number, number]>(
            "UPDATE events SET is_public = ? WHERE id = ? AND owner = ?",
          )
          .run(isPublic ? 1 : 0, id, owner).changes,
    );
    return changed > 0 ? this.get(owner, id) : null;
  }

  /**
   * Delete one of the owner's events. Returns whether a row was removed.
   */
  delete(owner: Identity, id: number): boolean {
    const changed = this.database.run(
      "deleteEvent",
      (db) =>
        db.prepare<[number, number]>("DELETE FROM events WHERE id = ? AND owner = ?").run(id, owner)
          .changes,
    );
    return changed > 0;
  }
}
