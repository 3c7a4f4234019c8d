/**
 * Calendar Database
 *
 * Single SQLite file shared by the event store, user registry, statistics
 * and the scheduling engine. Uses better-sqlite3 with WAL mode.
 *
 * Every driver failure is rethrown as StorageUnavailableError so callers
 * can tell an outage apart from a domain rejection.
 */

import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { StorageUnavailableError, isCalendarError } from "@calendar-bot/core";

export const MEMORY_DATABASE = ":memory:";

export class CalendarDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    try {
      if (dbPath !== MEMORY_DATABASE) {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      this.db = new Database(dbPath);
      this.initialize();
    } catch (err) {
      throw new StorageUnavailableError("open", err);
    }
  }

  /**
   * Initialize database with pragmas and schema
   */
  private initialize(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.pragma("foreign_keys = ON");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        identity INTEGER PRIMARY KEY,
        username TEXT NOT NULL DEFAULT '',
        first_name TEXT NOT NULL DEFAULT '',
        created_at TEXT NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        owner INTEGER NOT NULL,
        title TEXT NOT NULL,
        date TEXT NOT NULL,
        time TEXT NOT NULL,
        details TEXT NOT NULL DEFAULT '',
        is_public INTEGER NOT NULL DEFAULT 0
      );
    `);

    // event_ref is a logical reference: events may be deleted while
    // invitations about them stay on record
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS appointments (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        event_ref INTEGER NOT NULL,
        organizer INTEGER NOT NULL,
        participant INTEGER NOT NULL,
        date TEXT NOT NULL,
        time TEXT NOT NULL,
        details TEXT NOT NULL DEFAULT '',
        status TEXT NOT NULL
          CHECK (status IN ('pending', 'confirmed', 'declined', 'cancelled')),
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS bot_statistics (
        date TEXT PRIMARY KEY,
        user_count INTEGER NOT NULL DEFAULT 0,
        event_count INTEGER NOT NULL DEFAULT 0,
        edited_events INTEGER NOT NULL DEFAULT 0,
        cancelled_events INTEGER NOT NULL DEFAULT 0,
        invitations_created INTEGER NOT NULL DEFAULT 0,
        invitations_confirmed INTEGER NOT NULL DEFAULT 0,
        invitations_declined INTEGER NOT NULL DEFAULT 0,
        invitations_cancelled INTEGER NOT NULL DEFAULT 0
      );
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_events_owner
      ON events(owner, date, time);
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_appointments_participant_slot
      ON appointments(participant, date, time, status);
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_appointments_organizer_slot
      ON appointments(organizer, date, time, status);
    `);
  }

  /**
   * Run a unit of storage work, translating driver failures.
   * Domain errors thrown by `fn` pass through untouched; anything else
   * (SqliteError, or a TypeError from a closed connection) is wrapped.
   */
  run<T>(operation: string, fn: (db: Database.Database) => T): T {
    try {
      return fn(this.db);
    } catch (err) {
      if (isCalendarError(err)) throw err;
      throw new StorageUnavailableError(operation, err);
    }
  }

  /**
   * Run `fn` inside BEGIN IMMEDIATE, taking the write lock before any read
   * so a check-then-insert cannot interleave with another writer.
   */
  transaction<T>(operation: string, fn: (db: Database.Database) => T): T {
    return this.run(operation, (db) => db.transaction(() => fn(db)).immediate());
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }
}
