import type { Identity, RegisteredUser } from "@calendar-bot/core";
import type { CalendarDatabase } from "../db/database.js";

interface UserRow {
  identity: number;
  username: string;
  first_name: string;
  created_at: string;
}

function rowToUser(row: UserRow): RegisteredUser {
  return {
    identity: row.identity,
    username: row.username,
    firstName: row.first_name,
    createdAt: new Date(row.created_at),
  };
}

export interface RegisterResult {
  user: RegisteredUser;
  /** False when the identity was already registered */
  created: boolean;
}

/**
 * Registered chat users. Registration is idempotent; a repeat call
 * refreshes the stored username and first name.
 */
export class UserStore {
  constructor(
    private database: CalendarDatabase,
    private now: () => Date = () => new Date(),
  ) {}

  register(identity: Identity, username: string, firstName: string): RegisterResult {
    return this.database.transaction("registerUser", (db) => {
      const existing = db
        .prepare<[number], UserRow>("SELECT * FROM users WHERE identity = ?")
        .get(identity);

      if (existing) {
        db.prepare<[string, string, number]>(
          "UPDATE users SET username = ?, first_name = ? WHERE identity = ?",
        ).run(username, firstName, identity);
        return {
          user: rowToUser({ ...existing, username, first_name: firstName }),
          created: false,
        };
      }

      const createdAt = this.now().toISOString();
      db.prepare<[number, string, string, string]>(
        "INSERT INTO users (identity, username, first_name, created_at) VALUES (?, ?, ?, ?)",
      ).run(identity, username, firstName, createdAt);
      return {
        user: { identity, username, firstName, createdAt: new Date(createdAt) },
        created: true,
      };
    });
  }

  isRegistered(identity: Identity): boolean {
    return this.get(identity) !== null;
  }

  get(identity: Identity): RegisteredUser | null {
    const row = this.database.run("getUser", (db) =>
      db.prepare<[number], UserRow>("SELECT * FROM users WHERE identity = ?").get(identity),
    );
    return row ? rowToUser(row) : null;
  }

  count(): number {
    const row = this.database.run("countUsers", (db) =>
      db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM users").get(),
    );
    return row?.total ?? 0;
  }
}
