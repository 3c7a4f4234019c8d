/**
 * Scheduling Engine
 *
 * Owns the appointments table. Detects slot conflicts and drives each
 * invitation through its status lifecycle:
 *
 *   pending ──► confirmed ──► cancelled
 *      │
 *      ├──► declined
 *      └──► cancelled
 *
 * Declined and cancelled are terminal. Rows are never deleted.
 */

import type {
  ClockTime,
  CreateInvitationInput,
  Identity,
  Invitation,
  InvitationDecision,
  InvitationStatus,
  IsoDate,
  Logger,
} from "@calendar-bot/core";
import {
  BLOCKING_STATUSES,
  BusyError,
  InvalidTransitionError,
  NotFoundError,
  NotParticipantError,
  ParseError,
  parseDate,
  parseTime,
} from "@calendar-bot/core";
import type Database from "better-sqlite3";
import type { CalendarDatabase } from "../db/database.js";
import type { StatisticsTracker } from "../stats/statistics.js";

const TRANSITIONS: Record<InvitationStatus, readonly InvitationStatus[]> = {
  pending: ["confirmed", "declined", "cancelled"],
  confirmed: ["cancelled"],
  declined: [],
  cancelled: [],
};

const DECISION_STATUS: Record<InvitationDecision, InvitationStatus> = {
  confirm: "confirmed",
  decline: "declined",
};

interface AppointmentRow {
  id: number;
  event_ref: number;
  organizer: number;
  participant: number;
  date: string;
  time: string;
  details: string;
  status: string;
  created_at: string;
  updated_at: string;
}

function isInvitationStatus(value: string): value is InvitationStatus {
  return value in TRANSITIONS;
}

function rowToInvitation(row: AppointmentRow): Invitation {
  if (!isInvitationStatus(row.status)) {
    throw new Error(`Appointment ${row.id} has unknown status "${row.status}"`);
  }
  return {
    id: row.id,
    eventRef: row.event_ref,
    organizer: row.organizer,
    participant: row.participant,
    date: row.date,
    time: row.time,
    details: row.details,
    status: row.status,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export interface SchedulingEngineDeps {
  database: CalendarDatabase;
  statistics?: StatisticsTracker;
  now?: () => Date;
  logger?: Logger;
}

export class SchedulingEngine {
  private readonly database: CalendarDatabase;
  private readonly statistics: StatisticsTracker | undefined;
  private readonly now: () => Date;
  private readonly logger: Logger | undefined;

  constructor(deps: SchedulingEngineDeps) {
    this.database = deps.database;
    this.statistics = deps.statistics;
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger;
  }

  /**
   * True iff no pending or confirmed invitation involves `identity`
   * at exactly this date and time.
   */
  isFree(identity: Identity, date: IsoDate, time: ClockTime): boolean {
    return this.database.run("isFree", (db) => this.slotFree(db, identity, date, time));
  }

  /**
   * Create a pending invitation if the participant is free. The conflict
   * check and the insert share one immediate transaction, so two requests
   * cannot both take the participant's slot. The organizer's own calendar
   * is not checked: one event may go out to several participants.
   */
  createInvite(input: CreateInvitationInput): Invitation {
    if (!Number.isSafeInteger(input.participant) || input.participant <= 0) {
      throw new ParseError("The participant must be a positive numeric user ID.");
    }
    if (input.participant === input.organizer) {
      throw new ParseError("You cannot invite yourself.");
    }
    const date = parseDate(input.date);
    const time = parseTime(input.time);
    if (!date || !time) {
      throw new ParseError(`Invalid slot ${input.date} ${input.time}`);
    }

    const invitation = this.database.transaction("createInvite", (db) => {
      if (!this.slotFree(db, input.participant, date, time)) {
        throw new BusyError(input.participant, date, time);
      }

      const stamp = this.now().toISOString();
      const result = db
        .prepare<[number, number, number, string, string, string, string, string]>(
          `INSERT INTO appointments
             (event_ref, organizer, participant, date, time, details, status, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, 'pending', ?, ?)`,
        )
        .run(
          input.eventRef,
          input.organizer,
          input.participant,
          date,
          time,
          input.details,
          stamp,
          stamp,
        );

      return this.requireRow(db, Number(result.lastInsertRowid));
    });

    this.statistics?.increment("invitationsCreated");
    this.logger?.info(
      { id: invitation.id, organizer: invitation.organizer, participant: invitation.participant },
      "Invitation created",
    );
    return invitation;
  }

  /**
   * Participant's answer to a pending invitation
   */
  respond(invitationId: number, responder: Identity, decision: InvitationDecision): Invitation {
    const target = DECISION_STATUS[decision];

    const invitation = this.database.transaction("respondInvite", (db) => {
      const current = this.requireRow(db, invitationId);
      if (current.participant !== responder) {
        throw new NotParticipantError("Only the invited participant can answer this invitation");
      }
      return this.transition(db, current, target);
    });

    this.statistics?.increment(
      decision === "confirm" ? "invitationsConfirmed" : "invitationsDeclined",
    );
    this.logger?.info({ id: invitationId, responder, status: target }, "Invitation answered");
    return invitation;
  }

  /**
   * Cancel a pending or confirmed invitation. Either party may cancel.
   */
  cancel(invitationId: number, requester: Identity): Invitation {
    const invitation = this.database.transaction("cancelInvite", (db) => {
      const current = this.requireRow(db, invitationId);
      if (current.organizer !== requester && current.participant !== requester) {
        throw new NotParticipantError();
      }
      return this.transition(db, current, "cancelled");
    });

    this.statistics?.increment("invitationsCancelled");
    this.logger?.info({ id: invitationId, requester }, "Invitation cancelled");
    return invitation;
  }

  /**
   * The invitation message could not reach the participant: release the slot.
   * No-op when the invitation already left pending.
   */
  markUndeliverable(invitationId: number): Invitation | null {
    const invitation = this.database.transaction("markUndeliverable", (db) => {
      const current = this.requireRow(db, invitationId);
      if (current.status !== "pending") return null;
      return this.transition(db, current, "cancelled");
    });
    if (invitation) {
      this.logger?.warn({ id: invitationId }, "Invitation undeliverable, cancelled");
    }
    return invitation;
  }

  get(invitationId: number): Invitation | null {
    const row = this.database.run("getInvite", (db) => this.findRow(db, invitationId));
    return row ? rowToInvitation(row) : null;
  }

  /**
   * Invitations where `identity` is organizer or participant, newest first
   */
  listFor(identity: Identity): Invitation[] {
    const rows = this.database.run("listInvites", (db) =>
      db
        .prepare<[number, number], AppointmentRow>(
          `SELECT * FROM appointments
           WHERE organizer = ? OR participant = ?
           ORDER BY id DESC`,
        )
        .all(identity, identity),
    );
    return rows.map(rowToInvitation);
  }

  // ── Internals ──────────────────────────────────────────────────

  private slotFree(db: Database.Database, identity: Identity, date: IsoDate, time: ClockTime): boolean {
    const placeholders = BLOCKING_STATUSES.map(() => "?").join(", ");
    const row = db
      .prepare<(string | number)[], { id: number }>(
        `SELECT id FROM appointments
         WHERE (participant = ? OR organizer = ?)
           AND date = ? AND time = ?
           AND status IN (${placeholders})
         LIMIT 1`,
      )
      .get(identity, identity, date, time, ...BLOCKING_STATUSES);
    return row === undefined;
  }

  private findRow(db: Database.Database, id: number): AppointmentRow | undefined {
    return db.prepare<[number], AppointmentRow>("SELECT * FROM appointments WHERE id = ?").get(id);
  }

  private requireRow(db: Database.Database, id: number): Invitation {
    const row = this.findRow(db, id);
    if (!row) {
      throw new NotFoundError("Invitation", id);
    }
    return rowToInvitation(row);
  }

  /**
   * Guarded status update. The WHERE on the current status keeps a stale
   * read from overwriting a decision made in between.
   */
  private transition(db: Database.Database, current: Invitation, target: InvitationStatus): Invitation {
    if (!TRANSITIONS[current.status].includes(target)) {
      throw new InvalidTransitionError(current.status, target);
    }
    const updated = db
      .prepare<[string, string, number, string]>(
        "UPDATE appointments SET status = ?, updated_at = ? WHERE id = ? AND status = ?",
      )
      .run(target, this.now().toISOString(), current.id, current.status);
    if (updated.changes === 0) {
      throw new InvalidTransitionError(current.status, target);
    }
    return this.requireRow(db, current.id);
  }
}
