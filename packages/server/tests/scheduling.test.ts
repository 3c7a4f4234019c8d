/**
 * Unit Tests: Scheduling Engine
 *
 * - Busy detection keyed on the participant
 * - Status lifecycle and rejected transitions
 * - Slot release after decline / cancel
 * - Statistics side effects, and writes that outlive a counter failure
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  BusyError,
  InvalidTransitionError,
  NotFoundError,
  NotParticipantError,
  ParseError,
  silentLogger,
} from "@calendar-bot/core";
import { CalendarDatabase, MEMORY_DATABASE } from "../src/db/database.js";
import { SchedulingEngine } from "../src/scheduling/scheduling-engine.js";
import { StatisticsTracker } from "../src/stats/statistics.js";
import { createClock, createStores, type TestStores } from "./test-utils.js";

const ALICE = 1;
const BOB = 2;
const CAROL = 3;
const DAVE = 4;

const SLOT = { date: "2025-12-12", time: "12:00" };

function invite(stores: TestStores, organizer: number, participant: number, slot = SLOT) {
  return stores.scheduling.createInvite({
    organizer,
    participant,
    eventRef: 1,
    details: "planning",
    ...slot,
  });
}

describe("SchedulingEngine: createInvite", () => {
  let stores: TestStores;

  beforeEach(() => {
    stores = createStores(createClock("2025-12-01T12:00:00Z"));
  });

  it("creates a pending invitation", () => {
    const invitation = invite(stores, ALICE, BOB);

    expect(invitation).toEqual({
      id: 1,
      eventRef: 1,
      organizer: ALICE,
      participant: BOB,
      date: "2025-12-12",
      time: "12:00",
      details: "planning",
      status: "pending",
      createdAt: new Date("2025-12-01T12:00:00Z"),
      updatedAt: new Date("2025-12-01T12:00:00Z"),
    });
    expect(stores.scheduling.get(1)).toEqual(invitation);
  });

  it("marks both parties busy for exactly that slot", () => {
    invite(stores, ALICE, BOB);

    expect(stores.scheduling.isFree(ALICE, "2025-12-12", "12:00")).toBe(false);
    expect(stores.scheduling.isFree(BOB, "2025-12-12", "12:00")).toBe(false);
    expect(stores.scheduling.isFree(BOB, "2025-12-12", "12:30")).toBe(true);
    expect(stores.scheduling.isFree(BOB, "2025-12-13", "12:00")).toBe(true);
    expect(stores.scheduling.isFree(CAROL, "2025-12-12", "12:00")).toBe(true);
  });

  it("rejects a busy participant without writing", () => {
    invite(stores, ALICE, BOB);

    let caught: unknown;
    try {
      invite(stores, CAROL, BOB);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(BusyError);
    expect(caught).toMatchObject({ identity: BOB, date: "2025-12-12", time: "12:00" });
    expect(stores.scheduling.listFor(CAROL)).toEqual([]);
  });

  it("lets one organizer invite several participants to the same slot", () => {
    const first = invite(stores, ALICE, BOB);
    const second = invite(stores, ALICE, DAVE);

    expect([first.status, second.status]).toEqual(["pending", "pending"]);
    expect(stores.scheduling.listFor(ALICE).map((inv) => inv.participant)).toEqual([DAVE, BOB]);
  });

  it("treats a participant who organizes a meeting in that slot as busy", () => {
    invite(stores, ALICE, BOB);

    expect(() => invite(stores, CAROL, ALICE)).toThrow(BusyError);
    expect(invite(stores, BOB, CAROL).status).toBe("pending");
  });

  it("rejects self-invites and non-positive participants", () => {
    expect(() => invite(stores, ALICE, ALICE)).toThrow(ParseError);
    expect(() => invite(stores, ALICE, 0)).toThrow(ParseError);
    expect(() => invite(stores, ALICE, -4)).toThrow(ParseError);
  });

  it("counts created invitations", () => {
    invite(stores, ALICE, BOB);
    expect(stores.statistics.list()[0].invitationsCreated).toBe(1);
  });
});

describe("SchedulingEngine: respond", () => {
  let stores: TestStores;

  beforeEach(() => {
    stores = createStores();
  });

  it("confirms, keeping the slot taken", () => {
    const { id } = invite(stores, ALICE, BOB);

    const confirmed = stores.scheduling.respond(id, BOB, "confirm");
    expect(confirmed.status).toBe("confirmed");
    expect(stores.scheduling.isFree(BOB, SLOT.date, SLOT.time)).toBe(false);
    expect(stores.statistics.list()[0].invitationsConfirmed).toBe(1);
  });

  it("declines, releasing the slot", () => {
    const { id } = invite(stores, ALICE, BOB);

    expect(stores.scheduling.respond(id, BOB, "decline").status).toBe("declined");
    expect(stores.scheduling.isFree(BOB, SLOT.date, SLOT.time)).toBe(true);
    expect(stores.scheduling.isFree(ALICE, SLOT.date, SLOT.time)).toBe(true);
    expect(invite(stores, CAROL, BOB).status).toBe("pending");
  });

  it("only accepts an answer from the participant", () => {
    const { id } = invite(stores, ALICE, BOB);

    expect(() => stores.scheduling.respond(id, ALICE, "confirm")).toThrow(NotParticipantError);
    expect(() => stores.scheduling.respond(id, CAROL, "decline")).toThrow(NotParticipantError);
    expect(stores.scheduling.get(id)?.status).toBe("pending");
  });

  it("rejects a second answer and keeps the first", () => {
    const { id } = invite(stores, ALICE, BOB);
    stores.scheduling.respond(id, BOB, "confirm");

    let caught: unknown;
    try {
      stores.scheduling.respond(id, BOB, "decline");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidTransitionError);
    expect(caught).toMatchObject({ from: "confirmed", to: "declined" });
    expect(stores.scheduling.get(id)?.status).toBe("confirmed");
  });

  it("throws NotFoundError for an unknown invitation", () => {
    expect(() => stores.scheduling.respond(42, BOB, "confirm")).toThrow(NotFoundError);
  });
});

describe("SchedulingEngine: cancel", () => {
  let stores: TestStores;

  beforeEach(() => {
    stores = createStores();
  });

  it("lets either party cancel a pending or confirmed invitation", () => {
    const first = invite(stores, ALICE, BOB);
    expect(stores.scheduling.cancel(first.id, ALICE).status).toBe("cancelled");

    const second = invite(stores, ALICE, BOB);
    stores.scheduling.respond(second.id, BOB, "confirm");
    expect(stores.scheduling.cancel(second.id, BOB).status).toBe("cancelled");

    expect(stores.scheduling.isFree(ALICE, SLOT.date, SLOT.time)).toBe(true);
    expect(stores.statistics.list()[0].invitationsCancelled).toBe(2);
  });

  it("refuses outsiders and terminal invitations", () => {
    const { id } = invite(stores, ALICE, BOB);

    expect(() => stores.scheduling.cancel(id, CAROL)).toThrow(NotParticipantError);
    stores.scheduling.respond(id, BOB, "decline");
    expect(() => stores.scheduling.cancel(id, ALICE)).toThrow(InvalidTransitionError);
  });

  it("markUndeliverable cancels only pending invitations", () => {
    const pending = invite(stores, ALICE, BOB);
    expect(stores.scheduling.markUndeliverable(pending.id)?.status).toBe("cancelled");
    expect(stores.scheduling.markUndeliverable(pending.id)).toBeNull();
  });
});

describe("SchedulingEngine: three users, one slot", () => {
  it("blocks the second invite to a busy user until the first is declined", () => {
    const stores = createStores();

    const first = invite(stores, ALICE, BOB);
    expect(() => invite(stores, CAROL, BOB)).toThrow(BusyError);

    stores.scheduling.respond(first.id, BOB, "decline");
    const second = invite(stores, CAROL, BOB);

    expect(second.status).toBe("pending");
    expect(stores.scheduling.listFor(BOB).map((inv) => [inv.id, inv.status])).toEqual([
      [second.id, "pending"],
      [first.id, "declined"],
    ]);
  });
});

describe("SchedulingEngine: statistics outage", () => {
  it("keeps a committed invitation when the counter cannot be written", () => {
    const stores = createStores();
    const closed = new CalendarDatabase(MEMORY_DATABASE);
    closed.close();
    const scheduling = new SchedulingEngine({
      database: stores.database,
      statistics: new StatisticsTracker(closed, () => new Date(), silentLogger()),
    });

    const created = scheduling.createInvite({
      organizer: ALICE,
      participant: BOB,
      eventRef: 1,
      details: "planning",
      ...SLOT,
    });
    expect(created.status).toBe("pending");
    expect(scheduling.respond(created.id, BOB, "confirm").status).toBe("confirmed");
    expect(scheduling.cancel(created.id, ALICE).status).toBe("cancelled");
    expect(scheduling.listFor(BOB).map((inv) => inv.status)).toEqual(["cancelled"]);
  });
});
