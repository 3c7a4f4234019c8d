/**
 * Integration Tests: HTTP API
 *
 * Uses fastify.inject against an in-memory database; no port is opened.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import type { IncomingMessage } from "@calendar-bot/core";
import { createServer } from "../src/server.js";
import { HELP_TEXT } from "../src/bot/replies.js";
import { MAX_AGE, createBot } from "./test-utils.js";

const ALICE = 1;
const BOB = 2;

const standup = { title: "Standup", date: "2025-12-12", time: "12:00", details: "daily sync" };

describe("HTTP API", () => {
  let bot: Awaited<ReturnType<typeof createBot>>;
  let server: FastifyInstance;
  let handled: Promise<void>[];

  beforeEach(async () => {
    bot = await createBot();
    handled = [];
    bot.channels.onMessage((channelId: string, message: IncomingMessage) => {
      handled.push(bot.handler.handleMessage(channelId, message));
    });
    server = await createServer({
      deps: {
        events: bot.events,
        scheduling: bot.scheduling,
        statistics: bot.statistics,
        exportTokens: bot.exportTokens,
        exportMaxAgeSeconds: MAX_AGE,
        channelManager: bot.channels,
      },
      logging: false,
    });
  });

  afterEach(async () => {
    await server.close();
  });

  it("GET /health", async () => {
    const response = await server.inject({ method: "GET", url: "/health" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok" });
  });

  // -----------------------------------------------------------------
  // Export downloads
  // -----------------------------------------------------------------

  describe("GET /export/:format", () => {
    it("serves the owner's events as JSON", async () => {
      bot.events.create(ALICE, standup);
      bot.events.create(BOB, { ...standup, title: "Not mine" });
      const token = bot.exportTokens.issue(ALICE);

      const response = await server.inject({ method: "GET", url: `/export/json?token=${token}` });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        owner: ALICE,
        events: [
          { id: 1, name: "Standup", date: "2025-12-12", time: "12:00:00", details: "daily sync", tg_user_id: 1 },
        ],
      });
    });

    it("serves CSV as an attachment with a BOM", async () => {
      bot.events.create(ALICE, { ...standup, details: "room 4; bring notes" });
      const token = bot.exportTokens.issue(ALICE);

      const response = await server.inject({ method: "GET", url: `/export/csv?token=${token}` });

      expect(response.statusCode).toBe(200);
      expect(response.headers["content-type"]).toBe("text/csv; charset=utf-8");
      expect(response.headers["content-disposition"]).toBe('attachment; filename="events_1.csv"');
      expect([...response.rawPayload.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
      expect(response.body.replace(/^\uFEFF/, "")).toBe(
        'id;name;date;time;details;tg_user_id\r\n1;Standup;2025-12-12;12:00:00;"room 4; bring notes";1\r\n',
      );
    });

    it("answers 403 for forged, missing and expired tokens alike", async () => {
      const token = bot.exportTokens.issue(ALICE);
      const [payload] = token.split(".");

      const forged = await server.inject({ method: "GET", url: `/export/json?token=${payload}.AAAA` });
      const missing = await server.inject({ method: "GET", url: "/export/csv" });
      bot.clock.ms += (MAX_AGE + 1) * 1000;
      const expired = await server.inject({ method: "GET", url: `/export/csv?token=${token}` });

      for (const response of [forged, missing, expired]) {
        expect(response.statusCode).toBe(403);
        expect(response.json()).toEqual({ error: "invalid link" });
      }
    });

    it("rejects unknown formats", async () => {
      const token = bot.exportTokens.issue(ALICE);
      const response = await server.inject({ method: "GET", url: `/export/xml?token=${token}` });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: "Unknown export format: xml" });
    });
  });

  // -----------------------------------------------------------------
  // Read API
  // -----------------------------------------------------------------

  describe("read API", () => {
    it("lists only published events publicly", async () => {
      bot.events.create(ALICE, standup);
      const shown = bot.events.create(ALICE, { ...standup, title: "Open house", time: "15:00" });
      bot.events.setPublic(ALICE, shown.id, true);

      const response = await server.inject({ method: "GET", url: "/api/public/events?owner=1" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        owner: ALICE,
        events: [{ id: 2, title: "Open house", date: "2025-12-12", time: "15:00", details: "daily sync" }],
      });
    });

    it("requires a numeric owner", async () => {
      const response = await server.inject({ method: "GET", url: "/api/public/events?owner=abc" });
      expect(response.statusCode).toBe(400);
    });

    it("accepts a bearer token for the owner's own data", async () => {
      bot.events.create(ALICE, standup);
      bot.scheduling.createInvite({
        organizer: ALICE,
        participant: BOB,
        eventRef: 1,
        date: "2025-12-12",
        time: "12:00",
        details: "daily sync",
      });
      const headers = { authorization: `Bearer ${bot.exportTokens.issue(BOB)}` };

      const events = await server.inject({ method: "GET", url: "/api/my/events", headers });
      expect(events.statusCode).toBe(200);
      expect(events.json()).toEqual({ owner: BOB, events: [] });

      const appointments = await server.inject({ method: "GET", url: "/api/my/appointments", headers });
      expect(appointments.statusCode).toBe(200);
      expect(appointments.json().appointments).toMatchObject([
        { id: 1, organizer: ALICE, participant: BOB, status: "pending", createdAt: "2025-12-01T12:00:00.000Z" },
      ]);
    });

    it("answers 403 without a token", async () => {
      const response = await server.inject({ method: "GET", url: "/api/my/events" });
      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({ error: "invalid link" });
    });
  });

  // -----------------------------------------------------------------
  // Admin + channels
  // -----------------------------------------------------------------

  describe("admin API", () => {
    it("reports daily statistics to localhost", async () => {
      bot.statistics.increment("eventCount");

      const response = await server.inject({ method: "GET", url: "/api/admin/stats" });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.days).toHaveLength(1);
      expect(body.days[0]).toMatchObject({ date: "2025-12-01", eventCount: 1, userCount: 0 });
      expect(body.totals.eventCount).toBe(1);
    });

    it("refuses remote callers", async () => {
      const response = await server.inject({
        method: "GET",
        url: "/api/admin/stats",
        remoteAddress: "10.0.0.5",
      });
      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({ error: "Admin API is localhost-only" });
    });

    it("rejects a bad limit", async () => {
      const response = await server.inject({ method: "GET", url: "/api/admin/stats?limit=0" });
      expect(response.statusCode).toBe(400);
    });

    it("injects a simulated message into a channel", async () => {
      const response = await server.inject({
        method: "POST",
        url: "/api/admin/channels/mock_main/simulate-message",
        payload: { from: "1", content: "/help" },
      });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toMatchObject({ accepted: true });
      await Promise.all(handled);
      expect(bot.lastTo(ALICE)).toBe(HELP_TEXT);
    });

    it("validates simulated messages", async () => {
      const unknown = await server.inject({
        method: "POST",
        url: "/api/admin/channels/nope/simulate-message",
        payload: { from: "1", content: "/help" },
      });
      expect(unknown.statusCode).toBe(404);

      const empty = await server.inject({
        method: "POST",
        url: "/api/admin/channels/mock_main/simulate-message",
        payload: { from: "1" },
      });
      expect(empty.statusCode).toBe(400);
      expect(empty.json()).toEqual({ error: "content or buttonId is required" });
    });
  });

  it("GET /api/channels lists channel status", async () => {
    const response = await server.inject({ method: "GET", url: "/api/channels" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject([
      { id: "mock_main", plugin: "mock", identity: "bot", status: "connected" },
    ]);

    const missing = await server.inject({ method: "GET", url: "/api/channels/nope" });
    expect(missing.statusCode).toBe(404);
  });
});
