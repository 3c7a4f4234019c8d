/**
 * Unit Tests: Console channel plugin
 *
 * Drives the plugin over in-memory streams.
 */

import { describe, it, expect, afterEach } from "vitest";
import { PassThrough } from "node:stream";
import type { ChannelInstanceConfig, IncomingMessage } from "@calendar-bot/core";
import { ConsolePlugin, USAGE_LINE, formatOutgoing, parseConsoleLine } from "../src/plugin.js";
import { createConsolePlugin } from "../src/index.js";

const CONFIG: ChannelInstanceConfig = {
  id: "console_main",
  plugin: "console",
  identity: "bot",
  processing: "immediate",
};

function createStreams() {
  const input = new PassThrough();
  const output = new PassThrough();
  const written: string[] = [];
  output.on("data", (chunk: Buffer) => written.push(chunk.toString("utf-8")));
  return { input, output, written };
}

function nextMessage(plugin: ConsolePlugin): Promise<IncomingMessage> {
  return new Promise((resolve) => plugin.on("message", resolve));
}

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("parseConsoleLine", () => {
  it("reads identity and text", () => {
    expect(parseConsoleLine("42 /create_event")).toEqual({ from: "42", content: "/create_event" });
    expect(parseConsoleLine("  42   Team   lunch ")).toEqual({ from: "42", content: "Team   lunch" });
  });

  it("reads a button press", () => {
    expect(parseConsoleLine("42 !appt:confirm:3")).toEqual({
      from: "42",
      content: "",
      buttonId: "appt:confirm:3",
    });
  });

  it("rejects lines without text", () => {
    expect(parseConsoleLine("42")).toBeNull();
    expect(parseConsoleLine("42 !")).toBeNull();
  });
});

describe("formatOutgoing", () => {
  it("prints the text and one line per button", () => {
    expect(
      formatOutgoing("42", {
        content: "Join?",
        buttons: [
          { id: "appt:confirm:3", label: "Confirm" },
          { id: "appt:decline:3", label: "Decline" },
        ],
      }),
    ).toBe("→ 42: Join?\n  [appt:confirm:3] Confirm\n  [appt:decline:3] Decline\n");
  });
});

describe("ConsolePlugin", () => {
  let plugin: ConsolePlugin | null = null;

  afterEach(async () => {
    await plugin?.disconnect();
    plugin = null;
  });

  it("emits typed lines as messages", async () => {
    const streams = createStreams();
    plugin = new ConsolePlugin(streams);
    await plugin.init(CONFIG);
    await plugin.connect();

    const received = nextMessage(plugin);
    streams.input.write("7 /help\n");
    const msg = await received;

    expect(msg).toMatchObject({ from: "7", content: "/help", channelId: "console_main" });
    expect(msg.buttonId).toBeUndefined();
    expect(msg.id).toMatch(/^[0-9A-Z]{26}$/);
  });

  it("emits button presses", async () => {
    const streams = createStreams();
    plugin = new ConsolePlugin(streams);
    await plugin.init(CONFIG);
    await plugin.connect();

    const received = nextMessage(plugin);
    streams.input.write("7 !appt:decline:1\n");

    expect(await received).toMatchObject({ from: "7", content: "", buttonId: "appt:decline:1" });
  });

  it("prints usage for malformed lines", async () => {
    const streams = createStreams();
    plugin = new ConsolePlugin(streams);
    await plugin.init(CONFIG);
    await plugin.connect();

    streams.input.write("nonsense\n");
    await tick();

    expect(streams.written).toEqual([`${USAGE_LINE}\n`]);
  });

  it("writes outgoing messages and tracks status", async () => {
    const streams = createStreams();
    plugin = new ConsolePlugin(streams);
    await plugin.init({ ...CONFIG, prompt: "calendar bot ready" });

    await expect(plugin.send("7", { content: "too early" })).rejects.toThrow(
      "[channel-console] send() called while disconnected",
    );

    await plugin.connect();
    expect(plugin.status().connected).toBe(true);

    await plugin.send("7", { content: "Hello" });
    await tick();
    expect(streams.written.join("")).toBe("calendar bot ready\n→ 7: Hello\n");

    await plugin.disconnect();
    expect(plugin.status()).toMatchObject({ running: false, connected: false });
  });

  it("is created by the plugin factory", () => {
    const streams = createStreams();
    expect(createConsolePlugin(CONFIG, streams).name).toBe("console");
  });
});
