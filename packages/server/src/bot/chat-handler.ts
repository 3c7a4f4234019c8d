/**
 * Chat Bot Handler
 *
 * Routes each inbound message:
 * - button press → scheduling engine (confirm / decline)
 * - cancel word → drop the active dialog
 * - slash command → command handler (may start a dialog)
 * - anything else → next step of the active dialog
 *
 * Dedup happens in ChannelManager before messages reach here.
 */

import type {
  CalendarError,
  ConversationEngine,
  ExportTokenIssuer,
  FlowCompletion,
  FlowName,
  Identity,
  IncomingMessage,
  Invitation,
  Logger,
  OutgoingMessage,
  StepCheck,
  SubmitResult,
} from "@calendar-bot/core";
import { isCalendarError, parseIdentity } from "@calendar-bot/core";
import type { EventStore } from "../events/event-store.js";
import type { UserStore } from "../users/user-store.js";
import type { SchedulingEngine } from "../scheduling/scheduling-engine.js";
import type { StatisticsTracker } from "../stats/statistics.js";
import type { DeliveryGateway } from "../channels/delivery-gateway.js";
import {
  EVENT_NOT_FOUND_TEXT,
  HELP_TEXT,
  INVITATION_NOT_FOUND_TEXT,
  MAINTENANCE_TEXT,
  REGISTER_FIRST_TEXT,
  SELF_INVITE_TEXT,
  UNKNOWN_COMMAND_TEXT,
  UNKNOWN_INPUT_TEXT,
  describeError,
  formatEvent,
  formatEventList,
  formatInvitationList,
  replacedFlowText,
  type ErrorSubject,
} from "./replies.js";

export interface ChatBotDeps {
  engine: ConversationEngine;
  events: EventStore;
  users: UserStore;
  scheduling: SchedulingEngine;
  statistics: StatisticsTracker;
  exportTokens: ExportTokenIssuer;
  gateway: DeliveryGateway;
  /** Base URL export links point at */
  publicUrl: string;
  exportMaxAgeSeconds: number;
  logger: Logger;
}

interface ParsedCommand {
  name: string;
  /** Text after the command word, trimmed */
  rest: string;
  args: string[];
}

/** Commands usable before /register */
const OPEN_COMMANDS = new Set(["start", "help", "register", "cancel"]);

const CANCEL_PATTERN = /^\/?cancel$/i;

const BUTTON_PATTERN = /^appt:(confirm|decline):(\d+)$/;

/**
 * "/edit_event@calendar_bot 3 new text" → {name: "edit_event", rest: "3 new text"}
 */
export function parseCommand(text: string): ParsedCommand | null {
  const match = /^\/([A-Za-z_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/.exec(text);
  if (!match) return null;
  const rest = (match[2] ?? "").trim();
  return {
    name: match[1].toLowerCase(),
    rest,
    args: rest ? rest.split(/\s+/) : [],
  };
}

function text(content: string): OutgoingMessage {
  return { content };
}

function isRecoverable(err: unknown): err is CalendarError {
  return isCalendarError(err) && err.kind !== "storage_unavailable";
}

export class ChatBotHandler {
  private deps: ChatBotDeps;

  constructor(deps: ChatBotDeps) {
    this.deps = deps;
  }

  /**
   * Handle one inbound message and send the replies back to the sender.
   */
  async handleMessage(channelId: string, msg: IncomingMessage): Promise<void> {
    const identity = parseIdentity(msg.from);
    if (identity === null) {
      this.deps.logger.warn({ channel: channelId, from: msg.from }, "Ignoring message from non-numeric sender");
      return;
    }
    this.deps.gateway.remember(identity, channelId);

    let replies: OutgoingMessage[];
    try {
      replies = await this.dispatch(identity, msg);
    } catch (err) {
      if (isCalendarError(err, "storage_unavailable")) {
        this.deps.logger.error({ identity, err }, "Storage unavailable");
        replies = [text(MAINTENANCE_TEXT)];
      } else {
        throw err;
      }
    }

    for (const reply of replies) {
      await this.deps.gateway.send(identity, reply);
    }
  }

  private async dispatch(identity: Identity, msg: IncomingMessage): Promise<OutgoingMessage[]> {
    if (msg.buttonId) {
      return this.handleButton(identity, msg.buttonId);
    }

    const input = msg.content.trim();
    if (CANCEL_PATTERN.test(input)) {
      const cancelled = await this.deps.engine.cancel(identity);
      return [text(cancelled ? "Operation cancelled." : "Nothing to cancel.")];
    }

    const command = parseCommand(input);
    if (command) {
      return this.handleCommand(identity, command, msg);
    }

    return this.handleFlowInput(identity, input);
  }

  // ── Dialog steps ───────────────────────────────────────────────

  private async handleFlowInput(identity: Identity, input: string): Promise<OutgoingMessage[]> {
    let completed: OutgoingMessage[] = [];
    const result: SubmitResult = await this.deps.engine.submit(identity, input, {
      validate: (check) => this.checkStep(identity, check),
      commit: (completion) => {
        try {
          completed = this.complete(identity, completion);
        } catch (err) {
          if (!isRecoverable(err)) throw err;
          // Every lookup a dialog makes is of the user's own event
          completed = [text(describeError(err, "event"))];
        }
      },
    });

    switch (result.kind) {
      case "no_session":
        return [text(UNKNOWN_INPUT_TEXT)];
      case "advance":
        return [text(result.prompt)];
      case "fail":
        return [text(`${result.reason}\n${result.prompt}`)];
      case "complete":
        return completed;
    }
  }

  /**
   * Re-ask an INVITE step that names the sender or an event they do not own,
   * instead of failing the whole dialog at the end.
   */
  private checkStep(identity: Identity, check: StepCheck): string | null {
    if (check.flow !== "INVITE") return null;
    const { participant, targetEventId } = check.data;
    if (check.field === "participant" && participant === identity) {
      return SELF_INVITE_TEXT;
    }
    if (check.field === "targetEventId" && targetEventId !== undefined) {
      return this.deps.events.get(identity, targetEventId) ? null : EVENT_NOT_FOUND_TEXT;
    }
    return null;
  }

  /**
   * Apply a finished dialog. Recoverable errors end the dialog with an
   * explanation; storage failures propagate so the dialog is kept.
   */
  private complete(identity: Identity, completion: FlowCompletion): OutgoingMessage[] {
    const { events, statistics } = this.deps;

    switch (completion.flow) {
      case "CREATE": {
        const event = events.create(identity, completion.fields);
        statistics.increment("eventCount");
        return [text(`Event created with ID ${event.id}.`)];
      }
      case "EDIT": {
        const { targetId, newDetails } = completion.fields;
        return [text(this.editEvent(identity, targetId, newDetails))];
      }
      case "DELETE": {
        return [text(this.deleteEvent(identity, completion.fields.targetId))];
      }
      case "INVITE": {
        const { participant, targetEventId, details } = completion.fields;
        const event = events.requireOwned(identity, targetEventId);
        const invitation = this.deps.scheduling.createInvite({
          organizer: identity,
          participant,
          eventRef: event.id,
          date: event.date,
          time: event.time,
          details: details ?? event.details,
        });
        this.deliverInvitation(invitation);
        return [
          text(
            `Invitation ${invitation.id} sent to user ${participant} for ${invitation.date} ${invitation.time}.`,
          ),
        ];
      }
    }
  }

  private editEvent(identity: Identity, id: number, details: string): string {
    this.deps.events.requireOwned(identity, id);
    this.deps.events.updateDetails(identity, id, details);
    this.deps.statistics.increment("editedEvents");
    return `Event ${id} updated.`;
  }

  private deleteEvent(identity: Identity, id: number): string {
    this.deps.events.requireOwned(identity, id);
    this.deps.events.delete(identity, id);
    this.deps.statistics.increment("cancelledEvents");
    return `Event ${id} deleted.`;
  }

  private deliverInvitation(invitation: Invitation): void {
    const { gateway, scheduling } = this.deps;
    gateway.notify(
      invitation.participant,
      {
        content: `User ${invitation.organizer} invites you to a meeting on ${invitation.date} ${invitation.time}.\n${invitation.details}`,
        buttons: [
          { id: `appt:confirm:${invitation.id}`, label: "Confirm" },
          { id: `appt:decline:${invitation.id}`, label: "Decline" },
        ],
      },
      () => {
        scheduling.markUndeliverable(invitation.id);
        gateway.notify(
          invitation.organizer,
          text(
            `Could not deliver invitation ${invitation.id} to user ${invitation.participant}. It has been cancelled.`,
          ),
        );
      },
    );
  }

  // ── Buttons ────────────────────────────────────────────────────

  private handleButton(identity: Identity, buttonId: string): OutgoingMessage[] {
    const match = BUTTON_PATTERN.exec(buttonId);
    if (!match) {
      return [text("Unknown action.")];
    }
    const decision = match[1] === "confirm" ? "confirm" : "decline";
    const id = Number(match[2]);

    let invitation: Invitation;
    try {
      invitation = this.deps.scheduling.respond(id, identity, decision);
    } catch (err) {
      if (!isRecoverable(err)) throw err;
      return [text(describeError(err, "invitation"))];
    }

    const verb = decision === "confirm" ? "confirmed" : "declined";
    this.deps.gateway.notify(
      invitation.organizer,
      text(`User ${identity} ${verb} your meeting on ${invitation.date} ${invitation.time}.`),
    );
    return [text(`You ${verb} the meeting on ${invitation.date} ${invitation.time}.`)];
  }

  // ── Commands ───────────────────────────────────────────────────

  private async handleCommand(
    identity: Identity,
    command: ParsedCommand,
    msg: IncomingMessage,
  ): Promise<OutgoingMessage[]> {
    if (!OPEN_COMMANDS.has(command.name) && !this.deps.users.isRegistered(identity)) {
      return [text(REGISTER_FIRST_TEXT)];
    }

    try {
      return await this.runCommand(identity, command, msg);
    } catch (err) {
      if (!isRecoverable(err)) throw err;
      const subject: ErrorSubject = command.name.includes("invitation") ? "invitation" : "event";
      return [text(describeError(err, subject))];
    }
  }

  private async runCommand(
    identity: Identity,
    command: ParsedCommand,
    msg: IncomingMessage,
  ): Promise<OutgoingMessage[]> {
    const { events, users, scheduling, statistics } = this.deps;

    switch (command.name) {
      case "start":
      case "help":
        return [text(HELP_TEXT)];

      case "register": {
        const { created } = users.register(identity, msg.username ?? "", msg.senderName ?? "");
        if (!created) {
          return [text("You are already registered.")];
        }
        statistics.increment("userCount");
        return [text("You are registered. Send /create_event to add your first event.")];
      }

      case "create_event":
        return this.startFlow(identity, "CREATE");

      case "display_events":
        return [text(formatEventList(events.listByOwner(identity)))];

      case "read_event": {
        const id = this.numericArg(command.args[0]);
        if (id === null) return [text("Usage: /read_event <id>")];
        const event = events.get(identity, id);
        return [text(event ? formatEvent(event) : EVENT_NOT_FOUND_TEXT)];
      }

      case "edit_event": {
        if (command.args.length === 0) return this.startFlow(identity, "EDIT");
        const id = this.numericArg(command.args[0]);
        const details = command.rest.slice(command.args[0].length).trim();
        if (id === null || !details) return [text("Usage: /edit_event <id> <new description>")];
        return [text(this.editEvent(identity, id, details))];
      }

      case "delete_event": {
        if (command.args.length === 0) return this.startFlow(identity, "DELETE");
        const id = this.numericArg(command.args[0]);
        if (id === null) return [text("Usage: /delete_event <id>")];
        return [text(this.deleteEvent(identity, id))];
      }

      case "publish":
      case "unpublish": {
        const id = this.numericArg(command.args[0]);
        if (id === null) return [text(`Usage: /${command.name} <id>`)];
        const isPublic = command.name === "publish";
        const event = events.setPublic(identity, id, isPublic);
        if (!event) return [text(EVENT_NOT_FOUND_TEXT)];
        return [text(`Event ${id} is now ${isPublic ? "public" : "private"}.`)];
      }

      case "invite":
        return this.startFlow(identity, "INVITE");

      case "my_invitations":
        return [text(formatInvitationList(scheduling.listFor(identity), identity))];

      case "cancel_invitation": {
        const id = this.numericArg(command.args[0]);
        if (id === null) return [text("Usage: /cancel_invitation <id>")];
        if (!scheduling.get(id)) return [text(INVITATION_NOT_FOUND_TEXT)];
        const invitation = scheduling.cancel(id, identity);
        const other = invitation.organizer === identity ? invitation.participant : invitation.organizer;
        this.deps.gateway.notify(
          other,
          text(
            `User ${identity} cancelled the meeting on ${invitation.date} ${invitation.time} (invitation ${id}).`,
          ),
        );
        return [text(`Invitation ${id} cancelled.`)];
      }

      case "export":
        return [text(this.exportLinks(identity))];

      default:
        return [text(UNKNOWN_COMMAND_TEXT)];
    }
  }

  private async startFlow(identity: Identity, flow: FlowName): Promise<OutgoingMessage[]> {
    const { prompt, replaced } = await this.deps.engine.startFlow(identity, flow);
    return [text(replaced ? `${replacedFlowText(replaced)}\n${prompt}` : prompt)];
  }

  private exportLinks(identity: Identity): string {
    const token = encodeURIComponent(this.deps.exportTokens.issue(identity));
    const base = this.deps.publicUrl.replace(/\/+$/, "");
    const minutes = Math.floor(this.deps.exportMaxAgeSeconds / 60);
    return [
      `Your export links (valid for ${minutes} min):`,
      `JSON: ${base}/export/json?token=${token}`,
      `CSV: ${base}/export/csv?token=${token}`,
    ].join("\n");
  }

  private numericArg(raw: string | undefined): number | null {
    return raw === undefined ? null : parseIdentity(raw);
  }
}
