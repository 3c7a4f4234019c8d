/**
 * Reply texts for the chat interface.
 */

import type { CalendarEvent, FlowName, Identity, Invitation } from "@calendar-bot/core";
import { BusyError, InvalidTransitionError, isCalendarError } from "@calendar-bot/core";

export const HELP_TEXT = [
  "Calendar bot commands:",
  "/register - register to start using the calendar",
  "/create_event - add an event",
  "/display_events - list your events",
  "/read_event <id> - show one event",
  "/edit_event [<id> <description>] - change an event's description",
  "/delete_event [<id>] - delete an event",
  "/publish <id>, /unpublish <id> - show or hide an event on your public page",
  "/invite - invite someone to a meeting about one of your events",
  "/my_invitations - list your invitations",
  "/cancel_invitation <id> - cancel an invitation",
  "/export - get download links for your events",
  "/cancel - stop the current dialog",
].join("\n");

export const MAINTENANCE_TEXT =
  "The calendar is temporarily unavailable. Your input was kept, please try again in a moment.";

export const REGISTER_FIRST_TEXT = "Please /register first.";

export const UNKNOWN_INPUT_TEXT = "I didn't understand that. Send /help for the list of commands.";

export const UNKNOWN_COMMAND_TEXT = "Unknown command. Send /help for the list of commands.";

export const EVENT_NOT_FOUND_TEXT = "Event not found or it is not yours.";

export const INVITATION_NOT_FOUND_TEXT = "Invitation not found.";

export const NOT_ADDRESSED_TEXT = "This invitation is not addressed to you.";

export const SELF_INVITE_TEXT = "You cannot invite yourself.";

const FLOW_LABELS: Record<FlowName, string> = {
  CREATE: "event creation",
  EDIT: "event edit",
  DELETE: "event deletion",
  INVITE: "invitation",
};

export function replacedFlowText(flow: FlowName): string {
  return `Discarded your unfinished ${FLOW_LABELS[flow]} dialog.`;
}

export function formatEventLine(event: CalendarEvent): string {
  return `ID: ${event.id} | ${event.date} ${event.time} | ${event.title}`;
}

export function formatEventList(events: CalendarEvent[]): string {
  if (events.length === 0) return "No events yet.";
  return ["Your events:", ...events.map(formatEventLine)].join("\n");
}

export function formatEvent(event: CalendarEvent): string {
  return [
    `Event ${event.id}: ${event.title}`,
    `Date: ${event.date} ${event.time}`,
    `Details: ${event.details}`,
    `Visibility: ${event.isPublic ? "public" : "private"}`,
  ].join("\n");
}

export function formatInvitationLine(invitation: Invitation, viewer: Identity): string {
  const role =
    invitation.organizer === viewer
      ? `you invited ${invitation.participant}`
      : `invited by ${invitation.organizer}`;
  return `#${invitation.id} | ${invitation.date} ${invitation.time} | ${role} | ${invitation.status}`;
}

export function formatInvitationList(invitations: Invitation[], viewer: Identity): string {
  if (invitations.length === 0) return "No invitations yet.";
  return ["Your invitations:", ...invitations.map((inv) => formatInvitationLine(inv, viewer))].join(
    "\n",
  );
}

export type ErrorSubject = "event" | "invitation";

/**
 * User-facing text for a recoverable failure
 */
export function describeError(err: unknown, subject: ErrorSubject): string {
  if (err instanceof BusyError) {
    return `User ${err.identity} is busy at ${err.date} ${err.time}.`;
  }
  if (err instanceof InvalidTransitionError) {
    return `Invitation already ${err.from}.`;
  }
  if (!isCalendarError(err)) {
    return "Something went wrong.";
  }
  switch (err.kind) {
    case "not_found":
    case "not_owner":
      return subject === "event" ? EVENT_NOT_FOUND_TEXT : INVITATION_NOT_FOUND_TEXT;
    case "not_participant":
      return NOT_ADDRESSED_TEXT;
    case "parse":
      return err.message;
    default:
      return "Something went wrong.";
  }
}
