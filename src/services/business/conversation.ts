/**
 * Conversation State Machine
 * Pure transitions: (session, event) → (next session, one effect to perform).
 *
 * start ──/start──▶ awaitingLink ──valid link──▶ awaitingFormat ──choice──▶ awaitingLink
 *                      │ ▲ invalid link                  │
 *                      └─┘                               └── no pending URL ──▶ ended
 * /cancel from anywhere ends the conversation. Any event no state accepts restarts it:
 * a stray message while a format choice is pending drops the pending link on purpose.
 */

import { FormatChoiceSchema, type FormatChoice } from "./downloadConfig.js";
import { LostContextError, ValidationError } from "../../utils/errors.js";
import { Messages } from "../../utils/messages.js";

export type ConversationState = "start" | "awaitingLink" | "awaitingFormat" | "ended";

export interface ConversationSession {
  readonly state: ConversationState;
  readonly pendingUrl?: string;
}

export type ConversationEvent =
  | { type: "start" }
  | { type: "cancel" }
  | { type: "help" }
  | { type: "text"; text: string }
  | { type: "choice"; value: string }
  | { type: "other" };

export type ConversationEffect =
  | { type: "reply"; text: string }
  | { type: "askFormat"; text: string }
  | { type: "lostContext"; text: string }
  | { type: "deliver"; url: string; choice: FormatChoice };

export interface Transition {
  session: ConversationSession;
  effect: ConversationEffect;
}

const ACCEPTED_SCHEMES = /^https?:\/\//i;

export function initialSession(): ConversationSession {
  return { state: "start" };
}

/**
 * Returns the trimmed link, or throws ValidationError when it has no http(s) scheme.
 */
export function parseLink(text: string): string {
  const url = text.trim();
  if (!ACCEPTED_SCHEMES.test(url)) {
    throw new ValidationError(Messages.invalidUrl);
  }
  return url;
}

export function requirePendingUrl(session: ConversationSession): string {
  if (!session.pendingUrl) {
    throw new LostContextError();
  }
  return session.pendingUrl;
}

function restart(): Transition {
  return {
    session: { state: "awaitingLink" },
    effect: { type: "reply", text: Messages.greeting },
  };
}

function isActive(session: ConversationSession): boolean {
  return session.state === "awaitingLink" || session.state === "awaitingFormat";
}

export function transition(session: ConversationSession, event: ConversationEvent): Transition {
  switch (event.type) {
    case "start":
      return restart();

    case "cancel":
      return {
        session: { state: "ended" },
        effect: { type: "reply", text: Messages.cancelled },
      };

    case "help":
      // Outside a conversation /help is its own command; inside one it falls through.
      if (isActive(session)) return restart();
      return { session, effect: { type: "reply", text: Messages.help } };

    case "text":
      if (session.state !== "awaitingLink") return restart();
      try {
        const url = parseLink(event.text);
        return {
          session: { state: "awaitingFormat", pendingUrl: url },
          effect: { type: "askFormat", text: Messages.askFormat },
        };
      } catch (error) {
        if (error instanceof ValidationError) {
          return { session, effect: { type: "reply", text: error.message } };
        }
        throw error;
      }

    case "choice": {
      const parsed = FormatChoiceSchema.safeParse(event.value);
      if (!parsed.success) return restart();

      try {
        const url = requirePendingUrl(session);
        return {
          session: { state: "awaitingLink" },
          effect: { type: "deliver", url, choice: parsed.data },
        };
      } catch (error) {
        if (error instanceof LostContextError) {
          return {
            session: { state: "ended" },
            effect: { type: "lostContext", text: error.message },
          };
        }
        throw error;
      }
    }

    case "other":
      return restart();
  }
}
