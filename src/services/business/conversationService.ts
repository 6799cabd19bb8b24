/**
 * Conversation Service
 * Loads a session, applies one event, performs the resulting effect, saves the session.
 */

import { transition, type ConversationEvent, type ConversationSession } from "./conversation.js";
import { deliverMedia, type DeliveryChannel, type DeliveryDeps } from "./deliveryPipeline.js";
import type { SessionRepository } from "../../repositories/sessionRepository.js";
import { FORMAT_BUTTONS } from "../../utils/messages.js";

/**
 * Everything the conversation can do to a chat.
 */
export interface ConversationChannel extends DeliveryChannel {
  askFormat(text: string, buttons: typeof FORMAT_BUTTONS): Promise<void>;
  /** Answers the button press; a no-op for anything that is not a callback. */
  acknowledge(): Promise<void>;
}

export interface ConversationDeps {
  sessions: SessionRepository;
  delivery: DeliveryDeps;
}

/**
 * Handles one inbound event for a session and returns the session as saved.
 * Events of one session must not overlap; the caller sequentializes them.
 */
export async function handleConversationEvent(
  sessionKey: string,
  event: ConversationEvent,
  channel: ConversationChannel,
  deps: ConversationDeps
): Promise<ConversationSession> {
  const current = deps.sessions.get(sessionKey);
  const { session: next, effect } = transition(current, event);

  // Saved before the effect runs; a failing effect keeps the new state.
  deps.sessions.save(sessionKey, next);

  if (current.state !== next.state) {
    console.log(`[conversation] ${sessionKey} ${event.type}: ${current.state} → ${next.state}`);
  }

  if (event.type === "choice") {
    // The answer only stops the button spinner; the choice is handled regardless
    try {
      await channel.acknowledge();
    } catch (error) {
      console.warn(`[conversation] ${sessionKey} failed to answer callback`, error);
    }
  }

  switch (effect.type) {
    case "reply":
      await channel.reply(effect.text);
      break;

    case "askFormat":
      await channel.askFormat(effect.text, FORMAT_BUTTONS);
      break;

    case "lostContext":
      console.warn(`[conversation] ${sessionKey} format chosen without a pending URL`);
      await channel.showStatus(effect.text);
      break;

    case "deliver":
      await deliverMedia(effect.url, effect.choice, channel, deps.delivery);
      break;
  }

  return next;
}
