/**
 * Session Repository
 * Conversation records per chat/user. In-memory: a restart forgets all conversations.
 */

import { initialSession, type ConversationSession } from "../services/business/conversation.js";

export interface SessionRepository {
  get(key: string): ConversationSession;
  save(key: string, session: ConversationSession): void;
  size(): number;
}

/** One conversation per user per chat. */
export function buildSessionKey(chatId: number, userId: number): string {
  return `${chatId}:${userId}`;
}

export function createInMemorySessionRepository(): SessionRepository {
  const sessions = new Map<string, ConversationSession>();

  return {
    get: (key) => sessions.get(key) ?? initialSession(),
    save: (key, session) => {
      // An ended session reads back as a fresh one
      if (session.state === "ended") {
        sessions.delete(key);
      } else {
        sessions.set(key, session);
      }
    },
    size: () => sessions.size,
  };
}
