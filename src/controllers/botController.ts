/**
 * Bot Controller
 * Registers the update handlers on a grammy bot and routes them into the conversation.
 */

import type { Bot, Context } from "grammy";
import { sequentialize } from "@grammyjs/runner";
import { handleConversationEvent, type ConversationDeps } from "../services/business/conversationService.js";
import { createChatChannel, toConversationEvent } from "../services/external/telegram.js";
import { buildSessionKey } from "../repositories/sessionRepository.js";

export const BOT_COMMANDS = [
  { command: "start", description: "begin download" },
  { command: "cancel", description: "stop" },
  { command: "help", description: "show commands" },
];

/** Session key of the chat/user an update belongs to, if any. */
export function sessionKeyOf(ctx: Context): string | undefined {
  const chatId = ctx.chat?.id;
  const userId = ctx.from?.id;
  if (chatId === undefined || userId === undefined) return undefined;
  return buildSessionKey(chatId, userId);
}

/**
 * Wires the conversation into the bot.
 * Updates of one session run one after another; different sessions run concurrently.
 */
export function registerBotHandlers(bot: Bot, deps: ConversationDeps): void {
  bot.use(sequentialize(sessionKeyOf));

  bot.on(["message", "callback_query:data"], async (ctx) => {
    const sessionKey = sessionKeyOf(ctx);
    if (!sessionKey) return;

    const event = toConversationEvent(
      { text: ctx.message?.text, callbackData: ctx.callbackQuery?.data },
      ctx.me.username
    );

    await handleConversationEvent(sessionKey, event, createChatChannel(ctx), deps);
  });

  bot.catch((err) => {
    console.error(`[bot] ✗ update ${err.ctx.update.update_id} failed:`, err.error);
  });
}
