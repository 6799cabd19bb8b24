/**
 * Telegram Adapter
 * Maps grammy updates to conversation events and conversation output to Bot API calls.
 */

import { InlineKeyboard, InputFile, type Context } from "grammy";
import type { ConversationEvent } from "../business/conversation.js";
import type { ConversationChannel } from "../business/conversationService.js";
import type { StatusMessage } from "../business/deliveryPipeline.js";

export interface InboundUpdate {
  text?: string;
  callbackData?: string;
}

const COMMAND = /^\/([a-z0-9_]+)(?:@(\w+))?(?:\s|$)/i;

/**
 * Turns an inbound update into the tagged event the conversation understands.
 * Commands addressed to another bot (`/start@OtherBot`) are not ours.
 */
export function toConversationEvent(update: InboundUpdate, botUsername?: string): ConversationEvent {
  if (update.callbackData !== undefined) {
    return { type: "choice", value: update.callbackData };
  }
  if (update.text === undefined) {
    return { type: "other" };
  }

  const match = COMMAND.exec(update.text);
  if (!match) {
    return { type: "text", text: update.text };
  }

  const [, name, target] = match;
  if (target && botUsername && target.toLowerCase() !== botUsername.toLowerCase()) {
    return { type: "other" };
  }

  switch (name.toLowerCase()) {
    case "start":
      return { type: "start" };
    case "cancel":
      return { type: "cancel" };
    case "help":
      return { type: "help" };
    default:
      return { type: "other" };
  }
}

/**
 * Builds the outbound channel for the chat an update came from.
 */
export function createChatChannel(ctx: Context): ConversationChannel {
  const statusAt = (chatId: number, messageId: number): StatusMessage => ({
    update: async (text) => {
      await ctx.api.editMessageText(chatId, messageId, text);
    },
  });

  return {
    reply: async (text) => {
      await ctx.reply(text);
    },

    askFormat: async (text, buttons) => {
      const keyboard = new InlineKeyboard();
      for (const button of buttons) {
        keyboard.text(button.label, button.value);
      }
      await ctx.reply(text, { reply_markup: keyboard });
    },

    acknowledge: async () => {
      if (ctx.callbackQuery) {
        await ctx.answerCallbackQuery();
      }
    },

    showStatus: async (text) => {
      // The prompt carrying the keyboard becomes the status line
      const prompt = ctx.callbackQuery?.message;
      if (prompt) {
        await ctx.api.editMessageText(prompt.chat.id, prompt.message_id, text);
        return statusAt(prompt.chat.id, prompt.message_id);
      }

      const sent = await ctx.reply(text);
      return statusAt(sent.chat.id, sent.message_id);
    },

    sendMedia: async (choice, filePath) => {
      const file = new InputFile(filePath);
      if (choice === "video") {
        await ctx.replyWithVideo(file);
      } else {
        await ctx.replyWithAudio(file);
      }
    },
  };
}
