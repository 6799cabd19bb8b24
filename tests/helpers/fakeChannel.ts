import type { ConversationChannel } from "../../src/services/business/conversationService.js";
import type { FormatChoice } from "../../src/services/business/downloadConfig.js";

export type ChannelCall =
  | { kind: "reply"; text: string }
  | { kind: "askFormat"; text: string; buttons: string[] }
  | { kind: "acknowledge" }
  | { kind: "showStatus"; text: string }
  | { kind: "statusUpdate"; text: string }
  | { kind: "sendMedia"; choice: FormatChoice; filePath: string };

/**
 * Records every outbound call in order.
 */
export function createFakeChannel(overrides: Partial<ConversationChannel> = {}) {
  const calls: ChannelCall[] = [];

  const channel: ConversationChannel = {
    reply: async (text) => {
      calls.push({ kind: "reply", text });
    },
    askFormat: async (text, buttons) => {
      calls.push({ kind: "askFormat", text, buttons: buttons.map((b) => `${b.label}=${b.value}`) });
    },
    acknowledge: async () => {
      calls.push({ kind: "acknowledge" });
    },
    showStatus: async (text) => {
      calls.push({ kind: "showStatus", text });
      return {
        update: async (next) => {
          calls.push({ kind: "statusUpdate", text: next });
        },
      };
    },
    sendMedia: async (choice, filePath) => {
      calls.push({ kind: "sendMedia", choice, filePath });
    },
    ...overrides,
  };

  return { channel, calls };
}
