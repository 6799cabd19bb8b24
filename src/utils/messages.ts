/**
 * Bot Message Texts
 * Every user-facing string the conversation sends.
 */

import type { FormatChoice } from "../services/business/downloadConfig.js";

export const Messages = {
  greeting: "👋 Hi! Send me the link of the video you want to download.",
  invalidUrl: "❗️ Please send a valid URL (must start with http:// or https://).",
  askFormat: "Great! Do you want audio or video?",
  lostContext: "❌ Something went wrong (missing URL). Please /start again.",
  cancelled: "👋 Operation cancelled. Use /start to download again.",
  help: "/start – begin download\n/cancel – stop",
  done: "✅ Done! Send me another link (or /cancel to stop).",

  downloading: (choice: FormatChoice) => `🔄 Downloading your ${choice}…`,

  /** "🚀 Sending your video in 3 seconds…" / "… in 1 second…" */
  countdown: (choice: FormatChoice, seconds: number) =>
    `🚀 Sending your ${choice} in ${seconds} second${seconds > 1 ? "s" : ""}…`,

  downloadFailed: (cause: string) => `❌ Error during download: ${cause}`,
} as const;

/** Inline keyboard buttons offered with `askFormat`. */
export const FORMAT_BUTTONS: ReadonlyArray<{ label: string; value: FormatChoice }> = [
  { label: "Audio 🎵", value: "audio" },
  { label: "Video 🎥", value: "video" },
];
