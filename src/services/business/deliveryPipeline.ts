/**
 * Delivery Pipeline
 * Download → countdown → send, inside a temp directory that is always removed.
 */

import type { FormatChoice } from "./downloadConfig.js";
import type { MediaFetcher } from "../external/ytdlp.js";
import { createScopedTempDir, type ScopedTempDir } from "../../utils/cleanupTemp.js";
import { describeFetchFailure } from "../../utils/errorMessages.js";
import { Messages } from "../../utils/messages.js";

export const COUNTDOWN_SECONDS = 5;

/** A status message that can be rewritten in place. */
export interface StatusMessage {
  update(text: string): Promise<void>;
}

/**
 * Outbound side of a chat as the pipeline sees it.
 */
export interface DeliveryChannel {
  /** Replaces the format-choice prompt with a status line. */
  showStatus(text: string): Promise<StatusMessage>;
  sendMedia(choice: FormatChoice, filePath: string): Promise<void>;
  reply(text: string): Promise<void>;
}

export interface DeliveryDeps {
  fetchMedia: MediaFetcher;
  sleep: (ms: number) => Promise<void>;
  createTempDir: () => Promise<ScopedTempDir>;
}

export type DeliveryOutcome =
  | { ok: true; filePath: string }
  | { ok: false; cause: string };

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const defaultDeliveryDeps = (fetchMedia: MediaFetcher): DeliveryDeps => ({
  fetchMedia,
  sleep,
  createTempDir: () => createScopedTempDir(),
});

/**
 * Runs one delivery. Failures are reported to the chat and returned, not thrown.
 */
export async function deliverMedia(
  url: string,
  choice: FormatChoice,
  channel: DeliveryChannel,
  deps: DeliveryDeps
): Promise<DeliveryOutcome> {
  let tempDir: ScopedTempDir | undefined;

  try {
    tempDir = await deps.createTempDir();
    const status = await channel.showStatus(Messages.downloading(choice));

    const { filePath } = await deps.fetchMedia({ url, choice, directory: tempDir.path });

    for (let sec = COUNTDOWN_SECONDS; sec > 0; sec--) {
      await status.update(Messages.countdown(choice, sec));
      await deps.sleep(1000);
    }

    await channel.sendMedia(choice, filePath);
    await channel.reply(Messages.done);

    console.log(`[delivery] ✓ Sent ${choice} for ${url}`);
    return { ok: true, filePath };
  } catch (error) {
    console.error("[delivery] ✗ Download error", error);
    const cause = describeFetchFailure(error);

    try {
      await channel.reply(Messages.downloadFailed(cause));
    } catch (replyError) {
      console.error("[delivery] ✗ Failed to report download error", replyError);
    }

    return { ok: false, cause };
  } finally {
    await tempDir?.dispose();
  }
}
