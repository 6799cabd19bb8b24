/**
 * yt-dlp Media Fetcher
 * Runs yt-dlp in a child process and locates the file it produced.
 * The child process keeps the network transfer off the event loop.
 */

import { execa } from "execa";
import { readdir } from "fs/promises";
import path from "path";
import {
  buildDownloadConfig,
  toYtDlpArgs,
  type FormatChoice,
} from "../business/downloadConfig.js";
import { describeFetchFailure } from "../../utils/errorMessages.js";
import { FetchError } from "../../utils/errors.js";

export interface DownloadRequest {
  readonly url: string;
  readonly choice: FormatChoice;
  /** Scoped directory owned by the caller; yt-dlp writes only here. */
  readonly directory: string;
}

export interface DownloadResult {
  filePath: string;
}

export type MediaFetcher = (request: DownloadRequest) => Promise<DownloadResult>;

/** Runs a binary with arguments; rejects when the process fails. */
export type CommandRunner = (file: string, args: string[]) => Promise<unknown>;

export interface MediaFetcherOptions {
  binaryPath: string;
  acceleratorPath: string | null;
  run?: CommandRunner;
}

const runWithExeca: CommandRunner = (file, args) => execa(file, args);

/** Leftovers of an interrupted or in-progress transfer. */
const PARTIAL_SUFFIXES = [".part", ".ytdl", ".aria2", ".temp"];

/**
 * Picks the finished download among the directory entries.
 * With an expected extension (audio extraction), only that extension counts.
 */
export function pickDownloadedFile(
  entries: string[],
  expectedExtension?: string
): string | undefined {
  const finished = entries
    .filter((name) => !PARTIAL_SUFFIXES.some((suffix) => name.endsWith(suffix)))
    .sort();

  if (expectedExtension) {
    return finished.find((name) => path.extname(name) === `.${expectedExtension}`);
  }
  return finished[0];
}

/**
 * Creates the fetcher used by the delivery pipeline.
 */
export function createMediaFetcher(options: MediaFetcherOptions): MediaFetcher {
  const run = options.run ?? runWithExeca;

  return async function fetchMedia({ url, choice, directory }) {
    const config = buildDownloadConfig(choice, directory, {
      acceleratorPath: options.acceleratorPath,
    });
    const args = toYtDlpArgs(config, url);

    console.log(`[yt-dlp] Downloading ${choice} from: ${url}`);
    const startTime = Date.now();

    try {
      await run(options.binaryPath, args);
    } catch (error) {
      const cause = describeFetchFailure(error);
      console.error(`[yt-dlp] ✗ Download failed: ${cause}`);
      throw new FetchError(cause, error);
    }

    let entries: string[];
    try {
      entries = await readdir(directory);
    } catch (error) {
      throw new FetchError(describeFetchFailure(error), error);
    }

    const fileName = pickDownloadedFile(entries, config.outputExtension);
    if (!fileName) {
      throw new FetchError("Download completed but no output file was found");
    }

    const filePath = path.join(directory, fileName);
    const durationSec = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`[yt-dlp] ✓ Downloaded ${fileName} in ${durationSec}s`);

    return { filePath };
  };
}

/**
 * Checks whether the multi-connection accelerator can be started.
 * Returns its path when it can, null otherwise. Never throws.
 */
export async function detectAccelerator(
  binaryPath: string,
  run: CommandRunner = runWithExeca
): Promise<string | null> {
  try {
    await run(binaryPath, ["--version"]);
    console.log(`[yt-dlp] ✓ Accelerator available: ${binaryPath}`);
    return binaryPath;
  } catch (error) {
    console.log(
      `[yt-dlp] Accelerator not available (${describeFetchFailure(error)}) - using native downloader`
    );
    return null;
  }
}
