/**
 * Error Message Utility
 * Pulls the human-readable cause out of a failed yt-dlp run.
 */

const ERROR_LINE = /^ERROR:\s*(.+)$/;
const EXTRACTOR_TAG = /^\[[^\]]+\]\s*/;

/**
 * Returns the last `ERROR:` line of yt-dlp's stderr without its prefix
 * and extractor tag, e.g. "[youtube] abc: Video unavailable" → "abc: Video unavailable".
 */
export function extractYtDlpError(stderr: string): string | undefined {
  const lines = stderr.split(/\r?\n/).map((line) => line.trim());

  for (let i = lines.length - 1; i >= 0; i--) {
    const match = ERROR_LINE.exec(lines[i]);
    if (match) {
      return match[1].replace(EXTRACTOR_TAG, "").trim();
    }
  }

  return undefined;
}

/**
 * Converts a process failure into the cause shown to the user.
 */
export function describeFetchFailure(error: unknown): string {
  if (typeof error === "object" && error !== null) {
    if ("stderr" in error && typeof error.stderr === "string") {
      const cause = extractYtDlpError(error.stderr);
      if (cause) return cause;
    }
    if ("shortMessage" in error && typeof error.shortMessage === "string") {
      return error.shortMessage;
    }
  }

  if (error instanceof Error) return error.message;
  return String(error);
}
