/**
 * Download Configuration Builder
 * Turns a format choice into the fixed yt-dlp policy used for every download.
 * Pure data construction: no filesystem or network access happens here.
 */

import path from "path";
import { z } from "zod";

export const FormatChoiceSchema = z.enum(["audio", "video"]);
export type FormatChoice = z.infer<typeof FormatChoiceSchema>;

/** 10 MiB */
export const HTTP_CHUNK_SIZE_BYTES = 10 * 1024 * 1024;

export interface ExternalDownloader {
  name: string;
  args: string[];
}

export interface AudioExtraction {
  codec: "mp3";
  /** Bitrate in kbps */
  quality: string;
}

export interface DownloadConfig {
  format: string;
  outputTemplate: string;
  noPlaylist: boolean;
  continueDownloads: boolean;
  retries: number;
  fragmentRetries: number;
  socketTimeoutSeconds: number;
  httpChunkSizeBytes: number;
  quiet: boolean;
  externalDownloader?: ExternalDownloader;
  audioExtraction?: AudioExtraction;
  /** Extension the final file is expected to have once post-processing ran. */
  outputExtension?: string;
}

export interface BuildOptions {
  /** Absolute path of the accelerator binary, or null when it is not installed. */
  acceleratorPath: string | null;
}

const FORMAT_SELECTORS: Record<FormatChoice, string> = {
  audio: "bestaudio/best",
  video: "bestvideo+bestaudio/best",
};

/**
 * Builds the download configuration for one request.
 * The accelerator is a soft preference: without it the native downloader is used.
 */
export function buildDownloadConfig(
  choice: FormatChoice,
  directory: string,
  options: BuildOptions
): DownloadConfig {
  const config: DownloadConfig = {
    format: FORMAT_SELECTORS[choice],
    outputTemplate: path.join(directory, "%(title)s.%(ext)s"),
    noPlaylist: true,
    continueDownloads: true,
    retries: 10,
    fragmentRetries: 10,
    socketTimeoutSeconds: 10,
    httpChunkSizeBytes: HTTP_CHUNK_SIZE_BYTES,
    quiet: true,
  };

  if (options.acceleratorPath) {
    // 16 connections per server, 1 MiB minimum split size
    config.externalDownloader = {
      name: options.acceleratorPath,
      args: ["-x", "16", "-k", "1M"],
    };
  }

  if (choice === "audio") {
    config.audioExtraction = { codec: "mp3", quality: "192" };
    config.outputExtension = "mp3";
  }

  return config;
}

/**
 * Renders a configuration as yt-dlp command-line arguments.
 * The URL goes after `--` so a link can never be read as an option.
 */
export function toYtDlpArgs(config: DownloadConfig, url: string): string[] {
  const args = [
    "--format", config.format,
    "--output", config.outputTemplate,
    "--retries", String(config.retries),
    "--fragment-retries", String(config.fragmentRetries),
    "--socket-timeout", String(config.socketTimeoutSeconds),
    "--http-chunk-size", String(config.httpChunkSizeBytes),
  ];

  if (config.noPlaylist) args.push("--no-playlist");
  if (config.continueDownloads) args.push("--continue");
  if (config.quiet) args.push("--quiet", "--no-warnings", "--no-progress");

  if (config.externalDownloader) {
    args.push(
      "--external-downloader", config.externalDownloader.name,
      "--external-downloader-args", `${path.basename(config.externalDownloader.name)}:${config.externalDownloader.args.join(" ")}`
    );
  }

  if (config.audioExtraction) {
    args.push(
      "--extract-audio",
      "--audio-format", config.audioExtraction.codec,
      "--audio-quality", `${config.audioExtraction.quality}K`
    );
  }

  args.push("--", url);
  return args;
}
