import { mkdtemp, rm, writeFile } from "fs/promises";
import { existsSync } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { deliverMedia, type DeliveryDeps } from "../src/services/business/deliveryPipeline.js";
import type { DownloadRequest } from "../src/services/external/ytdlp.js";
import { createScopedTempDir } from "../src/utils/cleanupTemp.js";
import { FetchError } from "../src/utils/errors.js";
import { createFakeChannel } from "./helpers/fakeChannel.js";

let baseDir: string;
let createdDirs: string[];

beforeEach(async () => {
  baseDir = await mkdtemp(path.join(os.tmpdir(), "delivery-test-"));
  createdDirs = [];
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(baseDir, { recursive: true, force: true });
});

function makeDeps(fetchMedia: DeliveryDeps["fetchMedia"]) {
  return {
    fetchMedia,
    sleep: vi.fn(async () => {}),
    createTempDir: async () => {
      const dir = await createScopedTempDir(baseDir);
      createdDirs.push(dir.path);
      return dir;
    },
  };
}

const writesFile = (name: string) => async (request: DownloadRequest) => {
  const filePath = path.join(request.directory, name);
  await writeFile(filePath, "media");
  return { filePath };
};

describe("deliverMedia", () => {
  it("downloads, counts down from 5 to 1 and sends the video", async () => {
    const { channel, calls } = createFakeChannel();
    const deps = makeDeps(writesFile("clip.mp4"));

    const outcome = await deliverMedia("https://example.com/v", "video", channel, deps);

    const filePath = path.join(createdDirs[0], "clip.mp4");
    expect(outcome).toEqual({ ok: true, filePath });
    expect(calls).toEqual([
      { kind: "showStatus", text: "🔄 Downloading your video…" },
      { kind: "statusUpdate", text: "🚀 Sending your video in 5 seconds…" },
      { kind: "statusUpdate", text: "🚀 Sending your video in 4 seconds…" },
      { kind: "statusUpdate", text: "🚀 Sending your video in 3 seconds…" },
      { kind: "statusUpdate", text: "🚀 Sending your video in 2 seconds…" },
      { kind: "statusUpdate", text: "🚀 Sending your video in 1 second…" },
      { kind: "sendMedia", choice: "video", filePath },
      { kind: "reply", text: "✅ Done! Send me another link (or /cancel to stop)." },
    ]);
    expect(deps.sleep).toHaveBeenCalledTimes(5);
    expect(deps.sleep).toHaveBeenCalledWith(1000);
  });

  it("passes the url, choice and scoped directory to the fetcher", async () => {
    const { channel } = createFakeChannel();
    const fetchMedia = vi.fn(writesFile("song.mp3"));

    await deliverMedia("https://example.com/a", "audio", channel, makeDeps(fetchMedia));

    expect(fetchMedia).toHaveBeenCalledWith({
      url: "https://example.com/a",
      choice: "audio",
      directory: createdDirs[0],
    });
  });

  it("removes the temp directory after a successful delivery", async () => {
    const { channel } = createFakeChannel();

    await deliverMedia("https://example.com/v", "video", channel, makeDeps(writesFile("clip.mp4")));

    expect(createdDirs).toHaveLength(1);
    expect(existsSync(createdDirs[0])).toBe(false);
  });

  it("reports a fetch error without countdown or upload and still cleans up", async () => {
    const { channel, calls } = createFakeChannel();
    const deps = makeDeps(async (request) => {
      await writeFile(path.join(request.directory, "clip.mp4.part"), "partial");
      throw new FetchError("Unsupported URL");
    });

    const outcome = await deliverMedia("https://example.com/v", "video", channel, deps);

    expect(outcome).toEqual({ ok: false, cause: "Unsupported URL" });
    expect(calls).toEqual([
      { kind: "showStatus", text: "🔄 Downloading your video…" },
      { kind: "reply", text: "❌ Error during download: Unsupported URL" },
    ]);
    expect(deps.sleep).not.toHaveBeenCalled();
    expect(existsSync(createdDirs[0])).toBe(false);
  });

  it("reports an upload failure the same way", async () => {
    const { channel, calls } = createFakeChannel({
      sendMedia: async () => {
        throw new Error("Request Entity Too Large");
      },
    });

    const outcome = await deliverMedia("https://example.com/v", "video", channel, makeDeps(writesFile("clip.mp4")));

    expect(outcome).toEqual({ ok: false, cause: "Request Entity Too Large" });
    expect(calls[calls.length - 1]).toEqual({
      kind: "reply",
      text: "❌ Error during download: Request Entity Too Large",
    });
    expect(existsSync(createdDirs[0])).toBe(false);
  });

  it("still cleans up when the error reply cannot be sent", async () => {
    const { channel } = createFakeChannel({
      reply: async () => {
        throw new Error("chat not found");
      },
    });
    const deps = makeDeps(async () => {
      throw new FetchError("network down");
    });

    const outcome = await deliverMedia("https://example.com/v", "audio", channel, deps);

    expect(outcome).toEqual({ ok: false, cause: "network down" });
    expect(existsSync(createdDirs[0])).toBe(false);
  });

  it("reports a temp directory failure before anything is downloaded", async () => {
    const { channel, calls } = createFakeChannel();
    const fetchMedia = vi.fn(writesFile("clip.mp4"));
    const deps = {
      ...makeDeps(fetchMedia),
      createTempDir: async () => {
        throw new Error("ENOSPC: no space left on device");
      },
    };

    const outcome = await deliverMedia("https://example.com/v", "video", channel, deps);

    expect(outcome).toEqual({ ok: false, cause: "ENOSPC: no space left on device" });
    expect(calls).toEqual([
      { kind: "reply", text: "❌ Error during download: ENOSPC: no space left on device" },
    ]);
    expect(fetchMedia).not.toHaveBeenCalled();
  });
});
