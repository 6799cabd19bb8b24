/**
 * Application Initialization
 * Clears leftovers from earlier runs and probes the optional download accelerator.
 */

import type { BotConfig } from "./env.js";
import { detectAccelerator } from "../services/external/ytdlp.js";
import { sweepStaleTempDirs } from "../utils/cleanupTemp.js";

export interface RuntimeEnvironment {
  /** Accelerator binary when it can be started, otherwise null. */
  acceleratorPath: string | null;
}

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(config: BotConfig): Promise<RuntimeEnvironment> {
  console.log("Initializing application...");

  try {
    await sweepStaleTempDirs(config.tempMaxAgeHours);
    const acceleratorPath = await detectAccelerator(config.aria2cPath);

    console.log("✓ Application initialized successfully\n");
    return { acceleratorPath };
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
