/**
 * Temp Sweep Cron Job
 * Scheduled removal of download directories left behind by crashed runs.
 */

import cron, { type ScheduledTask } from "node-cron";
import { sweepStaleTempDirs } from "../../utils/cleanupTemp.js";

/**
 * Starts the sweep job.
 * Runs at minute 0 of every hour.
 */
export function startTempSweepJob(maxAgeHours: number): ScheduledTask {
  const task = cron.schedule("0 * * * *", async () => {
    console.log("[Temp Sweep Job] Starting...");
    try {
      await sweepStaleTempDirs(maxAgeHours);
    } catch (error) {
      console.error("[Temp Sweep Job] ✗ Failed:", error);
    }
  });

  console.log(`[Temp Sweep Job] Scheduled (hourly, max age ${maxAgeHours}h)`);
  return task;
}
