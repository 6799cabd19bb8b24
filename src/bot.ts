/**
 * Bot Entry Point
 * Loads configuration, starts long polling and the optional health server.
 * Handles graceful shutdown on SIGINT/SIGTERM.
 */
import "dotenv/config";
import { createServer, type Server } from "http";
import { Bot } from "grammy";
import { run } from "@grammyjs/runner";
import { createApp } from "./app.js";
import { loadConfig, type BotConfig } from "./config/env.js";
import { initializeApp } from "./config/init.js";
import { BOT_COMMANDS, registerBotHandlers } from "./controllers/botController.js";
import { startTempSweepJob } from "./jobs/crons/tempSweep.js";
import { createInMemorySessionRepository } from "./repositories/sessionRepository.js";
import { defaultDeliveryDeps } from "./services/business/deliveryPipeline.js";
import { createMediaFetcher } from "./services/external/ytdlp.js";

let botConfig: BotConfig;
try {
  botConfig = loadConfig();
} catch (error) {
  console.error("✗ Configuration error:", error instanceof Error ? error.message : error);
  process.exit(1);
}

async function main(config: BotConfig): Promise<void> {
  const { acceleratorPath } = await initializeApp(config);

  const sessions = createInMemorySessionRepository();
  const fetchMedia = createMediaFetcher({ binaryPath: config.ytdlpPath, acceleratorPath });

  const bot = new Bot(config.telegramToken);
  registerBotHandlers(bot, { sessions, delivery: defaultDeliveryDeps(fetchMedia) });

  await bot.init();
  await bot.api.setMyCommands(BOT_COMMANDS);

  console.log("Bot is starting up…");
  const runner = run(bot);
  const sweepTask = startTempSweepJob(config.tempMaxAgeHours);

  /** HTTP server exposing /health and /ready, only when a port is configured. */
  let server: Server | undefined;
  if (config.healthPort !== undefined) {
    const port = config.healthPort;
    server = createServer(
      createApp({ isReady: () => runner.isRunning(), sessionCount: () => sessions.size() }, config.nodeEnv)
    );
    server.listen(port, "0.0.0.0", () => {
      console.log(`[health] Server running on 0.0.0.0:${port}`);
    });
  }

  console.log(`✓ @${bot.botInfo.username} ready to accept updates\n`);

  const shutdown = async (signal: string) => {
    console.log(`[bot] ${signal} received, shutting down`);
    sweepTask.stop();
    server?.close();
    if (runner.isRunning()) {
      await runner.stop();
    }
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        console.error("[bot] ✗ Shutdown failed:", error);
        process.exit(1);
      });
    });
  }
}

main(botConfig).catch((error) => {
  console.error("✗ Startup failed:", error);
  process.exit(1);
});
