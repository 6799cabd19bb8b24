/**
 * Environment Configuration
 * Validates and returns type-safe environment variables.
 * Fails fast at startup if required variables are missing.
 */

import { z } from "zod";
import { ConfigurationError } from "../utils/errors.js";

const EnvSchema = z.object({
  TELEGRAM_TOKEN: z.string().trim().min(1, "is required"),
  YTDLP_PATH: z.string().min(1).default("yt-dlp"),
  ARIA2C_PATH: z.string().min(1).default("aria2c"),
  HEALTH_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  TEMP_MAX_AGE_HOURS: z.coerce.number().positive().default(6),
  NODE_ENV: z.string().default("development"),
});

export interface BotConfig {
  telegramToken: string;
  ytdlpPath: string;
  aria2cPath: string;
  /** Health server port; the server is off when undefined. */
  healthPort?: number;
  tempMaxAgeHours: number;
  nodeEnv: string;
}

/**
 * Reads the bot configuration from an environment map.
 * Throws ConfigurationError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }

  const parsed = result.data;
  return {
    telegramToken: parsed.TELEGRAM_TOKEN,
    ytdlpPath: parsed.YTDLP_PATH,
    aria2cPath: parsed.ARIA2C_PATH,
    healthPort: parsed.HEALTH_PORT,
    tempMaxAgeHours: parsed.TEMP_MAX_AGE_HOURS,
    nodeEnv: parsed.NODE_ENV,
  };
}
