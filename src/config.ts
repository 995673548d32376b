import { z } from "zod";
import type { LogLevel } from "./logger.js";

const envSchema = z.object({
  STOCK_DB_PATH: z.string().trim().min(1).default("./stock.sqlite3"),
  STOCK_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export interface EngineConfig {
  dbPath: string;
  logLevel: LogLevel;
}

/**
 * Read engine settings from environment variables. Unknown variables are ignored;
 * an invalid log level throws with the zod issue message.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse({
    STOCK_DB_PATH: env.STOCK_DB_PATH || undefined,
    STOCK_LOG_LEVEL: env.STOCK_LOG_LEVEL || undefined,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration: ${issue.path.join(".")} ${issue.message}`);
  }
  return { dbPath: parsed.data.STOCK_DB_PATH, logLevel: parsed.data.STOCK_LOG_LEVEL };
}
