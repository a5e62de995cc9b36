import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const schema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  DB_PATH: z.string().min(1).default(":memory:"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  JALALI_LEAP_RULE: z.enum(["cycle33", "breaks"]).default("cycle33")
});

export function loadConfig(env: NodeJS.ProcessEnv) {
  const parsed = schema.parse(env);

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    dbPath: parsed.DB_PATH,
    logLevel: parsed.LOG_LEVEL,
    leapRule: parsed.JALALI_LEAP_RULE
  };
}

export const appConfig = loadConfig(process.env);

export type AppConfig = ReturnType<typeof loadConfig>;
