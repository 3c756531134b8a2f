import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(7090),
  DB_PATH: z.string().min(1).default("./data/crm.sqlite"),
  DB_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  API_PREFIX: z.string().startsWith("/").default("/api/v1"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600)
});

export type Config = {
  port: number;
  dbPath: string;
  dbBusyTimeoutMs: number;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  apiPrefix: string;
  rateLimit: { windowMs: number; max: number };
};

/** Empty strings count as unset, so `PORT=` in a .env falls back to the default. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  const e = EnvSchema.parse(present);
  return {
    port: e.PORT,
    dbPath: e.DB_PATH,
    dbBusyTimeoutMs: e.DB_BUSY_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
    apiPrefix: e.API_PREFIX,
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX }
  };
}
