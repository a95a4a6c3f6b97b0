import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(6690),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  TIAN_API_KEY: z.string().default(""),
  TIAN_BASE_URL: z.string().url().default("https://apis.tianapi.com"),
  ENABLED_CATEGORIES: z.string().default("all"),
  ROTATION_INTERVAL_MINUTES: z.coerce.number().int().default(5),
  CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(3600),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(500).default(15000),
  SELECTOR_TICK_SECONDS: z.coerce.number().int().min(1).max(3600).default(30),
  DAILY_REFRESH_AT: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Expected HH:MM")
    .default("00:01"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60000),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(120),
  USE_REDIS: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
  REDIS_URL: z.string().default(""),
  REDIS_PREFIX: z.string().default("tian-content"),
  CORS_ORIGIN: z.string().default("*"),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
