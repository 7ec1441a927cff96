import { NETWORK_STORE_DRIVERS, type NetworkStoreDriver } from "@opsreg/store";
import { z } from "zod";

const DEV_ADMIN_TOKEN = "dev-admin-token";

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  API_PORT: z.coerce.number().int().positive().default(4000),
  WEB_ORIGIN: z
    .string()
    .url("WEB_ORIGIN must be a valid URL")
    .refine((value) => value !== "*", "WEB_ORIGIN cannot be '*'")
    .default("http://localhost:3000"),
  OPS_TABLE: z.preprocess(emptyStringToUndefined, z.string({ required_error: "OPS_TABLE is required" })),
  OPS_STORE_DRIVER: z.enum(NETWORK_STORE_DRIVERS).default("redis"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  POSTGRES_URL: z.preprocess(emptyStringToUndefined, z.string().optional()),
  OPS_ADMIN_TOKEN: z.string().min(1, "OPS_ADMIN_TOKEN must not be empty").default(DEV_ADMIN_TOKEN),
  API_WRITE_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60 * 1000),
  API_WRITE_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60)
}).superRefine((value, ctx) => {
  if (value.OPS_STORE_DRIVER === "postgres" && !value.POSTGRES_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["POSTGRES_URL"],
      message: "POSTGRES_URL is required when OPS_STORE_DRIVER=postgres"
    });
  }

  if (value.NODE_ENV === "production" && value.OPS_ADMIN_TOKEN === DEV_ADMIN_TOKEN) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["OPS_ADMIN_TOKEN"],
      message: "OPS_ADMIN_TOKEN must not use the development default in production"
    });
  }
});

export type ApiConfig = {
  nodeEnv: "development" | "test" | "production";
  port: number;
  webOrigin: string;
  opsTable: string;
  storeDriver: NetworkStoreDriver;
  redisUrl: string;
  postgresUrl?: string;
  adminToken: string;
  writeRateLimitWindowMs: number;
  writeRateLimitMax: number;
};

/**
 * Load and validate environment variables and return a normalized API configuration.
 *
 * @param env - Environment mapping to read values from; defaults to `process.env`.
 * @throws ZodError If environment validation fails (missing or invalid variables).
 */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = envSchema.parse(env);
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.API_PORT,
    webOrigin: parsed.WEB_ORIGIN,
    opsTable: parsed.OPS_TABLE,
    storeDriver: parsed.OPS_STORE_DRIVER,
    redisUrl: parsed.REDIS_URL,
    postgresUrl: parsed.POSTGRES_URL,
    adminToken: parsed.OPS_ADMIN_TOKEN,
    writeRateLimitWindowMs: parsed.API_WRITE_RATE_LIMIT_WINDOW_MS,
    writeRateLimitMax: parsed.API_WRITE_RATE_LIMIT_MAX
  };
}
