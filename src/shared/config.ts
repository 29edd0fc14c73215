import "dotenv/config";
import { z } from "zod";

// ============ Environment Schema ============

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const optionalUrl = z
  .string()
  .url()
  .optional()
  .or(z.literal("").transform(() => undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_PRETTY: booleanFlag.optional(),

  DATABASE_URL: optionalUrl,
  GOOGLE_API_KEY: z.string().optional(),

  SMS_GATEWAY_URL: optionalUrl,
  VOICE_GATEWAY_URL: optionalUrl,
  EMAIL_GATEWAY_URL: optionalUrl,
  PUSH_GATEWAY_URL: optionalUrl,
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  DISCOVERY_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(300),
  RETRY_WINDOW_MINUTES: z.coerce.number().positive().default(5),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  ACK_TIMEOUT_MINUTES: z.coerce.number().positive().default(10),
  VERIFICATION_CODE_TTL_MINUTES: z.coerce.number().positive().default(10),
  DUPLICATE_ALERT_WINDOW_MINUTES: z.coerce.number().positive().default(2),
  ORCHESTRATOR_RADIUS_KM: z.coerce.number().positive().default(10),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  env: Env["NODE_ENV"];
  port: number;
  host: string;
  log: { level: Env["LOG_LEVEL"]; pretty: boolean };
  databaseUrl?: string;
  googleApiKey?: string;
  gateways: {
    sms?: string;
    voice?: string;
    email?: string;
    push?: string;
  };
  httpTimeoutMs: number;
  discovery: { cacheTtlSeconds: number };
  communication: {
    retryWindowMinutes: number;
    maxAttempts: number;
    ackTimeoutMinutes: number;
  };
  alerts: {
    verificationCodeTtlMinutes: number;
    duplicateWindowMinutes: number;
  };
  orchestrator: { radiusKm: number };
}

/**
 * Parse an environment map into the application configuration.
 * Throws a ZodError listing every invalid key.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = EnvSchema.parse(source);

  return Object.freeze({
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    log: {
      level: env.LOG_LEVEL,
      pretty: env.LOG_PRETTY ?? env.NODE_ENV !== "test",
    },
    databaseUrl: env.DATABASE_URL,
    googleApiKey: env.GOOGLE_API_KEY || undefined,
    gateways: {
      sms: env.SMS_GATEWAY_URL,
      voice: env.VOICE_GATEWAY_URL,
      email: env.EMAIL_GATEWAY_URL,
      push: env.PUSH_GATEWAY_URL,
    },
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
    discovery: { cacheTtlSeconds: env.DISCOVERY_CACHE_TTL_SECONDS },
    communication: {
      retryWindowMinutes: env.RETRY_WINDOW_MINUTES,
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      ackTimeoutMinutes: env.ACK_TIMEOUT_MINUTES,
    },
    alerts: {
      verificationCodeTtlMinutes: env.VERIFICATION_CODE_TTL_MINUTES,
      duplicateWindowMinutes: env.DUPLICATE_ALERT_WINDOW_MINUTES,
    },
    orchestrator: { radiusKm: env.ORCHESTRATOR_RADIUS_KM },
  });
}

export const config = loadConfig();
