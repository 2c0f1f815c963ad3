import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  MODEL: z.string().min(1).default("gpt-4o-mini"),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(500_000),
  WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CORS_ORIGIN: z.string().default("*"),
  LOG_LEVEL: z.string().default("info"),
  JSON_BODY_LIMIT: z.string().default("1mb"),
});

export class ConfigurationError extends Error {
  constructor(public readonly fieldErrors: Record<string, string[] | undefined>) {
    super(
      `Invalid environment variables: ${Object.keys(fieldErrors).join(", ")}`,
    );
    this.name = "ConfigurationError";
  }
}

export interface ProviderCredentials {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly defaultModel: string;
}

export interface AppConfig {
  readonly env: "development" | "production" | "test";
  readonly port: number;
  readonly provider: ProviderCredentials;
  readonly upstreamTimeoutMs: number;
  readonly webhookTimeoutMs: number;
  readonly corsOrigin: string;
  readonly logLevel: string;
  readonly jsonBodyLimit: string;
}

/**
 * Validates the environment and builds the process-wide configuration.
 * The returned object and its nested credentials are frozen.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.flatten().fieldErrors);
  }

  const data = parsed.data;
  return Object.freeze({
    env: data.NODE_ENV,
    port: data.PORT,
    provider: Object.freeze({
      apiKey: data.OPENAI_API_KEY,
      baseUrl: data.OPENAI_BASE_URL,
      defaultModel: data.MODEL,
    }),
    upstreamTimeoutMs: data.UPSTREAM_TIMEOUT_MS,
    webhookTimeoutMs: data.WEBHOOK_TIMEOUT_MS,
    corsOrigin: data.CORS_ORIGIN,
    logLevel: data.LOG_LEVEL,
    jsonBodyLimit: data.JSON_BODY_LIMIT,
  });
}

function loadProcessConfig(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error("Invalid environment variables:", err.fieldErrors);
      process.exit(1);
    }
    throw err;
  }
}

export const config = loadProcessConfig();
