import "dotenv/config";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

/** Treats `FOO=` in .env the same as an unset variable */
const blankAsUnset = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8000),

  GROQ_API_KEY: z.preprocess(blankAsUnset, z.string().trim().optional()),
  LLM_MODEL: z.string().min(1).default("llama-3.3-70b-versatile"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(4096),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  PROMPT_CHAR_LIMIT: z.coerce.number().int().positive().default(12_000),
  VALIDATION_MIN_CHARS: z.coerce.number().int().nonnegative().default(200),
  VALIDATION_PREVIEW_CHARS: z.coerce.number().int().positive().default(15_000),
  VALIDATION_MODE: z.enum(["standard", "strict"]).default("standard"),

  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  SESSION_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  MAX_SESSIONS: z.coerce.number().int().positive().default(200),

  SENTRY_DSN: z.preprocess(blankAsUnset, z.string().url().optional()),
});

export interface LlmConfig {
  /** Absent when GROQ_API_KEY is unset; analysis then fails with a ConfigurationError */
  apiKey: string | undefined;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  llm: LlmConfig;
  promptCharLimit: number;
  validation: {
    minChars: number;
    previewChars: number;
    mode: "standard" | "strict";
  };
  maxUploadBytes: number;
  session: {
    ttlMs: number;
    maxSessions: number;
  };
  sentryDsn: string | undefined;
}

/**
 * Parses configuration from the environment (and `.env`, via dotenv).
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => ({
      field: issue.path.map(String).join("."),
      message: issue.message,
    }));
    throw new ConfigurationError("Invalid environment configuration", details);
  }

  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    llm: {
      apiKey: e.GROQ_API_KEY,
      model: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
      maxOutputTokens: e.LLM_MAX_OUTPUT_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    promptCharLimit: e.PROMPT_CHAR_LIMIT,
    validation: {
      minChars: e.VALIDATION_MIN_CHARS,
      previewChars: e.VALIDATION_PREVIEW_CHARS,
      mode: e.VALIDATION_MODE,
    },
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    session: {
      ttlMs: e.SESSION_TTL_MS,
      maxSessions: e.MAX_SESSIONS,
    },
    sentryDsn: e.SENTRY_DSN,
  };
}
