import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config.js";
import { ConfigurationError } from "../../src/errors.js";

describe("L6 · config", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.nodeEnv).toBe("development");
    expect(config.port).toBe(8000);
    expect(config.llm).toEqual({
      apiKey: undefined,
      model: "llama-3.3-70b-versatile",
      temperature: 0,
      maxOutputTokens: 4096,
      timeoutMs: 60_000,
    });
    expect(config.promptCharLimit).toBe(12_000);
    expect(config.validation).toEqual({ minChars: 200, previewChars: 15_000, mode: "standard" });
    expect(config.maxUploadBytes).toBe(20 * 1024 * 1024);
    expect(config.session).toEqual({ ttlMs: 3_600_000, maxSessions: 200 });
    expect(config.sentryDsn).toBeUndefined();
  });

  it("coerces numeric and enum variables", () => {
    const config = loadConfig({
      PORT: "3000",
      LLM_TEMPERATURE: "0.2",
      VALIDATION_MODE: "strict",
      GROQ_API_KEY: "test-secret",
    });

    expect(config.port).toBe(3000);
    expect(config.llm.temperature).toBe(0.2);
    expect(config.llm.apiKey).toBe("test-secret");
    expect(config.validation.mode).toBe("strict");
  });

  it("treats blank keys as unset", () => {
    const config = loadConfig({ GROQ_API_KEY: "   ", SENTRY_DSN: "" });
    expect(config.llm.apiKey).toBeUndefined();
    expect(config.sentryDsn).toBeUndefined();
  });

  it("throws a ConfigurationError naming every invalid variable", () => {
    let thrown: unknown;
    try {
      loadConfig({ PORT: "not-a-port", VALIDATION_MODE: "lenient" });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    if (!(thrown instanceof ConfigurationError)) return;
    expect(thrown.message).toBe("Invalid environment configuration");
    expect(thrown.statusCode).toBe(503);
    expect(thrown.details?.map((d) => d.field)).toEqual(["PORT", "VALIDATION_MODE"]);
  });
});
