import { createGroq } from "@ai-sdk/groq";
import { generateText } from "ai";
import type { LlmConfig } from "../config.js";
import { ConfigurationError, LlmFailedError } from "../errors.js";
import { logger } from "../logger.js";

/**
 * Opaque text-in/text-out model boundary. Output is free text with no
 * guaranteed adherence to the requested headers.
 */
export interface LanguageModelClient {
  readonly model: string;
  invoke(prompt: string): Promise<string>;
}

/**
 * Groq-hosted model via the Vercel AI SDK. One attempt per call: no retries.
 *
 * @throws ConfigurationError when no API key is configured
 */
export function createGroqClient(config: LlmConfig): LanguageModelClient {
  if (!config.apiKey) {
    throw new ConfigurationError(
      "AI service not configured: set GROQ_API_KEY to enable bill analysis"
    );
  }

  const groq = createGroq({ apiKey: config.apiKey });
  const model = groq(config.model);

  return {
    model: config.model,
    async invoke(prompt) {
      const start = performance.now();
      try {
        const { text, usage } = await generateText({
          model,
          prompt,
          temperature: config.temperature,
          maxOutputTokens: config.maxOutputTokens,
          maxRetries: 0,
          abortSignal: AbortSignal.timeout(config.timeoutMs),
          // Spans are picked up by Sentry's vercelAIIntegration when enabled
          experimental_telemetry: { isEnabled: true, functionId: "bill-auditor" },
        });
        logger.info("LLM call completed", {
          model: config.model,
          promptChars: prompt.length,
          inputTokens: usage.inputTokens ?? 0,
          outputTokens: usage.outputTokens ?? 0,
          durationMs: Math.round(performance.now() - start),
        });
        return text;
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error("LLM call failed", { model: config.model, error: message });
        throw new LlmFailedError(`Language model request failed: ${message}`);
      }
    },
  };
}
