import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { loadConfig } from "../config.js";
import { initInstrumentation } from "../instrument.js";
import { createGroqClient, type LanguageModelClient } from "../llm/client.js";
import { logger } from "../logger.js";
import { SessionStore } from "../session/sessionStore.js";
import { createApp } from "./app.js";

const config = loadConfig();
initInstrumentation(config);

let client: LanguageModelClient | undefined;

const store = new SessionStore(
  {
    // Created on first use so a missing key fails the action, not the server
    getClient: () => (client ??= createGroqClient(config.llm)),
    validation: config.validation,
    promptCharLimit: config.promptCharLimit,
  },
  { maxSessions: config.session.maxSessions, ttlMs: config.session.ttlMs }
);

const webDist = fileURLToPath(new URL("../../frontend/dist", import.meta.url));

const app = createApp({
  store,
  maxUploadBytes: config.maxUploadBytes,
  staticDir: existsSync(webDist) ? webDist : undefined,
  version: process.env.npm_package_version,
});

app.listen(config.port, () => {
  logger.info("Bill auditor listening", { port: config.port, model: config.llm.model });
  if (!config.llm.apiKey) {
    logger.warn("GROQ_API_KEY is not set: uploads work, analysis will report a configuration error");
  }
});
