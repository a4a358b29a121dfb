import * as Sentry from "@sentry/node";
import type { AppConfig } from "./config.js";

/** Sentry stays disabled without a DSN; the logger then writes to the console. */
export function initInstrumentation(config: AppConfig): void {
  if (!config.sentryDsn) return;

  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.nodeEnv,
    enableLogs: true,
    sendDefaultPii: false,
    integrations: [
      Sentry.consoleLoggingIntegration({ levels: ["warn", "error"] }),
      Sentry.vercelAIIntegration({ recordInputs: true, recordOutputs: true }),
    ],
    tracesSampleRate: config.nodeEnv === "production" ? 0.1 : 1.0,
  });
}
