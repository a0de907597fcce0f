import pino from "pino";
import { ENV } from "../config/env";

export type { Logger } from "pino";

export function createLogger(serviceName: string) {
  const isDev = ENV.NODE_ENV === "development";

  return pino({
    level: ENV.NODE_ENV === "test" ? "silent" : ENV.LOG_LEVEL || "info",
    base: { service: serviceName, env: ENV.NODE_ENV },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "config.apiKey",
        "config.password",
        "payload.password",
        "payload.cardNumber",
        "recipient.email",
      ],
      censor: "[REDACTED]",
      remove: false,
    },
    transport: isDev
      ? { target: "pino-pretty", options: { colorize: true } }
      : undefined,
  });
}

export const logger = createLogger(ENV.SERVICE_NAME || "credit-engine");
