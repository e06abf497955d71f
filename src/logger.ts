import pino, { type DestinationStream } from "pino";

export type { Logger } from "pino";

export const REDACT_KEYS = ['req.headers["x-negotiator-key"]', "apiKey", "*.apiKey"];

/** Root logger options shared by the server and the CLI; only the destination differs. */
export function createLogger(destination?: DestinationStream) {
  return pino(
    {
      level: process.env.LOG_LEVEL || "info",
      base: {
        service: "mailtls-negotiator",
      },
      redact: {
        paths: REDACT_KEYS,
        censor: "[REDACTED]",
      },
    },
    destination
  );
}

export const logger = createLogger();
