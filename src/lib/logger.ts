import pino, { type LoggerOptions } from "pino";
import { createRequire } from "module";

const env = process.env.NODE_ENV || "development";
const level = process.env.LOG_LEVEL || (env === "production" ? "info" : "debug");

let transport: LoggerOptions["transport"];
if (env === "development") {
  try {
    const require = createRequire(import.meta.url);
    require.resolve("pino-pretty");
    transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
      },
    };
  } catch {
    // pino-pretty is a dev dependency; fall back to JSON lines without it
    transport = undefined;
  }
}

export const logger = pino({
  level,
  transport,
  redact: {
    paths: ["apiKey", "*.apiKey", "headers.Authorization", "headers.authorization"],
    censor: "[redacted]",
  },
});

export type Logger = typeof logger;

/** CLI output owns stdout, so script logs go to stderr and default to warnings only. */
export function createStderrLogger(): Logger {
  return pino({ level: process.env.LOG_LEVEL || "warn" }, pino.destination(2));
}
