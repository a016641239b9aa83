import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

/** Logs go to stderr (or a file) so stdout stays free for command output. */
export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  if (config?.file) {
    return pino({ level }, pino.destination(config.file));
  }

  if (isJson) {
    return pino({ level }, pino.destination(2));
  }

  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", destination: 2 },
    },
  });
}
