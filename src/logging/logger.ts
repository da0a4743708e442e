import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

// stdout belongs to command output; logs go to stderr unless a file is configured.
const STDERR = 2;

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "warn";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const options: pino.LoggerOptions = { name: "fermtrack", level };

  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }

  if (isJson) {
    return pino(options, pino.destination(STDERR));
  }

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", destination: STDERR },
    },
  });
}
