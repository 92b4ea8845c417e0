import pino, { type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

function prettyByDefault(): boolean {
  const env = process.env.NODE_ENV;
  return env !== "production" && env !== "test";
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? defaultLevel();
  if (options.pretty ?? prettyByDefault()) {
    return pino({ level, transport: { target: "pino-pretty" } });
  }
  return pino({ level });
}

export const logger = createLogger();
