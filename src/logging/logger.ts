import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger } from "pino";

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export interface LoggerOptions {
  readonly level?: LevelWithSilent;
}

/**
 * Structured logger writing JSON lines to stderr so that reports printed on
 * stdout stay machine-readable.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: "mcp-provenance",
      level: options.level ?? "warn",
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    pino.destination(2),
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}
