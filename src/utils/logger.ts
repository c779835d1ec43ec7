/**
 * Logger Module
 * Structured logging using pino; JSON to stderr, pretty output on a TTY
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  /** Force pretty printing on or off (default: TTY in development) */
  pretty?: boolean;
}

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Determine if we're in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

/**
 * Get log level from environment or default
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "store", "expander", "cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("synthesizer");
 * logger.info({ facts: 120 }, "Module synthesized");
 * logger.error({ err }, "Synthesis failed");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const level = options.level ?? getLogLevel();
  const pretty = options.pretty ?? (isDevelopment() && process.stderr.isTTY === true);

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  // stdout is reserved for command output (module summaries, --json)
  if (pretty && level !== "silent") {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(
  parent: PinoLogger,
  bindings: Record<string, unknown>
): PinoLogger {
  return parent.child(bindings);
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
