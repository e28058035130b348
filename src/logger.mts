/**
 * Pino logger factory.
 *
 * Logs go to stderr as JSON so stdout stays free for reports and previews.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  /** Bindings included in every line */
  base?: Record<string, unknown>;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: parseLogLevel(process.env.COMMENTARY_LOG_LEVEL) ?? "warn",
  base: {
    service: "md-commentary"
  }
};

export function createLogger(config?: LoggerConfig): Logger {
  const mergedConfig = { ...DEFAULT_CONFIG, ...config };

  const options: LoggerOptions = {
    level: mergedConfig.level,
    base: mergedConfig.base
  };

  return pino(options, pino.destination({ dest: 2, sync: true }));
}

export interface CommentaryLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): CommentaryLogger;
}

function wrapLogger(logger: Logger): CommentaryLogger {
  return {
    trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err) {
        logger.error(err, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings))
  };
}

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

/**
 * Loggers are derived on demand so that a level set through `setLogLevel`
 * applies to every module, including ones that logged before.
 */
export function getLogger(module?: string): CommentaryLogger {
  const root = getRootLogger();
  return wrapLogger(module ? root.child({ module }) : root);
}

export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

export function getLogLevel(): LogLevel {
  return parseLogLevel(getRootLogger().level) ?? "warn";
}
