import type { Logger } from "../core/types";
import winston from "winston";

export interface LoggerOptions {
  /** Defaults to AGENTWIRE_LOG_LEVEL, then "info". */
  level?: string;
  /** Prefix printed on every line, usually the agent id. */
  label?: string;
  silent?: boolean;
}

const render = (value: unknown): string => {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // circular structures and BigInt
    return String(value);
  }
};

/**
 * Winston-based logger. Each server or client receives its own instance
 * rather than sharing process-wide state.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const label = options.label ?? "AgentWire";
  const winstonLogger = winston.createLogger({
    level: options.level ?? process.env.AGENTWIRE_LOG_LEVEL ?? "info",
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
        return `[${label}][${level.toUpperCase()}] ${timestamp} ${message}${metaStr}`;
      }),
    ),
    transports: [new winston.transports.Console()],
  });

  const line = (args: unknown[]) => args.map(render).join(" ");

  return {
    debug: (...args: unknown[]) => winstonLogger.debug(line(args)),
    log: (...args: unknown[]) => winstonLogger.info(line(args)),
    error: (...args: unknown[]) => winstonLogger.error(line(args)),
    warn: (...args: unknown[]) => winstonLogger.warn(line(args)),
  };
}

let defaultLogger: Logger | undefined;

/**
 * Shared fallback for components constructed without a logger.
 */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}
