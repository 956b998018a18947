/**
 * Structured logger shared by the add-in and the client.
 *
 * Components take an optional `loggerFactory` and resolve a named logger from
 * it. Call sites pass context first, message second, and prefix messages with
 * `<service>:<component>:<method> - `.
 */

import pino from "pino";

export type LogMethod = (ctx: object, msg: string) => void;

export interface Logger {
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
}

/** Anything that hands out named loggers. */
export interface LoggerProvider {
  get(name: string): Logger;
}

/** Either a logger or a provider of named loggers. */
export type LoggerFactory = Logger | LoggerProvider;

function isProvider(factory: LoggerFactory): factory is LoggerProvider {
  return "get" in factory && typeof factory.get === "function";
}

/** Logger that drops everything. */
export const noopLogger: Logger = {};

/**
 * Resolve a logger for `serviceName` from a factory.
 * Without a factory the service logs through a default pino instance.
 */
export function resolveLogger(factory: LoggerFactory | undefined, serviceName: string): Logger {
  if (!factory) return createNodeJSLogger(serviceName).get(serviceName);
  return isProvider(factory) ? factory.get(serviceName) : factory;
}

export interface NodeLoggerOptions {
  /** pino level; defaults to LOG_LEVEL or "info" */
  level?: string;
  /** Use stderr when stdout carries a protocol (MCP stdio) */
  destination?: "stdout" | "stderr";
}

/**
 * Create a pino-backed logger provider. `get(prefix)` returns a child logger
 * that tags every line with the prefix.
 */
export function createNodeJSLogger(serviceName: string, options: NodeLoggerOptions = {}): LoggerProvider {
  const root = pino(
    {
      name: serviceName,
      level: options.level ?? process.env.LOG_LEVEL ?? "info",
    },
    pino.destination(options.destination === "stderr" ? 2 : 1),
  );

  return {
    get(prefix: string): Logger {
      const child = root.child({ prefix });
      return {
        debug: (ctx, msg) => child.debug(ctx, msg),
        info: (ctx, msg) => child.info(ctx, msg),
        warn: (ctx, msg) => child.warn(ctx, msg),
        error: (ctx, msg) => child.error(ctx, msg),
      };
    },
  };
}
