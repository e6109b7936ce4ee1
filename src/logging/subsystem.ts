/**
 * Subsystem Logging
 *
 * One tslog root logger, one sub-logger per subsystem. Everything goes to
 * stderr: stdout carries command output only.
 *
 * Level and color are process-wide and checked on every line, so loggers
 * created at import time follow later `setLogLevel` and `setLogColor` calls.
 */

import { inspect, stripVTControlCharacters } from "node:util";
import { Logger, type ILogObj } from "tslog";

export const LOG_LEVELS = ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type EmitLevel = Exclude<LogLevel, "silent">;

// Mirrors tslog's numeric level ids
const LEVEL_IDS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
  silent: 7,
};

let currentLevel: LogLevel = "warn";
let colorEnabled = Boolean(process.stderr.isTTY) && !process.env.NO_COLOR;

const rootLogger = new Logger<ILogObj>({
  name: "vtree",
  type: "pretty",
  minLevel: 0,
  hideLogPositionForProduction: true,
  // Always styled; the transport strips escapes when color is off
  stylePrettyLogs: true,
  prettyLogTemplate: "{{hh}}:{{MM}}:{{ss}}.{{ms}} {{logLevelName}} [{{name}}] ",
  overwrite: {
    transportFormatted: (logMetaMarkup, logArgs, logErrors) => {
      const body = logArgs
        .map((arg) => (typeof arg === "string" ? arg : inspect(arg, { colors: false })))
        .join(" ");
      const text = [logMetaMarkup + body, ...logErrors].join("\n");
      process.stderr.write(`${colorEnabled ? text : stripVTControlCharacters(text)}\n`);
    },
  },
});

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Switch ANSI styling of log lines on stderr
 */
export function setLogColor(enabled: boolean): void {
  colorEnabled = enabled;
}

export function isLevelEnabled(level: EmitLevel): boolean {
  return LEVEL_IDS[level] >= LEVEL_IDS[currentLevel];
}

export interface SubsystemLogger {
  readonly subsystem: string;
  trace(message: string, ...meta: unknown[]): void;
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
  fatal(message: string, ...meta: unknown[]): void;
  child(name: string): SubsystemLogger;
}

/**
 * Lines are prefixed with the tslog name chain, e.g. `[vtree:cli:repl]`
 * for `createSubsystemLogger("cli").child("repl")`.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return wrap(rootLogger.getSubLogger({ name: subsystem }), subsystem);
}

function wrap(logger: Logger<ILogObj>, subsystem: string): SubsystemLogger {
  const emit =
    (level: EmitLevel) =>
    (message: string, ...meta: unknown[]): void => {
      if (!isLevelEnabled(level)) return;
      logger[level](message, ...meta);
    };

  return {
    subsystem,
    trace: emit("trace"),
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    fatal: emit("fatal"),
    child: (name) => wrap(logger.getSubLogger({ name }), `${subsystem}:${name}`),
  };
}
