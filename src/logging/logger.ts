/**
 * Leveled logger for the engine and its CLI.
 *
 * Every entry is one line, `[time] [LEVEL] [name] message {context}`, handed
 * to each enabled sink. The console sink is on by default; the file sink
 * appends to `<logDir>/<logFile>` when `file` is set.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

/** Receives each entry that passes the level filter. */
export type LogSink = (level: LogLevel, entry: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Shown in brackets on every entry */
  name?: string;
  logDir?: string;
  logFile?: string;
  console?: boolean;
  file?: boolean;
  /** Sinks fed in addition to console and file */
  sinks?: LogSink[];
}

interface ResolvedOptions {
  level: LogLevel;
  name: string;
  logDir: string;
  logFile: string;
  console: boolean;
  file: boolean;
  sinks: LogSink[];
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger sharing this one's sinks under `<name>.<suffix>` */
  child(suffix: string): Logger;
}

export function formatLogEntry(
  level: LogLevel,
  name: string,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const parts = [`[${now.toISOString()}]`, `[${level.toUpperCase().padEnd(5)}]`, `[${name}]`, message];
  if (context !== undefined && Object.keys(context).length > 0) {
    parts.push(JSON.stringify(context));
  }
  return parts.join(" ");
}

const consoleSink: LogSink = (level, entry) => {
  console[level](entry);
};

function fileSink(logDir: string, logFile: string): LogSink {
  mkdirSync(logDir, { recursive: true });
  const target = join(logDir, logFile);
  return (_level, entry) => {
    try {
      appendFileSync(target, `${entry}\n`);
    } catch (err) {
      console.error(`Cannot append to log file "${target}": ${err instanceof Error ? err.message : String(err)}`);
    }
  };
}

function resolveOptions(options: LoggerOptions): ResolvedOptions {
  return {
    level: options.level ?? "info",
    name: options.name ?? "main",
    logDir: options.logDir ?? "output/logs",
    logFile: options.logFile ?? "course-config.log",
    console: options.console ?? true,
    file: options.file ?? false,
    sinks: options.sinks ?? [],
  };
}

function buildLogger(opts: ResolvedOptions, sinks: LogSink[]): Logger {
  const write = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[opts.level] || sinks.length === 0) {
      return;
    }
    const entry = formatLogEntry(level, opts.name, message, context);
    for (const sink of sinks) {
      sink(level, entry);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    child: (suffix) => buildLogger({ ...opts, name: `${opts.name}.${suffix}` }, sinks),
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const opts = resolveOptions(options);
  const sinks: LogSink[] = [...opts.sinks];
  if (opts.console) {
    sinks.push(consoleSink);
  }
  if (opts.file) {
    sinks.push(fileSink(opts.logDir, opts.logFile));
  }
  return buildLogger(opts, sinks);
}

/** Drops every entry; used when a caller passes no logger. */
export const silentLogger: Logger = createLogger({ console: false });
