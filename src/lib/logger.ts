import * as path from "node:path";
import pino from "pino";
import { PATHS } from "../config";
import { type LogLevel, LOG_LEVELS, loadUserConfig } from "./config/user-config";

export interface LoggerOptions {
  level?: LogLevel;
  /** Log file; ignored for the "silent" level */
  file?: string;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function defaultLogFile(now = new Date()): string {
  const stamp = [
    now.getFullYear(),
    String(now.getMonth() + 1).padStart(2, "0"),
    String(now.getDate()).padStart(2, "0"),
  ].join("");
  return path.join(PATHS.logs, `docmd-${stamp}.log`);
}

/**
 * Resolve level and destination: environment first, then the user config.
 * A broken config file must not stop logging, so it falls back to defaults here
 * and is reported by the command that loads it.
 */
function resolveOptions(): Required<LoggerOptions> {
  let logging: { level?: LogLevel; file?: string } = {};
  try {
    logging = loadUserConfig().logging ?? {};
  } catch {
    logging = {};
  }
  const envLevel = process.env.DOCMD_LOG_LEVEL;
  return {
    level: isLogLevel(envLevel) ? envLevel : (logging.level ?? "info"),
    file: process.env.DOCMD_LOG_FILE || logging.file || defaultLogFile(),
  };
}

/**
 * Build a pino logger writing JSON lines to a file, so terminal output stays
 * reserved for the CLI.
 */
export function createBaseLogger(options: LoggerOptions = {}): pino.Logger {
  const resolved = { ...resolveOptions(), ...options };
  const config: pino.LoggerOptions = {
    name: "docmd",
    level: resolved.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (resolved.level === "silent") {
    return pino(config);
  }

  return pino(
    config,
    pino.destination({ dest: resolved.file, mkdir: true, sync: true }),
  );
}

let baseLogger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!baseLogger) {
    baseLogger = createBaseLogger();
  }
  return baseLogger;
}

/**
 * Child logger tagged with the component that owns it.
 */
export function createLogger(component: string): pino.Logger {
  return getLogger().child({ component });
}

export function getLogFilePath(): string {
  return resolveOptions().file;
}

export type { Logger } from "pino";
