import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event?(type: string, payload: Record<string, unknown>): void;
}

export interface LoggerSettings {
  level: LogLevel;
  /** Absolute or cwd-relative path of the JSON-lines log file; null disables it. */
  filePath: string | null;
}

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_WEIGHTS;
}

function settingsFromEnv(): LoggerSettings {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  const file = process.env.LOG_FILE;

  return {
    level: isLogLevel(level) ? level : "info",
    filePath: file === undefined ? "logs/app.log" : file || null,
  };
}

let settings: LoggerSettings = settingsFromEnv();

export function configureLogger(next: Partial<LoggerSettings>): void {
  settings = { ...settings, ...next };
}

function ensureLogDir(filePath: string): void {
  const dir = path.dirname(path.resolve(filePath));
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
  if (LEVEL_WEIGHTS[level] < LEVEL_WEIGHTS[settings.level]) {
    return;
  }

  const line = JSON.stringify(entry);

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }

  if (!settings.filePath) {
    return;
  }

  try {
    ensureLogDir(settings.filePath);
    fs.appendFileSync(settings.filePath, line + "\n", { encoding: "utf-8" });
  } catch (err) {
    console.error("Failed to write log file:", err);
  }
}

/**
 * JSON-lines logger.
 *
 * - log() records `{ timestamp, level, message, ...meta }`.
 * - event() records `{ timestamp, level: "info", type, ...payload }`; event
 *   types ending in `_FAILURE` are written at error level.
 */
export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    writeEntry(level, {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(meta || {}),
    });
  },

  event(type: string, payload: Record<string, unknown>): void {
    const level: LogLevel = type.endsWith("_FAILURE") ? "error" : "info";

    writeEntry(level, {
      timestamp: new Date().toISOString(),
      level,
      type,
      ...payload,
    });
  },
};

export function logEvent(type: string, payload: Record<string, unknown>): void {
  if (typeof logger.event === "function") {
    logger.event(type, payload);
    return;
  }

  logger.log("info", type, payload);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
