import { appendFileSync, mkdirSync } from "node:fs";
import { resolve } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

const envLevel = process.env.RESEARCH_LOG_LEVEL?.toLowerCase() ?? "";
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "warn";

/** Optional file logging directory. Set RESEARCH_LOG_DIR to enable. */
let logDir: string | undefined = process.env.RESEARCH_LOG_DIR || undefined;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function setLogDir(dir: string | undefined): void {
  logDir = dir;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatMessage(
  level: LogLevel,
  component: string,
  message: string,
  data?: Record<string, unknown>
): string {
  const ts = new Date().toISOString();
  const base = `${ts} [${level.toUpperCase().padEnd(5)}] [${component}] ${message}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

function writeToFile(component: string, formatted: string): void {
  if (!logDir) return;
  try {
    mkdirSync(logDir, { recursive: true });
    appendFileSync(resolve(logDir, `${component}.log`), formatted + "\n");
  } catch (err) {
    // One failed write turns file logging off for the rest of the process
    console.error(`File logging disabled (${logDir}): ${String(err)}`);
    logDir = undefined;
  }
}

export type Logger = Record<
  LogLevel,
  (message: string, data?: Record<string, unknown>) => void
>;

/**
 * Component logger. Everything goes to stderr so stdout only carries
 * reports and prompts.
 */
export function createLogger(component: string): Logger {
  const emit = (
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ) => {
    if (!shouldLog(level)) return;
    const fmt = formatMessage(level, component, message, data);
    console.error(fmt);
    writeToFile(component, fmt);
  };

  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
  };
}
