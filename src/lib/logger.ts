// src/lib/logger.ts
// STDIO(MCP) と衝突しないよう、ログは常に stderr へ

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: "warn",
  err: "error",
  fatal: "error",
  trace: "debug",
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  const direct = LOG_LEVELS.find((l) => l === normalized);
  if (direct) return direct;
  return LOG_LEVEL_ALIASES[normalized] ?? fallback;
}

export interface Logger {
  error(msg: string, ...extra: unknown[]): void;
  warn(msg: string, ...extra: unknown[]): void;
  info(msg: string, ...extra: unknown[]): void;
  debug(msg: string, ...extra: unknown[]): void;
  child(scope: string): Logger;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL, "info");

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

const enabled = (level: LogLevel) =>
  LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(currentLevel);

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, msg: string, extra: unknown[]) => {
    if (!enabled(level)) return;
    const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} [${scope}] ${msg}`;
    console.error(line, ...extra);
  };
  return {
    error: (msg, ...extra) => write("error", msg, extra),
    warn: (msg, ...extra) => write("warn", msg, extra),
    info: (msg, ...extra) => write("info", msg, extra),
    debug: (msg, ...extra) => write("debug", msg, extra),
    child: (sub) => createLogger(`${scope}:${sub}`),
  };
}
