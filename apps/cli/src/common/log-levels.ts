import type { LogLevel } from "@nestjs/common";

// A run prints one warning per failed request at most; nothing below "warn" unless asked.
export const DEFAULT_LOG_LEVEL = "warn";

const LOG_LEVELS: Record<string, LogLevel[]> = {
  fatal: ["fatal"],
  error: ["fatal", "error"],
  warn: ["fatal", "error", "warn"],
  log: ["fatal", "error", "warn", "log"],
  info: ["fatal", "error", "warn", "log"],
  debug: ["fatal", "error", "warn", "log", "debug"],
  verbose: ["fatal", "error", "warn", "log", "debug", "verbose"],
};

export const LOG_LEVEL_NAMES = Object.keys(LOG_LEVELS);

export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const fallback = LOG_LEVELS[DEFAULT_LOG_LEVEL];
  if (!level) {
    return fallback;
  }
  const normalized = level.toLowerCase().trim();
  return LOG_LEVELS[normalized] ?? fallback;
}
