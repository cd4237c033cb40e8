// ─────────────────────────────────────────────────────────────
// Logger — Tagged console logging, injected into each component
// ─────────────────────────────────────────────────────────────

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Same sink and threshold, different tag */
  child(tag: string): Logger;
}

export interface LogEntry {
  level: LogLevel;
  tag: string;
  message: string;
}

const SYMBOLS: Record<LogLevel, string> = {
  debug: "",
  info: "",
  warn: "⚠ ",
  error: "✗ ",
};

/**
 * Console logger writing `[TAG] message` lines to stderr at every
 * level; stdout carries only command output (CSV).
 */
export function createConsoleLogger(tag: string, level: LogLevel = "info"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const emit = (entryLevel: LogLevel, message: string) => {
    if (LOG_LEVELS.indexOf(entryLevel) < threshold) return;
    console.error(`[${tag}] ${SYMBOLS[entryLevel]}${message}`);
  };

  return {
    debug: (m) => emit("debug", m),
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
    child: (childTag) => createConsoleLogger(childTag, level),
  };
}

/** Logger that records entries in memory (tests, dry runs) */
export interface MemoryLogger extends Logger {
  readonly entries: LogEntry[];
}

export function createMemoryLogger(tag = "TEST", entries: LogEntry[] = []): MemoryLogger {
  const record = (level: LogLevel) => (message: string) => {
    entries.push({ level, tag, message });
  };
  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    child: (childTag) => createMemoryLogger(childTag, entries),
  };
}
