/**
 * Structured logging for indexers and reindex runs
 *
 * Each entry prints as one line: timestamp, level and event, then the
 * indexing context as `key=value` pairs. Debug lines print only when
 * SEARCHMAP_DEBUG is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Indexing context attached to an entry
 */
export interface LogContext {
  /** Indexer type tag */
  type?: string;
  /** Indexer definition name */
  indexer?: string;
  field?: string;
  documents?: number;
  skipped?: number;
  chunks?: number;
  chunkSize?: number;
  /** Reindex state change, `from -> to` */
  transition?: string;
  startedAt?: Date;
  durationMs?: number;
  message?: string;
}

export interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  event: string;
}

const CONTEXT_KEYS = [
  "type",
  "indexer",
  "field",
  "documents",
  "skipped",
  "chunks",
  "chunkSize",
  "transition",
] as const;

/**
 * Render an entry as a single log line
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  for (const key of CONTEXT_KEYS) {
    const value = entry[key];
    if (value !== undefined) {
      parts.push(`${key}=${value}`);
    }
  }
  if (entry.startedAt) {
    parts.push(`startedAt=${entry.startedAt.toISOString()}`);
  }
  if (entry.durationMs !== undefined) {
    parts.push(`duration=${Math.round(entry.durationMs)}ms`);
  }
  if (entry.message) {
    parts.push(entry.message);
  }

  return parts.join(" ");
}

class Logger {
  #enabled = true;

  log(level: LogLevel, event: string, context: LogContext = {}): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.SEARCHMAP_DEBUG) return;

    const line = formatLogEntry({ timestamp: new Date().toISOString(), level, event, ...context });

    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  debug(event: string, context?: LogContext): void {
    this.log("debug", event, context);
  }

  info(event: string, context?: LogContext): void {
    this.log("info", event, context);
  }

  warn(event: string, context?: LogContext): void {
    this.log("warn", event, context);
  }

  error(event: string, context?: LogContext): void {
    this.log("error", event, context);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
