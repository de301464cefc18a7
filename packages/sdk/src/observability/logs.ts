/**
 * Debug tracing for store operations
 *
 * FLATPAGES_DEBUG selects events by prefix, comma separated:
 * "1" or "*" traces everything, "backend,store.put" traces every
 * backend.* event plus store.put.
 */

export interface LogEntry {
  timestamp: string;
  event: string;
  key?: string;
  path?: string;
  details?: Record<string, unknown>;
}

export type LogSink = (line: string) => void;

/**
 * Render a trace entry as a single line
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [flatpages:${entry.event}]`];

  if (entry.key !== undefined) {
    parts.push(`key=${JSON.stringify(entry.key)}`);
  }

  if (entry.path) {
    parts.push(entry.path);
  }

  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

/**
 * Check an event name against a FLATPAGES_DEBUG value
 */
export function matchesDebugPattern(event: string, pattern: string | undefined): boolean {
  if (!pattern) {
    return false;
  }

  return pattern
    .split(",")
    .map((part) => part.trim())
    .some(
      (part) =>
        part === "1" ||
        part === "*" ||
        part === event ||
        (part !== "" && event.startsWith(`${part}.`))
    );
}

const consoleSink: LogSink = (line) => console.debug(line);

class Logger {
  #enabled = true;
  #sink: LogSink = consoleSink;

  /**
   * Whether an event would be written right now
   */
  isTracing(event: string): boolean {
    return this.#enabled && matchesDebugPattern(event, process.env.FLATPAGES_DEBUG);
  }

  debug(event: string, data?: Omit<LogEntry, "timestamp" | "event">): void {
    if (!this.isTracing(event)) return;

    this.#sink(formatLogEntry({ timestamp: new Date().toISOString(), event, ...data }));
  }

  /**
   * Enable/disable tracing regardless of FLATPAGES_DEBUG
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  /**
   * Redirect trace lines; no argument restores console.debug
   */
  setSink(sink: LogSink = consoleSink): void {
    this.#sink = sink;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
