/**
 * Structured logging for store and collection events
 *
 * Line format:
 *   [timestamp] [LEVEL] [event] kind@prefix op 0xstorageKey message {details}
 * with every part after the event omitted when absent.
 */

import type { StorageOp } from "../types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  /** Container kind, e.g. "lookup_map" */
  kind?: string;
  /** Container prefix (hex) */
  prefix?: string;
  /** Storage call the event concerns */
  op?: StorageOp;
  /** Storage key (hex) the event concerns */
  storageKey?: string;
  message?: string;
  details?: Record<string, unknown>;
}

class Logger {
  #enabled = true;

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    // Format for console output
    const prefix = `[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`;
    const parts = [prefix];

    if (entry.kind || entry.prefix) {
      parts.push(`${entry.kind ?? ""}@${entry.prefix ?? ""}`);
    }

    if (entry.op) {
      parts.push(entry.op);
    }

    if (entry.storageKey !== undefined) {
      parts.push(`0x${entry.storageKey}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    switch (level) {
      case "debug":
        if (process.env.LAZYKV_DEBUG) {
          console.debug(parts.join(" "));
        }
        break;
      case "info":
        console.log(parts.join(" "));
        break;
      case "warn":
        console.warn(parts.join(" "));
        break;
      case "error":
        console.error(parts.join(" "));
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
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
