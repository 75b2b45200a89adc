/**
 * Structured logging for the comparison engine
 * Consistent `[component] action` format; the most recent entries are kept in memory
 */

import type { LogEntry, LogLevel } from "../../types/engine.types";

const DEFAULT_MAX_ENTRIES = 1000;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger instance for engine components
 */
export class EngineLogger {
  private entries: LogEntry[] = [];
  private minLevel: LogLevel;
  private readonly maxEntries: number;

  constructor(minLevel: LogLevel = "warn", maxEntries = DEFAULT_MAX_ENTRIES) {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
  }

  /**
   * Entries below this level are neither printed nor retained
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  info(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("info", component, action, metadata);
  }

  warn(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("warn", component, action, metadata);
  }

  error(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("error", component, action, metadata);
  }

  debug(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("debug", component, action, metadata);
  }

  /**
   * Log with duration
   */
  timed(
    level: LogLevel,
    component: string,
    action: string,
    startTime: number,
    metadata?: Record<string, unknown>
  ): void {
    const duration = Date.now() - startTime;
    this.log(level, component, action, { ...metadata, duration });
  }

  private log(
    level: LogLevel,
    component: string,
    action: string,
    metadata?: Record<string, unknown>
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: LogEntry = {
      ...metadata,
      timestamp: Date.now(),
      level,
      component,
      action,
    };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    const message = `[${component}] ${action}`;
    const logData = metadata ? { ...metadata } : {};

    switch (level) {
      case "info":
        console.log(message, logData);
        break;
      case "warn":
        console.warn(message, logData);
        break;
      case "error":
        console.error(message, logData);
        break;
      case "debug":
        console.debug(message, logData);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

// Export singleton instance
export const engineLogger = new EngineLogger();
