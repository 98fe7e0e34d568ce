/**
 * Console Logger
 *
 * Writes through `console`. Messages carry their own `[Component]` prefix.
 */

import type { Logger } from "../../core/ports/logger.port.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class ConsoleLogger implements Logger {
  constructor(private readonly minLevel: LogLevel = "info") {}

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) console.debug(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) console.log(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) console.warn(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error")) console.error(message, ...args);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel];
  }
}

export const consoleLogger: Logger = new ConsoleLogger();
