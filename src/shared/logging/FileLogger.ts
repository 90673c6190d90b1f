import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";

import type { Logger, LogLevel } from "@/shared/logging/Logger";
import type { Clock } from "@/shared/time/Clock";

import { describeError, enabledLevelsFrom } from "@/shared/logging/Logger";
import { SystemClock } from "@/shared/time/Clock";

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Formats as `DD.MM.YYYY HH.MM.SS` in local time.
 */
export const formatLogTimestamp = (date: Date): string =>
  `${pad(date.getDate())}.${pad(date.getMonth() + 1)}.${date.getFullYear()} ` +
  `${pad(date.getHours())}.${pad(date.getMinutes())}.${pad(date.getSeconds())}`;

/**
 * Appends one line per entry to a log file:
 * `18.10.2026 09.05.03 - BookScraper - INFO - message`
 */
export class FileLogger implements Logger {
  private readonly enabledLevels: Set<LogLevel>;
  private directoryReady = false;

  constructor(
    private readonly filePath: string,
    private readonly name: string = "BookScraper",
    level: LogLevel = "debug",
    private readonly clock: Clock = new SystemClock()
  ) {
    this.enabledLevels = enabledLevelsFrom(level);
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string, error?: unknown): void {
    this.write("error", describeError(message, error));
  }

  private write(level: LogLevel, message: string): void {
    if (!this.enabledLevels.has(level)) return;

    if (!this.directoryReady) {
      const dir = path.dirname(this.filePath);
      if (dir && dir !== ".") {
        mkdirSync(dir, { recursive: true });
      }
      this.directoryReady = true;
    }

    const line = `${formatLogTimestamp(this.clock.now())} - ${this.name} - ${level.toUpperCase()} - ${message}\n`;
    appendFileSync(this.filePath, line, "utf-8");
  }
}
