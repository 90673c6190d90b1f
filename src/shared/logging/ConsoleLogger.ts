import type { Logger, LogLevel } from "@/shared/logging/Logger";

import { describeError, enabledLevelsFrom } from "@/shared/logging/Logger";

export class ConsoleLogger implements Logger {
  private readonly enabledLevels: Set<LogLevel>;

  constructor(private readonly prefix: string = "BookScraper", level: LogLevel = "info") {
    this.enabledLevels = enabledLevelsFrom(level);
  }

  info(message: string): void {
    if (!this.enabledLevels.has("info")) return;
    console.log(`[INFO] [${this.prefix}] ${message}`);
  }

  warn(message: string): void {
    if (!this.enabledLevels.has("warn")) return;
    console.warn(`[WARN] [${this.prefix}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (!this.enabledLevels.has("error")) return;
    console.error(`[ERROR] [${this.prefix}] ${describeError(message, error)}`);
  }

  debug(message: string): void {
    if (!this.enabledLevels.has("debug")) return;
    console.debug(`[DEBUG] [${this.prefix}] ${message}`);
  }
}
