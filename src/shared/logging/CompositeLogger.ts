import type { Logger } from "@/shared/logging/Logger";

export class CompositeLogger implements Logger {
  private readonly loggers: readonly Logger[];

  constructor(...loggers: Logger[]) {
    this.loggers = loggers;
  }

  debug(message: string): void {
    for (const logger of this.loggers) logger.debug(message);
  }

  info(message: string): void {
    for (const logger of this.loggers) logger.info(message);
  }

  warn(message: string): void {
    for (const logger of this.loggers) logger.warn(message);
  }

  error(message: string, error?: unknown): void {
    for (const logger of this.loggers) logger.error(message, error);
  }
}
