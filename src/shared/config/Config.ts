import type { LogLevel } from "@/shared/logging/Logger";

export interface CatalogueConfig {
  jobName: string;
  baseUri: string;
  requestDelayMs: number;
}

export interface HttpConfig {
  timeoutMs: number;
  userAgent: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface RuntimeConfig {
  catalogue: CatalogueConfig;
  http: HttpConfig;
  logging: LoggingConfig;
}
