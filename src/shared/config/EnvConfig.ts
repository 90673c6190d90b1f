import path from "node:path";

import { config as loadEnv } from "dotenv";

import type { CatalogueConfig, HttpConfig, LoggingConfig, RuntimeConfig } from "@/shared/config/Config";

import { ValidationError } from "@/domain/errors/AppError";
import { isLogLevel } from "@/shared/logging/Logger";

export const DEFAULT_BASE_URI = "http://books.toscrape.com/catalogue";
export const DEFAULT_REQUEST_DELAY_MS = 400;
export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = "book-catalogue-scraper/1.0";

const MAX_REQUEST_DELAY_MS = 5_000;

const readInteger = (env: NodeJS.ProcessEnv, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${key} must be an integer: ${raw}`, key, raw);
  }
  return value;
};

const definedEntries = (env: NodeJS.ProcessEnv): Record<string, string> => {
  const entries: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) entries[key] = value;
  }
  return entries;
};

export class EnvConfig implements RuntimeConfig {
  public readonly catalogue: CatalogueConfig;
  public readonly http: HttpConfig;
  public readonly logging: LoggingConfig;

  /**
   * Values in `environment` take precedence over the `.env` file, whose entries are read
   * into a private copy; `process.env` is left untouched.
   */
  constructor(envPath: string = path.join(__dirname, "../../../.env"), environment: NodeJS.ProcessEnv = process.env) {
    const fileValues: Record<string, string> = {};
    loadEnv({ path: envPath, processEnv: fileValues });
    const env: NodeJS.ProcessEnv = { ...fileValues, ...definedEntries(environment) };

    const requestDelayMs = readInteger(env, "REQUEST_DELAY_MS", DEFAULT_REQUEST_DELAY_MS);
    if (requestDelayMs < 0 || requestDelayMs >= MAX_REQUEST_DELAY_MS) {
      throw new ValidationError(
        `REQUEST_DELAY_MS must be between 0 and ${MAX_REQUEST_DELAY_MS - 1}: ${requestDelayMs}`,
        "REQUEST_DELAY_MS",
        requestDelayMs
      );
    }

    const timeoutMs = readInteger(env, "HTTP_TIMEOUT_MS", DEFAULT_HTTP_TIMEOUT_MS);
    if (timeoutMs <= 0) {
      throw new ValidationError(`HTTP_TIMEOUT_MS must be positive: ${timeoutMs}`, "HTTP_TIMEOUT_MS", timeoutMs);
    }

    const level = env.LOG_LEVEL?.trim().toLowerCase() || "debug";
    if (!isLogLevel(level)) {
      throw new ValidationError(`LOG_LEVEL must be one of debug, info, warn, error: ${level}`, "LOG_LEVEL", level);
    }

    const baseUri = env.CATALOGUE_BASE_URL?.trim() || DEFAULT_BASE_URI;

    this.catalogue = {
      jobName: "BookScraper",
      baseUri: baseUri.replace(/\/+$/, ""),
      requestDelayMs
    };

    this.http = {
      timeoutMs,
      userAgent: env.HTTP_USER_AGENT?.trim() || DEFAULT_USER_AGENT
    };

    this.logging = { level };
  }
}
