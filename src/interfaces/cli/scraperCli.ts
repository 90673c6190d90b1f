import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import type { PageHttpClient } from "@/infrastructure/http/PageHttpClient";
import type { RuntimeConfig } from "@/shared/config/Config";
import type { Clock } from "@/shared/time/Clock";

import { ScrapeCatalogueUseCase } from "@/application/usecases/ScrapeCatalogueUseCase";
import { ValidationError } from "@/domain/errors/AppError";
import { FileCsvExporter } from "@/infrastructure/export/CsvExporter";
import { CataloguePageFetcher } from "@/infrastructure/http/CataloguePageFetcher";
import { AxiosPageHttpClient } from "@/infrastructure/http/PageHttpClient";
import { CatalogueExtractor } from "@/infrastructure/scraping/CatalogueExtractor";
import { formatAnalysisReport, formatExtractionProgress } from "@/interfaces/cli/report";
import { EnvConfig } from "@/shared/config/EnvConfig";
import { CompositeLogger } from "@/shared/logging/CompositeLogger";
import { ConsoleLogger } from "@/shared/logging/ConsoleLogger";
import { FileLogger } from "@/shared/logging/FileLogger";
import { SystemClock } from "@/shared/time/Clock";

export interface CliOptions {
  readonly csv: string;
  readonly log: string;
  readonly pages: number;
  readonly append: boolean;
}

export interface CliDependencies {
  createConfig: () => RuntimeConfig;
  createHttpClient: (config: RuntimeConfig) => PageHttpClient;
  clock: Clock;
  wait?: (ms: number) => Promise<void>;
  showProgress: (line: string) => void;
}

const defaultDependencies: CliDependencies = {
  createConfig: () => new EnvConfig(),
  createHttpClient: (config) => new AxiosPageHttpClient(config.http),
  clock: new SystemClock(),
  showProgress: (line) => {
    if (process.stdout.isTTY) process.stdout.write(`${line}\r`);
  }
};

const buildParser = (args: string[]) =>
  yargs(args)
    .scriptName("book-scraper")
    .usage("$0 [options]\n\nScrapes the book catalogue into a CSV file.")
    .option("csv", {
      alias: "c",
      type: "string",
      description: "Output CSV file (must end in .csv)",
      default: "books.csv",
      requiresArg: true
    })
    .option("log", {
      alias: "l",
      type: "string",
      description: "Log file (must end in .log)",
      default: "books_scraper_errors.log",
      requiresArg: true
    })
    .option("pages", {
      alias: "n",
      type: "string",
      description: "Number of catalogue pages to scrape",
      default: "5",
      requiresArg: true
    })
    .option("append", {
      alias: "a",
      type: "boolean",
      description: "Append to an existing CSV instead of overwriting it",
      default: false
    })
    .parserConfiguration({ "duplicate-arguments-array": false })
    .help(false)
    .version(false)
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      const reason = message || (error instanceof Error ? error.message : "Invalid arguments");
      throw new ValidationError(reason, "argv", undefined, error);
    })
    .wrap(null);

export interface RawCliOptions {
  csv: unknown;
  log: unknown;
  pages: unknown;
  append: unknown;
}

const PAGE_COUNT_PATTERN = /^\d+$/;

const readPageCount = (value: unknown): number => {
  if (typeof value === "number") return value;
  if (typeof value === "string" && PAGE_COUNT_PATTERN.test(value.trim())) return Number(value.trim());
  return Number.NaN;
};

export function validateCliOptions(raw: RawCliOptions): CliOptions {
  if (typeof raw.csv !== "string" || !raw.csv.endsWith(".csv")) {
    throw new ValidationError(`Invalid CSV file name: ${String(raw.csv)}`, "csv", raw.csv);
  }
  if (typeof raw.log !== "string" || !raw.log.endsWith(".log")) {
    throw new ValidationError(`Invalid log file name: ${String(raw.log)}`, "log", raw.log);
  }
  const pages = readPageCount(raw.pages);
  if (!Number.isInteger(pages) || pages < 0) {
    throw new ValidationError(`Invalid pages: ${JSON.stringify(raw.pages)}`, "pages", raw.pages);
  }
  return { csv: raw.csv, log: raw.log, pages, append: raw.append === true };
}

/**
 * Returns null when help was requested (and printed).
 * @throws {ValidationError} on unknown flags or invalid values
 */
export async function parseCliArguments(argv: string[]): Promise<CliOptions | null> {
  const args = hideBin(argv);
  const parser = buildParser(args);

  if (args.includes("--help") || args.includes("-h")) {
    parser.showHelp("log");
    return null;
  }

  const parsed = await parser.parseAsync();
  return validateCliOptions({
    csv: parsed.csv,
    log: parsed.log,
    pages: parsed.pages,
    append: parsed.append
  });
}

export async function runCli(argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const terminal = new ConsoleLogger("BookScraper", "info");

  let resolved: { options: CliOptions; config: RuntimeConfig } | null;
  try {
    const parsed = await parseCliArguments(argv);
    resolved = parsed === null ? null : { options: parsed, config: deps.createConfig() };
  } catch (error) {
    if (error instanceof ValidationError) {
      terminal.error("Invalid input", error);
      console.error("Usage: book-scraper [-c books.csv] [-l books_scraper_errors.log] [-n 5] [--append]");
      return 1;
    }
    throw error;
  }
  if (resolved === null) return 0;

  const { options, config } = resolved;
  const fileLogger = new FileLogger(options.log, config.catalogue.jobName, config.logging.level, deps.clock);
  const logger = new CompositeLogger(fileLogger, new ConsoleLogger(config.catalogue.jobName, "warn"));

  const useCase = new ScrapeCatalogueUseCase({
    pageSource: new CataloguePageFetcher(deps.createHttpClient(config), config.catalogue.baseUri),
    extractor: new CatalogueExtractor(),
    csvExporter: new FileCsvExporter(options.csv, options.append ? "append" : "overwrite"),
    logger,
    requestDelayMs: config.catalogue.requestDelayMs,
    wait: deps.wait,
    onPageStart: (_, url) => console.log(`Scraping page ${url}`),
    onBookWritten: (bookNumber) => deps.showProgress(formatExtractionProgress(bookNumber))
  });

  const start = deps.clock.now();
  console.log("Starting the scraper...");

  try {
    const summary = await useCase.execute({ pages: options.pages });

    console.log(`Saved ${summary.booksWritten} books to ${options.csv}`);
    console.log(`Scraping completed! Total books: ${summary.booksWritten}`);
    console.log();
    for (const line of formatAnalysisReport(summary.statistics)) {
      console.log(line);
    }
  } catch (error) {
    logger.error("Book scraping process failed", error);
    return 1;
  }

  const elapsedSeconds = (deps.clock.now().getTime() - start.getTime()) / 1000;
  console.log(`Process lasted ${elapsedSeconds.toFixed(2)} seconds`);
  return 0;
}
