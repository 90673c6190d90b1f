import { setTimeout as delay } from "node:timers/promises";

import type { BookExtractor, CataloguePageSource } from "@/application/services/types";
import type { BookRecord, StopReason } from "@/domain/entities/Book";
import type { StatisticsSnapshot } from "@/domain/entities/CatalogueStatistics";
import type { CsvExporter } from "@/domain/repositories/BookRepository";
import type { Logger } from "@/shared/logging/Logger";

import { CatalogueStatistics } from "@/domain/entities/CatalogueStatistics";
import { PageFetchError } from "@/domain/errors/AppError";

export interface ScrapeOptions {
  pages: number;
}

export interface ScrapeSummary {
  pagesRequested: number;
  pagesScraped: number;
  booksWritten: number;
  stopReason: StopReason;
  statistics: StatisticsSnapshot;
}

export interface ScrapeCatalogueDependencies {
  pageSource: CataloguePageSource;
  extractor: BookExtractor;
  csvExporter: CsvExporter;
  logger: Logger;
  requestDelayMs?: number;
  wait?: (ms: number) => Promise<void>;
  onPageStart?: (pageNumber: number, url: string) => void;
  /** Called once per written book with its running number across the run. */
  onBookWritten?: (bookNumber: number, book: BookRecord) => void;
}

export class ScrapeCatalogueUseCase {
  constructor(private readonly deps: ScrapeCatalogueDependencies) {}

  async execute(options: ScrapeOptions): Promise<ScrapeSummary> {
    const { pageSource, extractor, csvExporter, logger } = this.deps;
    const requestDelayMs = this.deps.requestDelayMs ?? 0;
    const wait = this.deps.wait ?? ((ms: number) => delay(ms));

    logger.info(`Book scraping process started: pages=${options.pages}`);
    await csvExporter.prepare();

    const statistics = new CatalogueStatistics();
    let pagesScraped = 0;
    let booksWritten = 0;
    let stopReason: StopReason = "page-limit";

    for (let pageNumber = 1; pageNumber <= options.pages; pageNumber++) {
      const url = pageSource.buildPageUrl(pageNumber);
      this.deps.onPageStart?.(pageNumber, url);

      let html: string;
      try {
        html = await pageSource.fetchPage(pageNumber);
      } catch (error) {
        if (!(error instanceof PageFetchError)) throw error;

        if (error.isNetworkError) {
          logger.error(`Page ${pageNumber} could not be fetched; stopping`, error);
        } else {
          logger.warn(`${error.message}; treating page ${pageNumber} as the end of the catalogue`);
        }
        stopReason = "fetch-failed";
        break;
      }
      logger.info(`Page fetched: ${url}`);

      const books = extractor.extract(html);
      if (books.length === 0) {
        logger.warn(`No books found on page ${pageNumber}; treating it as the end of the catalogue`);
        stopReason = "empty-page";
        break;
      }

      await csvExporter.append(books);
      statistics.record(books);
      pagesScraped += 1;
      for (const book of books) {
        booksWritten += 1;
        this.deps.onBookWritten?.(booksWritten, book);
      }
      logger.info(`${books.length} books written from page ${pageNumber}`);

      if (requestDelayMs > 0 && pageNumber < options.pages) {
        await wait(requestDelayMs);
      }
    }

    logger.info(`Book scraping process completed: pages=${pagesScraped}, books=${booksWritten}, stop=${stopReason}`);

    return {
      pagesRequested: options.pages,
      pagesScraped,
      booksWritten,
      stopReason,
      statistics: statistics.snapshot()
    };
  }
}
