import type { BookRecord } from "@/domain/entities/Book";

export interface CataloguePageSource {
  buildPageUrl(pageNumber: number): string;
  fetchPage(pageNumber: number): Promise<string>;
}

export interface BookExtractor {
  extract(html: string): BookRecord[];
}
