import { load } from "cheerio";

import type { BookExtractor } from "@/application/services/types";
import type { BookRecord } from "@/domain/entities/Book";

import { CATALOGUE_SELECTORS } from "@/domain/constants/CatalogueSelectors";
import { normalizePrice } from "@/domain/services/PriceService";
import { parseRatingClass } from "@/domain/services/RatingService";

const cleanText = (text: string | undefined): string => (text ?? "").replace(/\s+/g, " ").trim();

export class CatalogueExtractor implements BookExtractor {
  extract(html: string): BookRecord[] {
    const $ = load(html);
    const books: BookRecord[] = [];

    $(CATALOGUE_SELECTORS.book).each((_, element) => {
      const $book = $(element);

      const title =
        cleanText($book.find(CATALOGUE_SELECTORS.titleLink).first().attr("title")) ||
        cleanText($book.find(CATALOGUE_SELECTORS.cover).first().attr("alt"));

      books.push({
        title,
        price: normalizePrice($book.find(CATALOGUE_SELECTORS.price).first().text()),
        availability: cleanText($book.find(CATALOGUE_SELECTORS.availability).first().text()),
        rating: parseRatingClass($book.find(CATALOGUE_SELECTORS.rating).first().attr("class"))
      });
    });

    return books;
  }
}
