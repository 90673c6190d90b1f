import type { BookRecord, Rating } from "@/domain/entities/Book";

import { toAmount } from "@/domain/services/PriceService";

export type PricedBook = {
  title: string;
  amount: number;
};

export type StatisticsSnapshot = {
  totalBooks: number;
  pricedBooks: number;
  averagePrice: number | null;
  cheapest: PricedBook | null;
  mostExpensive: PricedBook | null;
  ratingCounts: Record<Rating, number>;
};

/**
 * Running aggregate over every record written during a run.
 * Keeps only the extremes, so pages can be discarded once written.
 */
export class CatalogueStatistics {
  private totalBooks = 0;
  private pricedBooks = 0;
  private priceSum = 0;
  private cheapest: PricedBook | null = null;
  private mostExpensive: PricedBook | null = null;
  private readonly ratingCounts: Record<Rating, number> = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };

  record(books: Iterable<BookRecord>): void {
    for (const book of books) {
      this.totalBooks += 1;
      if (book.rating !== null) {
        this.ratingCounts[book.rating] += 1;
      }

      const amount = toAmount(book.price);
      if (amount === null) continue;

      this.pricedBooks += 1;
      this.priceSum += amount;

      // first seen wins on ties
      if (this.cheapest === null || amount < this.cheapest.amount) {
        this.cheapest = { title: book.title, amount };
      }
      if (this.mostExpensive === null || amount > this.mostExpensive.amount) {
        this.mostExpensive = { title: book.title, amount };
      }
    }
  }

  snapshot(): StatisticsSnapshot {
    return {
      totalBooks: this.totalBooks,
      pricedBooks: this.pricedBooks,
      averagePrice: this.pricedBooks > 0 ? this.priceSum / this.pricedBooks : null,
      cheapest: this.cheapest,
      mostExpensive: this.mostExpensive,
      ratingCounts: { ...this.ratingCounts }
    };
  }
}
