import { describe, expect, it } from "vitest";

import { formatAnalysisReport, formatExtractionProgress } from "@/interfaces/cli/report";

const RULE = "=".repeat(100);
const TITLE = `${" ".repeat(43)}BOOKS ANALYSIS`;

describe("formatAnalysisReport", () => {
  it("summarises prices and ratings", () => {
    const lines = formatAnalysisReport({
      totalBooks: 3,
      pricedBooks: 3,
      averagePrice: 20,
      cheapest: { title: "Alpha", amount: 10 },
      mostExpensive: { title: "Bravo", amount: 30 },
      ratingCounts: { 1: 0, 2: 0, 3: 2, 4: 0, 5: 1 }
    });

    expect(lines).toEqual([
      RULE,
      TITLE,
      RULE,
      "OVERVIEW",
      "--------",
      "Total number of books: 3",
      "Average price: £20.00",
      "Price range: £10.00 - £30.00",
      "The most expensive book: 'Bravo': £30.00",
      "The cheapest book: 'Alpha': £10.00",
      "",
      "RATINGS",
      "-------",
      "★★★★★ 1",
      "★★★★☆ 0",
      "★★★☆☆ 2",
      "★★☆☆☆ 0",
      "★☆☆☆☆ 0"
    ]);
  });

  it("omits price figures when no book had a price", () => {
    const lines = formatAnalysisReport({
      totalBooks: 1,
      pricedBooks: 0,
      averagePrice: null,
      cheapest: null,
      mostExpensive: null,
      ratingCounts: { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 }
    });

    expect(lines.slice(5, 7)).toEqual(["Total number of books: 1", "No prices available."]);
  });

  it("says so when nothing was scraped", () => {
    expect(
      formatAnalysisReport({
        totalBooks: 0,
        pricedBooks: 0,
        averagePrice: null,
        cheapest: null,
        mostExpensive: null,
        ratingCounts: { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 }
      })
    ).toEqual(["No books were scraped."]);
  });
});

describe("formatExtractionProgress", () => {
  it("cycles the spinner frame with the book number", () => {
    expect([1, 2, 3, 4, 5].map(formatExtractionProgress)).toEqual([
      "[|] Extracting book 1",
      "[/] Extracting book 2",
      "[―] Extracting book 3",
      "[\\] Extracting book 4",
      "[|] Extracting book 5"
    ]);
  });
});
