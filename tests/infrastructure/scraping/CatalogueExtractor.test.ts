import { readFileSync } from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { CatalogueExtractor } from "@/infrastructure/scraping/CatalogueExtractor";

const fixture = readFileSync(path.join(__dirname, "../../fixtures/catalogue-page.html"), "utf-8");

describe("CatalogueExtractor", () => {
  const extractor = new CatalogueExtractor();

  it("extracts every book on the page in document order", () => {
    expect(extractor.extract(fixture)).toEqual([
      { title: "The Lighthouse Keeper's Ledger", price: "23.45", availability: "In stock", rating: 3 },
      { title: "Salt, Smoke & Cedar", price: "51.77", availability: "In stock", rating: 5 },
      { title: "Quiet Hours", price: "9.99", availability: "In stock (4 available)", rating: 1 }
    ]);
  });

  it("falls back to the cover alt text when the title link has no title attribute", () => {
    const html = `
      <article class="product_pod">
        <img src="cover.jpg" alt="Untitled Link Book">
        <h3><a href="book/index.html">Untitled ...</a></h3>
        <p class="price_color">£12.00</p>
      </article>`;

    expect(extractor.extract(html)).toEqual([
      { title: "Untitled Link Book", price: "12.00", availability: "", rating: null }
    ]);
  });

  it("leaves missing or unrecognised fields empty", () => {
    const html = `
      <article class="product_pod">
        <p class="star-rating Zero"></p>
        <p class="price_color">free</p>
      </article>`;

    expect(extractor.extract(html)).toEqual([{ title: "", price: "", availability: "", rating: null }]);
  });

  it("returns an empty list for a page without books", () => {
    expect(extractor.extract("<html><body><p>Not found</p></body></html>")).toEqual([]);
  });

  it("only yields ratings between 1 and 5", () => {
    const ratings = extractor.extract(fixture).map((book) => book.rating);
    for (const rating of ratings) {
      expect(rating).not.toBeNull();
      expect(Number.isInteger(rating)).toBe(true);
      expect(rating).toBeGreaterThanOrEqual(1);
      expect(rating).toBeLessThanOrEqual(5);
    }
  });
});
