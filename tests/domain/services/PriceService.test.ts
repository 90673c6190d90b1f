import { describe, expect, it } from "vitest";

import { formatPounds, normalizePrice, toAmount } from "@/domain/services/PriceService";

describe("PriceService", () => {
  it("strips the currency symbol", () => {
    expect(normalizePrice("£51.77")).toBe("51.77");
    expect(normalizePrice("Â£51.77")).toBe("51.77");
    expect(normalizePrice("£1,250.00")).toBe("1250.00");
  });

  it("returns an empty string when there is no amount", () => {
    expect(normalizePrice(undefined)).toBe("");
    expect(normalizePrice("")).toBe("");
    expect(normalizePrice("Sold out")).toBe("");
  });

  it("converts a normalized price to a number", () => {
    expect(toAmount("23.45")).toBe(23.45);
    expect(toAmount("")).toBeNull();
  });

  it("formats pounds with two decimals", () => {
    expect(formatPounds(28.4)).toBe("£28.40");
  });
});
