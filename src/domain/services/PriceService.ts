const PRICE_PATTERN = /\d+(?:\.\d+)?/;

/**
 * Strips the currency symbol (and any mis-decoded prefix such as "Â£") from a price text.
 * Returns "" when the text carries no amount.
 */
export const normalizePrice = (text: string | undefined): string => {
  if (!text) return "";
  const match = text.replace(/,/g, "").match(PRICE_PATTERN);
  return match ? match[0] : "";
};

export const toAmount = (price: string): number | null => {
  if (price === "") return null;
  const amount = Number(price);
  return Number.isFinite(amount) ? amount : null;
};

export const formatPounds = (amount: number): string => `£${amount.toFixed(2)}`;
