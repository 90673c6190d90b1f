export const CATALOGUE_SELECTORS = {
  book: "article.product_pod",
  titleLink: "h3 a",
  cover: "img",
  price: "p.price_color",
  availability: "p.instock.availability",
  rating: "p.star-rating"
} as const;

export const RATING_WORDS = {
  One: 1,
  Two: 2,
  Three: 3,
  Four: 4,
  Five: 5
} as const;
