import type { Rating } from "@/domain/entities/Book";

import { RATING_WORDS } from "@/domain/constants/CatalogueSelectors";

const isRatingWord = (word: string): word is keyof typeof RATING_WORDS => Object.hasOwn(RATING_WORDS, word);

/**
 * Decodes the class list of a star-rating element.
 * @example
 * parseRatingClass("star-rating Three") // 3
 * parseRatingClass("star-rating") // null
 */
export const parseRatingClass = (classList: string | undefined): Rating | null => {
  if (!classList) return null;

  for (const token of classList.split(/\s+/)) {
    if (isRatingWord(token)) {
      return RATING_WORDS[token];
    }
  }
  return null;
};

export const toStars = (rating: Rating): string => "★".repeat(rating) + "☆".repeat(5 - rating);
