import type { Rating } from "@/domain/entities/Book";
import type { StatisticsSnapshot } from "@/domain/entities/CatalogueStatistics";

import { formatPounds } from "@/domain/services/PriceService";
import { toStars } from "@/domain/services/RatingService";

const REPORT_WIDTH = 100;

const RATINGS: readonly Rating[] = [5, 4, 3, 2, 1];

const SPINNER_FRAMES = ["|", "/", "―", "\\"] as const;

const center = (text: string, width: number): string =>
  " ".repeat(Math.max(0, Math.floor((width - text.length) / 2))) + text;

export function formatAnalysisReport(stats: StatisticsSnapshot): string[] {
  if (stats.totalBooks === 0) {
    return ["No books were scraped."];
  }

  const rule = "=".repeat(REPORT_WIDTH);
  const lines = [rule, center("BOOKS ANALYSIS", REPORT_WIDTH), rule, "OVERVIEW", "--------"];
  lines.push(`Total number of books: ${stats.totalBooks}`);

  const { averagePrice, cheapest, mostExpensive } = stats;
  if (averagePrice === null || cheapest === null || mostExpensive === null) {
    lines.push("No prices available.");
  } else {
    lines.push(`Average price: ${formatPounds(averagePrice)}`);
    lines.push(`Price range: ${formatPounds(cheapest.amount)} - ${formatPounds(mostExpensive.amount)}`);
    lines.push(`The most expensive book: '${mostExpensive.title}': ${formatPounds(mostExpensive.amount)}`);
    lines.push(`The cheapest book: '${cheapest.title}': ${formatPounds(cheapest.amount)}`);
  }

  lines.push("", "RATINGS", "-------");
  for (const rating of RATINGS) {
    lines.push(`${toStars(rating)} ${stats.ratingCounts[rating]}`);
  }
  return lines;
}

export function formatExtractionProgress(bookNumber: number): string {
  const frame = SPINNER_FRAMES[(bookNumber - 1) % SPINNER_FRAMES.length];
  return `[${frame}] Extracting book ${bookNumber}`;
}
