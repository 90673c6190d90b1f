export const CSV_EXPORT_COLUMNS = ["title", "price", "availability", "rating"] as const;

