import type { BookRecord } from "@/domain/entities/Book";

export interface CsvExporter {
  prepare(): Promise<void>;
  append(books: readonly BookRecord[]): Promise<void>;
}
