import { appendFile, mkdir, open, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import { unparse } from "papaparse";

import type { BookRecord } from "@/domain/entities/Book";
import type { CsvExporter as CsvExporterPort } from "@/domain/repositories/BookRepository";

import { CSV_EXPORT_COLUMNS } from "@/domain/constants/CsvColumns";

export type CsvWriteMode = "overwrite" | "append";

const NEWLINE = "\n";

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Writes the header once per file and one row per book.
 * In "overwrite" mode `prepare()` truncates the file; in "append" mode it keeps
 * earlier rows, adds the header only to a missing or empty file and ends an
 * unterminated last row before new rows follow.
 */
export class FileCsvExporter implements CsvExporterPort {
  constructor(
    private readonly filePath: string,
    private readonly mode: CsvWriteMode = "overwrite"
  ) {}

  async prepare(): Promise<void> {
    const dir = path.dirname(this.filePath);
    if (dir && dir !== ".") {
      await mkdir(dir, { recursive: true });
    }

    if (this.mode === "append") {
      const size = await this.currentSize();
      if (size > 0) {
        if (!(await this.endsWithNewline(size))) {
          await appendFile(this.filePath, NEWLINE, "utf-8");
        }
        return;
      }
    }

    const header = unparse({ fields: [...CSV_EXPORT_COLUMNS], data: [] }, { newline: NEWLINE });
    await writeFile(this.filePath, header + NEWLINE, "utf-8");
  }

  async append(books: readonly BookRecord[]): Promise<void> {
    if (books.length === 0) return;

    const rows = books.map((book) => this.mapBookToRow(book));
    const csv = unparse(rows, { header: false, newline: NEWLINE, columns: [...CSV_EXPORT_COLUMNS] });
    await appendFile(this.filePath, csv + NEWLINE, "utf-8");
  }

  private mapBookToRow(book: BookRecord): Record<string, string> {
    return {
      title: book.title,
      price: book.price,
      availability: book.availability,
      rating: book.rating === null ? "" : String(book.rating)
    };
  }

  private async currentSize(): Promise<number> {
    try {
      const info = await stat(this.filePath);
      return info.size;
    } catch (error) {
      if (isMissingFileError(error)) return 0;
      throw error;
    }
  }

  private async endsWithNewline(size: number): Promise<boolean> {
    const handle = await open(this.filePath, "r");
    try {
      const lastByte = Buffer.alloc(1);
      await handle.read(lastByte, 0, 1, size - 1);
      return lastByte.toString("utf-8") === NEWLINE;
    } finally {
      await handle.close();
    }
  }
}
