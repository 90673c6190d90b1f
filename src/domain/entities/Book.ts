export type Rating = 1 | 2 | 3 | 4 | 5;

export interface BookRecord {
  readonly title: string;
  readonly price: string;
  readonly availability: string;
  readonly rating: Rating | null;
}

export type StopReason = "page-limit" | "fetch-failed" | "empty-page";
