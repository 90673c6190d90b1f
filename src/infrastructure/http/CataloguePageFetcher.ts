import { isAxiosError } from "axios";

import type { CataloguePageSource } from "@/application/services/types";
import type { PageHttpClient, PageResponse } from "@/infrastructure/http/PageHttpClient";

import { PageFetchError } from "@/domain/errors/AppError";

const describeTransportFailure = (error: unknown): string => {
  if (isAxiosError(error) && error.code) return error.code;
  return error instanceof Error ? error.message : String(error);
};

export class CataloguePageFetcher implements CataloguePageSource {
  constructor(
    private readonly http: PageHttpClient,
    private readonly baseUri: string
  ) {}

  buildPageUrl(pageNumber: number): string {
    return `${this.baseUri}/page-${pageNumber}.html`;
  }

  /**
   * @throws {PageFetchError} on a network failure or any status other than 200
   */
  async fetchPage(pageNumber: number): Promise<string> {
    const url = this.buildPageUrl(pageNumber);

    let response: PageResponse;
    try {
      response = await this.http.getPage(url);
    } catch (error) {
      throw new PageFetchError(`Request error for ${url}: ${describeTransportFailure(error)}`, url, undefined, error);
    }

    if (response.status !== 200) {
      throw new PageFetchError(`Request failed with status ${response.status}: ${url}`, url, response.status);
    }

    return response.body;
  }
}
