import axios from "axios";

import type { HttpConfig } from "@/shared/config/Config";
import type { AxiosInstance } from "axios";

/** Status and body of a page request. Any status resolves; only transport failures reject. */
export interface PageResponse {
  status: number;
  body: string;
}

export interface PageHttpClient {
  getPage(url: string): Promise<PageResponse>;
}

export class AxiosPageHttpClient implements PageHttpClient {
  private readonly client: AxiosInstance;

  constructor(config: HttpConfig) {
    this.client = axios.create({
      timeout: config.timeoutMs,
      headers: { "User-Agent": config.userAgent },
      responseType: "text",
      validateStatus: () => true
    });
  }

  async getPage(url: string): Promise<PageResponse> {
    const response = await this.client.get<string>(url);
    return { status: response.status, body: response.data };
  }
}
