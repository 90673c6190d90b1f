declare namespace NodeJS {
  interface ProcessEnv {
    readonly CATALOGUE_BASE_URL?: string;
    readonly REQUEST_DELAY_MS?: string;
    readonly HTTP_TIMEOUT_MS?: string;
    readonly HTTP_USER_AGENT?: string;
    readonly LOG_LEVEL?: string;
  }
}
