export interface Viewport {
  width: number;
  height: number;
}

export interface AppConfig {
  apiUrl: string;
  storefrontUrl: string;
  storefrontBrand: string;
  headless: boolean;
  httpTimeoutMs: number;
  waitTimeoutMs: number;
  runTimeoutMs: number;
  concurrency: number;
  reportDir: string;
  viewport: Viewport;
  /** Chrome binary; when unset the Playwright-managed Chromium is used. */
  chromePath?: string;
}
