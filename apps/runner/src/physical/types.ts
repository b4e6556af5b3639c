/**
 * Physical Layer contract. Backends execute one raw operation against the
 * system under test and return the raw result; they never judge it.
 */

export type QueryParams = Record<string, string> | ReadonlyArray<readonly [string, string]>;

export interface HttpRequestOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * Raw HTTP exchange result. `body` is the undecoded response text.
 */
export interface HttpResponse {
  url: string;
  method: HttpMethod;
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

export interface HttpBackend {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
  post(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
  put(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
  delete(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export type WaitState = "attached" | "detached" | "visible" | "hidden";

export interface WaitOptions {
  state?: WaitState;
  timeoutMs?: number;
}

export interface WebBackend {
  goto(url: string): Promise<void>;
  fill(locator: string, text: string): Promise<void>;
  /** Clicks the first element matching the locator. */
  click(locator: string): Promise<void>;
  getText(locator: string): Promise<string | null>;
  getValue(locator: string): Promise<string>;
  isVisible(locator: string): Promise<boolean>;
  getCount(locator: string): Promise<number>;
  getTitle(): Promise<string>;
  /** Resolves once the locator reaches the state; rejects on timeout. */
  waitFor(locator: string, options?: WaitOptions): Promise<void>;
}

export interface PhysicalBackends {
  http?: HttpBackend;
  web?: WebBackend;
}

export const DRIVING_OPERATIONS = [
  "get",
  "post",
  "put",
  "delete",
  "goto",
  "fill",
  "click",
] as const;

/** Read-only operations an atomic may use to observe a post-condition. */
export const PROBE_OPERATIONS = [
  "getText",
  "getValue",
  "isVisible",
  "getCount",
  "getTitle",
  "waitFor",
] as const;

export type DrivingOperation = (typeof DRIVING_OPERATIONS)[number];
export type ProbeOperation = (typeof PROBE_OPERATIONS)[number];
export type OperationName = DrivingOperation | ProbeOperation;

export function isOperationName(value: string): value is OperationName {
  return DRIVING_OPERATIONS.some((op) => op === value) || isProbeOperation(value);
}

export function isProbeOperation(value: string): value is ProbeOperation {
  return PROBE_OPERATIONS.some((op) => op === value);
}
