import { TransportFault } from "../errors.js";
import { toTransportFault } from "./faults.js";
import type {
  HttpBackend,
  HttpMethod,
  HttpRequestOptions,
  HttpResponse,
  QueryParams,
} from "./types.js";

export interface FetchBackendOptions {
  /** Per-request timeout in milliseconds (default 10000). */
  timeout?: number;
  /** Headers sent with every request. */
  headers?: Record<string, string>;
  /** Custom fetch implementation (defaults to the global fetch). */
  fetch?: typeof fetch;
}

function isPairList(params: QueryParams): params is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(params);
}

function collectHeaders(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key] = value;
  });
  return out;
}

/**
 * HTTP backend over fetch. One instance per run; it holds no session state
 * beyond its configuration.
 */
export class FetchHttpBackend implements HttpBackend {
  private timeout: number;
  private headers: Record<string, string>;
  private fetchFn: typeof fetch;

  constructor(options: FetchBackendOptions = {}) {
    this.timeout = options.timeout ?? 10000;
    this.headers = { Accept: "application/json", ...options.headers };
    this.fetchFn = options.fetch ?? fetch;
  }

  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    return this.request("GET", url, options);
  }

  post(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    return this.request("POST", url, options);
  }

  put(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    return this.request("PUT", url, options);
  }

  delete(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    return this.request("DELETE", url, options);
  }

  private async request(
    method: HttpMethod,
    url: string,
    options: HttpRequestOptions = {},
  ): Promise<HttpResponse> {
    const operation = method.toLowerCase();
    const target = new URL(url);
    if (options.params) {
      const pairs = isPairList(options.params) ? options.params : Object.entries(options.params);
      for (const [key, value] of pairs) {
        target.searchParams.append(key, value);
      }
    }

    const headers: Record<string, string> = { ...this.headers, ...options.headers };
    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers["Content-Type"] ??= "application/json";
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const onCallerAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await this.fetchFn(target.toString(), {
        method,
        headers,
        body,
        signal: controller.signal,
      });
      const text = await response.text();

      return {
        url: target.toString(),
        method,
        status: response.status,
        statusText: response.statusText,
        headers: collectHeaders(response.headers),
        body: text,
      };
    } catch (error) {
      if (options.signal?.aborted) {
        throw new TransportFault("aborted", operation, `${method} ${target} aborted`, {
          cause: error,
        });
      }
      if (controller.signal.aborted) {
        throw new TransportFault(
          "timeout",
          operation,
          `${method} ${target} timed out after ${this.timeout}ms`,
          { cause: error },
        );
      }
      throw toTransportFault(error, operation);
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
