import { raceAbort, throwIfAborted } from "../abort.js";
import { CompositionError, TransportFault } from "../errors.js";
import { toTransportFault } from "./faults.js";
import type {
  HttpBackend,
  HttpRequestOptions,
  HttpResponse,
  OperationName,
  PhysicalBackends,
  WaitOptions,
  WebBackend,
} from "./types.js";

export type RequestOptions = Omit<HttpRequestOptions, "signal" | "body">;
export type BodyRequestOptions = Omit<HttpRequestOptions, "signal">;

export interface AdapterOptions {
  /** Run-level cancellation; every operation is a cancellation point. */
  signal?: AbortSignal;
  /** Default timeout for `waitFor` when the caller gives none. */
  waitTimeoutMs?: number;
}

/**
 * Admits the operations one atomic action declared, in order: its primary
 * operation, then at most its probe. Anything else is a definition bug.
 */
export class OperationGuard {
  private calls = 0;

  constructor(
    readonly action: string,
    private readonly allowed: readonly OperationName[],
  ) {}

  get callCount(): number {
    return this.calls;
  }

  enter(operation: OperationName): void {
    const expected = this.allowed[this.calls];
    if (expected === undefined) {
      throw new CompositionError(
        `"${this.action}" made an undeclared extra "${operation}" call after ${this.allowed.join(" + ")}`,
      );
    }
    if (expected !== operation) {
      throw new CompositionError(
        `"${this.action}" called "${operation}" where it declared "${expected}"`,
      );
    }
    this.calls += 1;
  }
}

/**
 * Physical Layer Adapter: one method per primitive SUT interaction. Returns
 * the backend's raw result unmodified and normalizes every thrown error
 * into a TransportFault. No retries and no implicit waiting.
 */
export class PhysicalLayerAdapter {
  constructor(
    private readonly backends: PhysicalBackends,
    private readonly options: AdapterOptions = {},
    private readonly guard?: OperationGuard,
  ) {}

  get signal(): AbortSignal | undefined {
    return this.options.signal;
  }

  /** A view of this adapter restricted to what `guard` admits. */
  guarded(guard: OperationGuard): PhysicalLayerAdapter {
    return new PhysicalLayerAdapter(this.backends, this.options, guard);
  }

  // ── HTTP ───────────────────────────────────────────────────────────

  get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.invoke("get", () => this.http("get").get(url, this.withSignal(options)));
  }

  post(url: string, options: BodyRequestOptions = {}): Promise<HttpResponse> {
    return this.invoke("post", () => this.http("post").post(url, this.withSignal(options)));
  }

  put(url: string, options: BodyRequestOptions = {}): Promise<HttpResponse> {
    return this.invoke("put", () => this.http("put").put(url, this.withSignal(options)));
  }

  delete(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.invoke("delete", () => this.http("delete").delete(url, this.withSignal(options)));
  }

  // ── Browser ────────────────────────────────────────────────────────

  goto(url: string): Promise<void> {
    return this.invoke("goto", () => this.web("goto").goto(url));
  }

  fill(locator: string, text: string): Promise<void> {
    return this.invoke("fill", () => this.web("fill").fill(locator, text));
  }

  click(locator: string): Promise<void> {
    return this.invoke("click", () => this.web("click").click(locator));
  }

  getText(locator: string): Promise<string | null> {
    return this.invoke("getText", () => this.web("getText").getText(locator));
  }

  getValue(locator: string): Promise<string> {
    return this.invoke("getValue", () => this.web("getValue").getValue(locator));
  }

  isVisible(locator: string): Promise<boolean> {
    return this.invoke("isVisible", () => this.web("isVisible").isVisible(locator));
  }

  getCount(locator: string): Promise<number> {
    return this.invoke("getCount", () => this.web("getCount").getCount(locator));
  }

  getTitle(): Promise<string> {
    return this.invoke("getTitle", () => this.web("getTitle").getTitle());
  }

  waitFor(locator: string, options: WaitOptions = {}): Promise<void> {
    const resolved: WaitOptions = {
      state: options.state ?? "visible",
      timeoutMs: options.timeoutMs ?? this.options.waitTimeoutMs,
    };
    return this.invoke("waitFor", () => this.web("waitFor").waitFor(locator, resolved));
  }

  // ── Internals ──────────────────────────────────────────────────────

  private async invoke<T>(operation: OperationName, call: () => Promise<T>): Promise<T> {
    this.guard?.enter(operation);
    const { signal } = this.options;
    try {
      throwIfAborted(signal);
      return await raceAbort(call(), signal);
    } catch (err) {
      throw toTransportFault(err, operation, signal);
    }
  }

  private withSignal<O extends HttpRequestOptions>(options: O): O {
    return this.options.signal ? { ...options, signal: this.options.signal } : options;
  }

  private http(operation: OperationName): HttpBackend {
    if (!this.backends.http) {
      throw new TransportFault("unsupported", operation, `No HTTP backend is bound to this run`);
    }
    return this.backends.http;
  }

  private web(operation: OperationName): WebBackend {
    if (!this.backends.web) {
      throw new TransportFault("unsupported", operation, `No browser backend is bound to this run`);
    }
    return this.backends.web;
  }
}
