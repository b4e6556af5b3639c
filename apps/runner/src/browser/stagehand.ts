import { spawn, type ChildProcess } from "child_process";
import fs from "fs";
import path from "path";
import { TransportFault } from "../errors.js";
import type { Viewport } from "../config/types.js";
import type { OutputSink } from "../output-sink.js";
import type { WaitOptions, WaitState, WebBackend } from "../physical/types.js";

/**
 * Mutable holder so the long-lived Stagehand logger can route output
 * through whichever OutputSink is active for the current run.
 */
export interface SinkHolder {
  sink: OutputSink | null;
}

// ── Chrome process ────────────────────────────────────────────────────

export function findPlaywrightChromium(): string {
  const cacheDir =
    process.env.PLAYWRIGHT_BROWSERS_PATH ??
    `${process.env.HOME}/.cache/ms-playwright`;
  const dirs = fs.existsSync(cacheDir)
    ? fs
        .readdirSync(cacheDir)
        .filter((d) => d.startsWith("chromium-"))
        .sort()
        .reverse()
    : [];
  for (const dir of dirs) {
    const candidate = path.join(cacheDir, dir, "chrome-linux64", "chrome");
    if (fs.existsSync(candidate)) return candidate;
  }
  throw new Error(
    "Playwright Chromium not found. Set CHROME_PATH or run: npx playwright install chromium",
  );
}

export interface LaunchOptions {
  profileDir: string;
  headless: boolean;
  viewport: Viewport;
}

export function launchChrome(
  executablePath: string,
  opts: LaunchOptions,
): Promise<{ process: ChildProcess; wsUrl: string }> {
  return new Promise((resolve, reject) => {
    fs.mkdirSync(opts.profileDir, { recursive: true });

    const args = [
      "--no-sandbox",
      "--disable-dev-shm-usage",
      "--remote-debugging-port=0",
      "--remote-allow-origins=*",
      "--no-first-run",
      "--no-default-browser-check",
      `--window-size=${opts.viewport.width},${opts.viewport.height}`,
      `--user-data-dir=${opts.profileDir}`,
      "--disable-blink-features=AutomationControlled",
      "--disable-infobars",
      "--disable-background-timer-throttling",
      "--disable-backgrounding-occluded-windows",
      "--disable-renderer-backgrounding",
    ];

    if (opts.headless) {
      args.push("--headless=new");
    }

    const proc = spawn(executablePath, args, {
      stdio: ["ignore", "pipe", "pipe"],
      env: { ...process.env, DISPLAY: process.env.DISPLAY || ":0" },
    });

    let stderr = "";
    const timeout = setTimeout(() => {
      reject(new Error(`Chrome launch timed out. stderr:\n${stderr}`));
      proc.kill();
    }, 15000);

    proc.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
      const match = stderr.match(/DevTools listening on (ws:\/\/\S+)/);
      if (match) {
        clearTimeout(timeout);
        resolve({ process: proc, wsUrl: match[1] });
      }
    });

    proc.on("error", (err) => {
      clearTimeout(timeout);
      reject(err);
    });

    proc.on("exit", (code) => {
      clearTimeout(timeout);
      if (!stderr.includes("DevTools listening on")) {
        reject(new Error(`Chrome exited with code ${code}. stderr:\n${stderr}`));
      }
    });
  });
}

// ── Logging ───────────────────────────────────────────────────────────

/** The fields of a Stagehand log line the runner reads. */
export interface StagehandLogLine {
  message: string;
  category?: string;
  level?: number;
}

/**
 * Routes Stagehand's log lines into the active sink. Level 0 is an error,
 * 1 is info; debug chatter (level 2) is dropped.
 */
export function buildStagehandLogger(
  sinkHolder: SinkHolder,
  label?: string,
): (logLine: StagehandLogLine) => void {
  const prefix = label ? `[${label}] ` : "";

  return (logLine) => {
    const sink = sinkHolder.sink;
    if (!sink || logLine.level === 2) return;
    const category = logLine.category ? `${logLine.category}: ` : "";
    if (logLine.level === 0) {
      sink.warn(`${prefix}stagehand ${category}${logLine.message}`);
    } else {
      sink.debug(`${prefix}stagehand ${category}${logLine.message}`);
    }
  };
}

// ── Web backend ───────────────────────────────────────────────────────

/** The slice of a Stagehand locator the backend drives. */
export interface BrowserLocator {
  count(): Promise<number>;
  first(): BrowserLocator;
  click(): Promise<void>;
  fill(value: string): Promise<void>;
  textContent(): Promise<string | null>;
  inputValue(): Promise<string>;
  isVisible(): Promise<boolean>;
}

/** The slice of a Stagehand page the backend drives. */
export interface BrowserPage {
  goto(url: string, options?: { waitUntil?: "load" | "domcontentloaded" | "networkidle" }): Promise<unknown>;
  title(): Promise<string>;
  locator(selector: string): BrowserLocator;
  waitForTimeout(ms: number): Promise<void>;
}

const POLL_INTERVAL_MS = 100;

/**
 * WebBackend over one Stagehand page. Each method is one browser
 * interaction; the only loop is inside `waitFor`, the explicit wait.
 */
export class StagehandWebBackend implements WebBackend {
  constructor(
    private readonly page: BrowserPage,
    private readonly defaultWaitMs = 5000,
    private readonly now: () => number = Date.now,
  ) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded" });
  }

  async fill(locator: string, text: string): Promise<void> {
    const target = await this.existing("fill", locator);
    await target.fill(text);
  }

  async click(locator: string): Promise<void> {
    const target = await this.existing("click", locator);
    await target.click();
  }

  async getText(locator: string): Promise<string | null> {
    const target = await this.existing("getText", locator);
    return target.textContent();
  }

  async getValue(locator: string): Promise<string> {
    const target = await this.existing("getValue", locator);
    return target.inputValue();
  }

  async isVisible(locator: string): Promise<boolean> {
    const all = this.page.locator(locator);
    if ((await all.count()) === 0) return false;
    return all.first().isVisible();
  }

  getCount(locator: string): Promise<number> {
    return this.page.locator(locator).count();
  }

  getTitle(): Promise<string> {
    return this.page.title();
  }

  async waitFor(locator: string, options: WaitOptions = {}): Promise<void> {
    const state = options.state ?? "visible";
    const timeoutMs = options.timeoutMs ?? this.defaultWaitMs;
    const until = this.now() + timeoutMs;

    for (;;) {
      if (await this.reached(locator, state)) return;
      if (this.now() >= until) {
        throw new TransportFault(
          "timeout",
          "waitFor",
          `waitFor ${locator} (${state}) timed out after ${timeoutMs}ms`,
        );
      }
      await this.page.waitForTimeout(POLL_INTERVAL_MS);
    }
  }

  private async reached(locator: string, state: WaitState): Promise<boolean> {
    switch (state) {
      case "attached":
        return (await this.getCount(locator)) > 0;
      case "detached":
        return (await this.getCount(locator)) === 0;
      case "visible":
        return this.isVisible(locator);
      case "hidden":
        return !(await this.isVisible(locator));
    }
  }

  private async existing(operation: string, locator: string): Promise<BrowserLocator> {
    const all = this.page.locator(locator);
    if ((await all.count()) === 0) {
      throw new TransportFault("element-not-found", operation, `No element matches ${locator}`);
    }
    return all.first();
  }
}
