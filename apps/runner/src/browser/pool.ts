import type { ChildProcess } from "child_process";
import fs from "fs";
import path from "path";
import { Stagehand } from "@browserbasehq/stagehand";
import type { AppConfig } from "../config/types.js";
import type { OutputSink } from "../output-sink.js";
import type { WebBackend } from "../physical/types.js";
import {
  StagehandWebBackend,
  buildStagehandLogger,
  findPlaywrightChromium,
  launchChrome,
  type SinkHolder,
} from "./stagehand.js";

type StagehandPage = ReturnType<Stagehand["context"]["pages"]>[number];

/**
 * One Chrome process driven by one Stagehand instance, owned by exactly one
 * test run for its whole duration.
 */
export class BrowserInstance {
  constructor(
    readonly runId: string,
    readonly stagehand: Stagehand,
    readonly chrome: ChildProcess,
    readonly profileDir: string,
    readonly sinkHolder: SinkHolder,
  ) {}

  activeTab(): StagehandPage {
    const pages = this.stagehand.context.pages();
    if (pages.length === 0) {
      throw new Error(`Browser for ${this.runId} has no open page`);
    }
    return pages[pages.length - 1];
  }

  async close(): Promise<void> {
    try {
      await this.stagehand.close();
    } finally {
      this.chrome.kill();
      fs.rmSync(this.profileDir, { recursive: true, force: true });
    }
  }
}

export interface BrowserLease {
  backend: WebBackend;
  release(): Promise<void>;
}

/**
 * Hands each run its own isolated browser. Nothing is shared between runs:
 * no profile, no cookies, no page.
 */
export class BrowserPool {
  private instances = new Map<string, BrowserInstance>();
  private chromePath: string | undefined;

  constructor(
    private readonly config: AppConfig,
    private readonly sink?: OutputSink,
  ) {
    this.chromePath = config.chromePath;
  }

  async acquire(runId: string): Promise<BrowserLease> {
    if (this.instances.has(runId)) {
      throw new Error(`Run ${runId} already holds a browser`);
    }

    this.chromePath ??= findPlaywrightChromium();
    const profileDir = path.resolve("data", `.browser-profile-${runId}`);

    const chrome = await launchChrome(this.chromePath, {
      profileDir,
      headless: this.config.headless,
      viewport: this.config.viewport,
    });

    const sinkHolder: SinkHolder = { sink: this.sink ?? null };
    const stagehand = new Stagehand({
      env: "LOCAL",
      localBrowserLaunchOptions: {
        cdpUrl: chrome.wsUrl,
        viewport: this.config.viewport,
      },
      logger: buildStagehandLogger(sinkHolder, runId),
    });

    try {
      await stagehand.init();
    } catch (err) {
      chrome.process.kill();
      fs.rmSync(profileDir, { recursive: true, force: true });
      throw err;
    }

    const browser = new BrowserInstance(runId, stagehand, chrome.process, profileDir, sinkHolder);
    this.instances.set(runId, browser);

    return {
      backend: new StagehandWebBackend(browser.activeTab(), this.config.waitTimeoutMs),
      release: () => this.release(runId),
    };
  }

  async release(runId: string): Promise<void> {
    const browser = this.instances.get(runId);
    if (!browser) return;
    this.instances.delete(runId);
    await browser.close();
  }

  size(): number {
    return this.instances.size;
  }

  async closeAll(): Promise<void> {
    const open = [...this.instances.keys()];
    for (const runId of open) {
      await this.release(runId);
    }
  }
}
