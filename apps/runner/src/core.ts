import type { SuiteReport } from "@daa/shared";
import { ActionRegistry } from "./actions/registry.js";
import { BrowserPool, type BrowserLease } from "./browser/pool.js";
import { loadConfig, type AppConfig } from "./config/index.js";
import { performDeviceUpgrade } from "./library/api/device-upgrade.js";
import { objectActions } from "./library/api/objects.js";
import { storefrontActions } from "./library/web/storefront.js";
import type { OutputSink } from "./output-sink.js";
import { FetchHttpBackend } from "./physical/http.js";
import type { PhysicalBackends } from "./physical/types.js";
import { printReportSummary, saveReport } from "./runner/test-report.js";
import { runSuite, type LeaseFactory } from "./runner/test-runner.js";
import type { SuiteEnv, TestSuite } from "./suites/types.js";

export function createRegistry(): ActionRegistry {
  const registry = new ActionRegistry()
    .register(...objectActions)
    .register(performDeviceUpgrade)
    .register(...storefrontActions);
  registry.validate();
  return registry;
}

/**
 * HTTP runs get a fresh fetch backend; browser runs lease their own browser
 * from the pool and hand it back on release.
 */
export function createLeaseFactory(
  config: AppConfig,
  pool: Pick<BrowserPool, "acquire">,
  fetchFn?: typeof fetch,
): LeaseFactory {
  return async (runId, requires) => {
    const backends: PhysicalBackends = {};
    let browser: BrowserLease | undefined;

    if (requires.includes("http")) {
      backends.http = new FetchHttpBackend({ timeout: config.httpTimeoutMs, fetch: fetchFn });
    }
    if (requires.includes("web")) {
      browser = await pool.acquire(runId);
      backends.web = browser.backend;
    }

    return {
      backends,
      release: async () => {
        await browser?.release();
      },
    };
  };
}

export interface RunOverrides {
  timeoutMs?: number;
  concurrency?: number;
  reportDir?: string;
}

export interface RunnerCore {
  config: AppConfig;
  registry: ActionRegistry;
  runSuites(suites: readonly TestSuite[], overrides?: RunOverrides): Promise<SuiteReport[]>;
  shutdown(): Promise<void>;
}

export function createRunnerCore(sink: OutputSink, config: AppConfig = loadConfig()): RunnerCore {
  const registry = createRegistry();
  const pool = new BrowserPool(config, sink);
  const lease = createLeaseFactory(config, pool);
  const env: SuiteEnv = {
    apiUrl: config.apiUrl,
    storefrontUrl: config.storefrontUrl,
    storefrontBrand: config.storefrontBrand,
  };

  sink.info(`API: ${config.apiUrl} | Storefront: ${config.storefrontUrl}`);
  sink.info(`Headless: ${config.headless} | Registered actions: ${registry.list().length}`);

  async function runSuites(suites: readonly TestSuite[], overrides: RunOverrides = {}): Promise<SuiteReport[]> {
    const reportDir = overrides.reportDir ?? config.reportDir;
    const reports: SuiteReport[] = [];

    for (const suite of suites) {
      const report = await runSuite(suite, {
        env,
        lease,
        sink,
        registry,
        timeoutMs: overrides.timeoutMs ?? config.runTimeoutMs,
        waitTimeoutMs: config.waitTimeoutMs,
        concurrency: overrides.concurrency ?? config.concurrency,
      });
      printReportSummary(report, sink);
      const file = await saveReport(report, reportDir);
      sink.info(`Report saved: ${file}`);
      reports.push(report);
    }
    return reports;
  }

  return {
    config,
    registry,
    runSuites,
    shutdown: () => pool.closeAll(),
  };
}
