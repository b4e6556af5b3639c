import type {
  CaseVerdict,
  FailureSummary,
  SuiteReport,
  SuiteVerdict,
  TestCaseReport,
  VerdictCounts,
} from "@daa/shared";
import { abortReason, deadline, raceAbort } from "../abort.js";
import { createActionContext } from "../actions/context.js";
import { VerificationLedger } from "../actions/ledger.js";
import type { ActionRegistry } from "../actions/registry.js";
import { createTestLayer } from "../actions/test-layer.js";
import { ActionFailure, CompositionError } from "../errors.js";
import type { OutputSink } from "../output-sink.js";
import { PhysicalLayerAdapter } from "../physical/adapter.js";
import type { PhysicalBackends } from "../physical/types.js";
import type { BackendKind, SuiteEnv, TestCase, TestSuite } from "../suites/types.js";
import { buildSummaryMessage } from "./test-report.js";

/** Backends bound to one run, returned to their owner afterwards. */
export interface BackendLease {
  backends: PhysicalBackends;
  release(): Promise<void>;
}

export type LeaseFactory = (runId: string, requires: readonly BackendKind[]) => Promise<BackendLease>;

export interface RunSuiteOptions {
  env: SuiteEnv;
  lease: LeaseFactory;
  sink: OutputSink;
  /** Per-case deadline in milliseconds. */
  timeoutMs: number;
  /** Default for explicit `waitFor` probes. */
  waitTimeoutMs?: number;
  /** Cases run at once; each still owns its ledger, state and backends. */
  concurrency?: number;
  /** Checked before anything runs, so a broken step fails the whole suite up front. */
  registry?: ActionRegistry;
  clock?: () => Date;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Every step of every case must reference an action the registry knows,
 * and every case must have steps.
 */
export function preflightSuite(suite: TestSuite, registry: ActionRegistry): void {
  if (suite.cases.length === 0) {
    throw new CompositionError(`Suite "${suite.id}" has no test cases`);
  }
  for (const testCase of suite.cases) {
    if (testCase.steps.length === 0) {
      throw new CompositionError(`"${testCase.title}" in suite "${suite.id}" has no steps`);
    }
    testCase.steps.forEach((s, i) => {
      if (!s || !s.action) {
        throw new CompositionError(`Step ${i + 1} of "${testCase.title}" references an unresolved action`);
      }
      if (registry.get(s.action.name) !== s.action) {
        throw new CompositionError(
          `Step ${i + 1} of "${testCase.title}" uses "${s.action.name}", which is not in the action registry`,
        );
      }
    });
  }
}

export function suiteVerdict(cases: readonly TestCaseReport[]): SuiteVerdict {
  const passed = cases.filter((c) => c.verdict === "pass").length;
  if (passed === cases.length) return "pass";
  if (passed === 0) return "fail";
  return "partial";
}

export function countVerdicts(cases: readonly TestCaseReport[]): VerdictCounts {
  const count = (verdict: CaseVerdict) => cases.filter((c) => c.verdict === verdict).length;
  return { passed: count("pass"), failed: count("fail"), aborted: count("aborted") };
}

/** A finished case keeps its report when its backends fail to close. */
async function releaseLease(lease: BackendLease, title: string, sink: OutputSink): Promise<void> {
  try {
    await lease.release();
  } catch (err) {
    sink.warn(`Could not release backends for "${title}": ${errorMessage(err)}`);
  }
}

async function runCase(
  suite: TestSuite,
  testCase: TestCase,
  index: number,
  options: RunSuiteOptions,
): Promise<TestCaseReport> {
  const clock = options.clock ?? (() => new Date());
  const { sink } = options;
  const total = suite.cases.length;
  const runId = `${suite.id}-${index + 1}-${Date.now().toString(36)}`;
  const startedAt = clock();
  const startMs = Date.now();
  const ledger = new VerificationLedger(runId, clock);

  sink.testCase(index, total, testCase.title, "running");

  // The deadline covers binding backends too.
  const limit = deadline(options.timeoutMs, `"${testCase.title}"`);
  const pending = options.lease(runId, suite.requires);

  let lease: BackendLease;
  try {
    lease = await raceAbort(pending, limit.signal);
  } catch (err) {
    limit.clear();
    const timedOut = limit.signal.aborted;
    if (timedOut) {
      void pending.then(
        (late) => releaseLease(late, testCase.title, sink),
        (lateErr: unknown) =>
          sink.warn(`Backends for "${testCase.title}" failed after its deadline: ${errorMessage(lateErr)}`),
      );
    }
    const detail = timedOut ? abortReason(limit.signal) : errorMessage(err);
    const verdict: CaseVerdict = timedOut ? "aborted" : "fail";
    sink.testCase(index, total, testCase.title, verdict);
    sink.error(`Could not bind backends for "${testCase.title}": ${detail}`);
    return {
      title: testCase.title,
      runId,
      verdict,
      startedAt: startedAt.toISOString(),
      durationMs: Date.now() - startMs,
      entries: [],
      failure: { chain: `setup → ${detail}`, action: "setup", claim: "backends bound", detail },
    };
  }

  let failure: FailureSummary | undefined;
  let verdict: CaseVerdict = "pass";

  try {
    ledger.open();
    const adapter = new PhysicalLayerAdapter(lease.backends, {
      signal: limit.signal,
      waitTimeoutMs: options.waitTimeoutMs,
    });
    const layer = createTestLayer(createActionContext({ runId, adapter, ledger, sink }));

    try {
      for (const s of testCase.steps) {
        await layer.run(s, options.env);
      }
    } catch (err) {
      if (!(err instanceof ActionFailure)) throw err;
      failure = {
        chain: err.chain,
        action: err.result.action,
        claim: err.result.claim,
        detail: err.result.failure.message,
      };
    }

    if (failure) {
      if (limit.signal.aborted && !ledger.report().some((e) => e.outcome === "aborted")) {
        ledger.recordAbort(abortReason(limit.signal));
      }
      verdict = ledger.firstFailure()?.outcome === "aborted" ? "aborted" : "fail";
    }
  } finally {
    limit.clear();
    if (ledger.state !== "closed") ledger.close();
    await releaseLease(lease, testCase.title, sink);
  }

  sink.testCase(index, total, testCase.title, verdict);
  if (failure) sink.error(failure.chain);

  return {
    title: testCase.title,
    runId,
    verdict,
    startedAt: startedAt.toISOString(),
    durationMs: Date.now() - startMs,
    entries: [...ledger.report()],
    failure,
  };
}

/**
 * Runs every case of a suite, each in its own run: fresh ledger, state,
 * adapter and backend lease, and its own deadline. A CompositionError stops
 * the suite; action failures only fail their case.
 */
export async function runSuite(suite: TestSuite, options: RunSuiteOptions): Promise<SuiteReport> {
  if (options.registry) preflightSuite(suite, options.registry);

  const clock = options.clock ?? (() => new Date());
  const startMs = Date.now();
  const concurrency = Math.max(1, Math.min(options.concurrency ?? 1, suite.cases.length));
  const results: TestCaseReport[] = new Array(suite.cases.length);

  options.sink.info(`Suite: ${suite.title} (${suite.cases.length} cases, concurrency ${concurrency})`);

  let next = 0;
  let halted = false;
  const worker = async (): Promise<void> => {
    while (!halted && next < suite.cases.length) {
      const index = next++;
      try {
        results[index] = await runCase(suite, suite.cases[index], index, options);
      } catch (err) {
        halted = true;
        throw err;
      }
    }
  };
  // Cases already running finish and release their backends before the suite stops.
  const settled = await Promise.allSettled(Array.from({ length: concurrency }, worker));
  for (const outcome of settled) {
    if (outcome.status === "rejected") throw outcome.reason;
  }

  const report: SuiteReport = {
    suite: suite.id,
    title: suite.title,
    timestamp: clock().toISOString(),
    verdict: suiteVerdict(results),
    counts: countVerdicts(results),
    cases: results,
    summary: "",
    durationMs: Date.now() - startMs,
  };
  report.summary = buildSummaryMessage(report);
  return report;
}
