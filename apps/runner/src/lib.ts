export { defineAtomic } from "./actions/atomic.js";
export type { AtomicDefinition, ProducingAtomicDefinition } from "./actions/atomic.js";
export { defineComposite, step, countAtomics } from "./actions/composite.js";
export type { CompositeDefinition, ProducingCompositeDefinition, StepOptions } from "./actions/composite.js";
export { RunState, createActionContext } from "./actions/context.js";
export type { ActionContext, Parser, StateView } from "./actions/context.js";
export { VerificationLedger } from "./actions/ledger.js";
export type { EntryOutcome, LedgerEntry, LedgerState } from "./actions/ledger.js";
export { ActionRegistry } from "./actions/registry.js";
export {
  describeFailure,
  expectThat,
  fail,
  formatFailureChain,
  isFailure,
  pass,
} from "./actions/result.js";
export { createTestLayer } from "./actions/test-layer.js";
export type { TestLayer } from "./actions/test-layer.js";
export * from "./actions/types.js";
export {
  ActionFailure,
  CompositionError,
  ConfigError,
  DaaError,
  LedgerStateError,
  TransportFault,
} from "./errors.js";
export { loadConfig } from "./config/index.js";
export type { AppConfig } from "./config/index.js";
export { OperationGuard, PhysicalLayerAdapter } from "./physical/adapter.js";
export { FetchHttpBackend } from "./physical/http.js";
export { toTransportFault } from "./physical/faults.js";
export * from "./physical/types.js";
export { BrowserPool } from "./browser/pool.js";
export { StagehandWebBackend } from "./browser/stagehand.js";
export { preflightSuite, runSuite } from "./runner/test-runner.js";
export type { BackendLease, LeaseFactory, RunSuiteOptions } from "./runner/test-runner.js";
export { saveReport } from "./runner/test-report.js";
export { createLeaseFactory, createRegistry, createRunnerCore } from "./core.js";
export { suites, findSuite } from "./suites/index.js";
export type { SuiteEnv, TestCase, TestSuite } from "./suites/types.js";
