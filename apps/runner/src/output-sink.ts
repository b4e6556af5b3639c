import type { LedgerEntry } from "./actions/ledger.js";

export type CaseStatus = "running" | "pass" | "fail" | "aborted";

/**
 * Abstraction over output delivery. The CLI sink writes to stdout with chalk
 * colors; tests use a recording sink.
 */
export interface OutputSink {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  testCase(index: number, total: number, title: string, status: CaseStatus): void;
  verification(runId: string, entry: LedgerEntry): void;
  separator(): void;
  log(msg: string): void;
  /** Diagnostic chatter, shown only in verbose mode. */
  debug(msg: string): void;
}
