// ── Verification ledger ────────────────────────────────────────────

export type EntryOutcome = "passed" | "failed" | "aborted";

export type FailureDetailDTO =
  | { type: "verification"; expected: string; actual: string; message: string }
  | { type: "transport"; kind: string; operation: string; message: string };

export interface LedgerEntryDTO {
  sequence: number;
  action: string;
  input: unknown;
  outcome: EntryOutcome;
  claim: string;
  failure?: FailureDetailDTO;
  recordedAt: string;
}

// ── Test reports ───────────────────────────────────────────────────

export type CaseVerdict = "pass" | "fail" | "aborted";

export type SuiteVerdict = "pass" | "fail" | "partial";

/** Where and why a case failed, e.g. `perform_device_upgrade → get_object_and_verify → VerificationFailure(...)`. */
export interface FailureSummary {
  chain: string;
  action: string;
  claim: string;
  detail: string;
}

export interface TestCaseReport {
  title: string;
  runId: string;
  verdict: CaseVerdict;
  startedAt: string;
  durationMs: number;
  entries: LedgerEntryDTO[];
  failure?: FailureSummary;
}

export interface VerdictCounts {
  passed: number;
  failed: number;
  aborted: number;
}

export interface SuiteReport {
  suite: string;
  title: string;
  timestamp: string;
  verdict: SuiteVerdict;
  counts: VerdictCounts;
  cases: TestCaseReport[];
  summary: string;
  durationMs: number;
}
