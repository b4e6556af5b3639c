import { LedgerStateError } from "../errors.js";
import type { FailureDetail } from "./types.js";

export type LedgerState = "empty" | "recording" | "closed";

export type EntryOutcome = "passed" | "failed" | "aborted";

export interface LedgerEntry {
  readonly sequence: number;
  readonly action: string;
  readonly input: unknown;
  readonly outcome: EntryOutcome;
  readonly claim: string;
  readonly failure?: FailureDetail;
  readonly recordedAt: string;
}

export type LedgerRecord = Omit<LedgerEntry, "sequence" | "recordedAt">;

/** Deep copy of an action input; values structuredClone rejects are kept as given. */
function snapshot(value: unknown): unknown {
  try {
    return structuredClone(value);
  } catch (err) {
    if (err instanceof DOMException && err.name === "DataCloneError") return value;
    throw err;
  }
}

/**
 * Append-only record of every atomic verification in one test run.
 *
 * Lifecycle: `empty` until `open()`, `recording` while the run executes,
 * `closed` after `close()`. Once closed, `report()` is the only permitted
 * call.
 */
export class VerificationLedger {
  private entries: LedgerEntry[] = [];
  private current: LedgerState = "empty";

  constructor(
    readonly runId: string,
    private clock: () => Date = () => new Date(),
  ) {}

  get state(): LedgerState {
    return this.current;
  }

  open(): void {
    if (this.current !== "empty") {
      throw new LedgerStateError(`Ledger ${this.runId} is already ${this.current}`);
    }
    this.current = "recording";
  }

  append(record: LedgerRecord): LedgerEntry {
    if (this.current !== "recording") {
      throw new LedgerStateError(
        `Cannot record "${record.action}": ledger ${this.runId} is ${this.current}`,
      );
    }
    const entry: LedgerEntry = Object.freeze({
      ...record,
      input: snapshot(record.input),
      sequence: this.entries.length + 1,
      recordedAt: this.clock().toISOString(),
    });
    this.entries.push(entry);
    return entry;
  }

  /**
   * Marks the run as aborted when cancellation landed outside any in-flight
   * atomic action, so the report never ends silently mid-flow.
   */
  recordAbort(reason: string): LedgerEntry {
    return this.append({
      action: "run",
      input: undefined,
      outcome: "aborted",
      claim: "run completes before its deadline",
      failure: { type: "transport", kind: "aborted", operation: "run", message: reason },
    });
  }

  firstFailure(): LedgerEntry | undefined {
    this.assertOpenForReads("firstFailure");
    return this.entries.find((e) => e.outcome !== "passed");
  }

  close(): void {
    if (this.current === "closed") {
      throw new LedgerStateError(`Ledger ${this.runId} is already closed`);
    }
    this.current = "closed";
  }

  report(): readonly LedgerEntry[] {
    return [...this.entries];
  }

  private assertOpenForReads(operation: string): void {
    if (this.current === "closed") {
      throw new LedgerStateError(
        `${operation}() is not permitted on closed ledger ${this.runId}; use report()`,
      );
    }
  }
}
