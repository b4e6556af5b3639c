import type { LedgerEntry } from "../../src/actions/ledger.js";
import type { CaseStatus, OutputSink } from "../../src/output-sink.js";

/** OutputSink that keeps everything it is given, for assertions. */
export class RecordingSink implements OutputSink {
  readonly lines: string[] = [];
  readonly verifications: { runId: string; entry: LedgerEntry }[] = [];
  readonly cases: { index: number; total: number; title: string; status: CaseStatus }[] = [];

  info(msg: string): void {
    this.lines.push(`info: ${msg}`);
  }
  success(msg: string): void {
    this.lines.push(`success: ${msg}`);
  }
  warn(msg: string): void {
    this.lines.push(`warn: ${msg}`);
  }
  error(msg: string): void {
    this.lines.push(`error: ${msg}`);
  }
  testCase(index: number, total: number, title: string, status: CaseStatus): void {
    this.cases.push({ index, total, title, status });
  }
  verification(runId: string, entry: LedgerEntry): void {
    this.verifications.push({ runId, entry });
  }
  separator(): void {}
  log(msg: string): void {
    this.lines.push(msg);
  }
  debug(msg: string): void {
    this.lines.push(`debug: ${msg}`);
  }
}
