import fs from "fs/promises";
import path from "path";
import type { SuiteReport, TestCaseReport } from "@daa/shared";
import type { OutputSink } from "../output-sink.js";

/**
 * Writes the report as JSON under `dir` and returns the file path.
 */
export async function saveReport(report: SuiteReport, dir: string): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const stamp = report.timestamp.replace(/[:.]/g, "-");
  const filePath = path.resolve(dir, `${report.suite}_${stamp}.json`);
  await fs.writeFile(filePath, JSON.stringify(report, null, 2) + "\n", "utf8");
  return filePath;
}

export function printReportSummary(report: SuiteReport, sink: OutputSink): void {
  sink.log(`\n  Suite: ${report.title} (${report.suite})`);
  sink.log(`  Time: ${report.timestamp}\n`);

  report.cases.forEach((c, i) => printCaseLine(i, report.cases.length, c, (msg) => sink.log(msg)));

  sink.log(`\n  Duration: ${(report.durationMs / 1000).toFixed(1)}s`);
}

function printCaseLine(
  index: number,
  total: number,
  testCase: TestCaseReport,
  log: (msg: string) => void,
): void {
  const title = testCase.title.length > 70 ? testCase.title.slice(0, 67) + "..." : testCase.title;
  log(`  [${index + 1}/${total}] ${testCase.verdict.toUpperCase()} ${title}`);

  if (testCase.failure) {
    log(`         Chain:  ${testCase.failure.chain}`);
    log(`         Claim:  ${testCase.failure.claim}`);
    log(`         Detail: ${testCase.failure.detail}`);
  }
}

export function buildSummaryMessage(report: SuiteReport): string {
  const { passed, failed, aborted } = report.counts;

  const lines: string[] = [
    `Suite: ${report.title}`,
    `Verdict: ${report.verdict.toUpperCase()}`,
    `Cases: ${passed} passed, ${failed} failed, ${aborted} aborted`,
    `Duration: ${(report.durationMs / 1000).toFixed(1)}s`,
    "",
  ];

  report.cases.forEach((c, i) => {
    lines.push(`  ${i + 1}. [${c.verdict.toUpperCase()}] ${c.title}`);
    if (c.failure) {
      lines.push(`     Failed: ${c.failure.action} [${c.failure.claim}]`);
      lines.push(`     Chain: ${c.failure.chain}`);
      lines.push(`     Detail: ${c.failure.detail}`);
    }
  });

  return lines.join("\n");
}
