import fs from "fs/promises";
import os from "os";
import path from "path";
import type { SuiteReport } from "@daa/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildSummaryMessage, printReportSummary, saveReport } from "../src/runner/test-report.js";
import { RecordingSink } from "./support/recording-sink.js";

function sampleReport(): SuiteReport {
  return {
    suite: "device-upgrade",
    title: "Device upgrade",
    timestamp: "2026-01-01T00:00:00.000Z",
    verdict: "partial",
    counts: { passed: 1, failed: 1, aborted: 0 },
    durationMs: 2345,
    summary: "",
    cases: [
      {
        title: "Create a device",
        runId: "device-upgrade-1-x",
        verdict: "pass",
        startedAt: "2026-01-01T00:00:00.000Z",
        durationMs: 400,
        entries: [],
      },
      {
        title: "Upgrade a device",
        runId: "device-upgrade-2-x",
        verdict: "fail",
        startedAt: "2026-01-01T00:00:01.000Z",
        durationMs: 1900,
        entries: [],
        failure: {
          chain: "perform_device_upgrade → delete_object_and_verify → VerificationFailure(expected 200 or 204, got 500)",
          action: "delete_object_and_verify",
          claim: "deleted old-1 (status in [200, 204])",
          detail: "expected 200 or 204, got 500",
        },
      },
    ],
  };
}

describe("buildSummaryMessage", () => {
  it("lists the verdict, counts and each failure", () => {
    expect(buildSummaryMessage(sampleReport())).toBe(
      [
        "Suite: Device upgrade",
        "Verdict: PARTIAL",
        "Cases: 1 passed, 1 failed, 0 aborted",
        "Duration: 2.3s",
        "",
        "  1. [PASS] Create a device",
        "  2. [FAIL] Upgrade a device",
        "     Failed: delete_object_and_verify [deleted old-1 (status in [200, 204])]",
        "     Chain: perform_device_upgrade → delete_object_and_verify → VerificationFailure(expected 200 or 204, got 500)",
        "     Detail: expected 200 or 204, got 500",
      ].join("\n"),
    );
  });
});

describe("printReportSummary", () => {
  it("prints one line per case and the failure details", () => {
    const sink = new RecordingSink();

    printReportSummary(sampleReport(), sink);

    expect(sink.lines).toEqual([
      "\n  Suite: Device upgrade (device-upgrade)",
      "  Time: 2026-01-01T00:00:00.000Z\n",
      "  [1/2] PASS Create a device",
      "  [2/2] FAIL Upgrade a device",
      "         Chain:  perform_device_upgrade → delete_object_and_verify → VerificationFailure(expected 200 or 204, got 500)",
      "         Claim:  deleted old-1 (status in [200, 204])",
      "         Detail: expected 200 or 204, got 500",
      "\n  Duration: 2.3s",
    ]);
  });
});

describe("saveReport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "daa-report-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes the report as JSON named after the suite and time", async () => {
    const report = sampleReport();

    const file = await saveReport(report, path.join(dir, "nested"));

    expect(path.basename(file)).toBe("device-upgrade_2026-01-01T00-00-00-000Z.json");
    const written = await fs.readFile(file, "utf8");
    expect(written.endsWith("}\n")).toBe(true);
    expect(JSON.parse(written)).toEqual(report);
  });
});
