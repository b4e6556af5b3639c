import { describe, expect, it } from "vitest";
import { VerificationLedger } from "../src/actions/ledger.js";
import { LedgerStateError } from "../src/errors.js";

const clock = () => new Date("2026-03-04T05:06:07.000Z");

function record(action: string, outcome: "passed" | "failed" | "aborted" = "passed") {
  return { action, input: { n: 1 }, outcome, claim: `${action} ok` };
}

describe("VerificationLedger", () => {
  it("starts empty and only records after open()", () => {
    const ledger = new VerificationLedger("run-1", clock);
    expect(ledger.state).toBe("empty");
    expect(() => ledger.append(record("a"))).toThrow(LedgerStateError);

    ledger.open();
    expect(ledger.state).toBe("recording");
    const entry = ledger.append(record("a"));
    expect(entry).toEqual({
      action: "a",
      input: { n: 1 },
      outcome: "passed",
      claim: "a ok",
      sequence: 1,
      recordedAt: "2026-03-04T05:06:07.000Z",
    });
  });

  it("keeps the input as it was when the entry was recorded", () => {
    const ledger = new VerificationLedger("run-1", clock);
    ledger.open();
    const input = { ids: ["3"] };
    ledger.append({ action: "lookup", input, outcome: "passed", claim: "ids=={3}" });

    input.ids.push("999");

    expect(ledger.report()[0].input).toEqual({ ids: ["3"] });
  });

  it("numbers entries in append order and freezes them", () => {
    const ledger = new VerificationLedger("run-1", clock);
    ledger.open();
    ledger.append(record("a"));
    ledger.append(record("b"));
    const [first, second] = ledger.report();
    expect(first.sequence).toBe(1);
    expect(second.sequence).toBe(2);
    expect(Object.isFrozen(second)).toBe(true);
  });

  it("report() returns a copy the caller cannot use to rewrite history", () => {
    const ledger = new VerificationLedger("run-1", clock);
    ledger.open();
    ledger.append(record("a"));
    const copy = [...ledger.report()];
    copy.pop();
    expect(ledger.report()).toHaveLength(1);
  });

  it("firstFailure() finds the first failed or aborted entry", () => {
    const ledger = new VerificationLedger("run-1", clock);
    ledger.open();
    expect(ledger.firstFailure()).toBeUndefined();
    ledger.append(record("a"));
    ledger.append(record("b", "failed"));
    ledger.append(record("c", "aborted"));
    expect(ledger.firstFailure()?.action).toBe("b");
  });

  it("recordAbort() appends an aborted run entry", () => {
    const ledger = new VerificationLedger("run-1", clock);
    ledger.open();
    const entry = ledger.recordAbort('"case" timed out after 10ms');
    expect(entry.action).toBe("run");
    expect(entry.outcome).toBe("aborted");
    expect(entry.failure).toEqual({
      type: "transport",
      kind: "aborted",
      operation: "run",
      message: '"case" timed out after 10ms',
    });
  });

  it("permits only report() once closed", () => {
    const ledger = new VerificationLedger("run-1", clock);
    ledger.open();
    ledger.append(record("a"));
    ledger.close();

    expect(ledger.state).toBe("closed");
    expect(ledger.report()).toHaveLength(1);
    expect(() => ledger.append(record("b"))).toThrow(LedgerStateError);
    expect(() => ledger.firstFailure()).toThrow(LedgerStateError);
    expect(() => ledger.recordAbort("late")).toThrow(LedgerStateError);
    expect(() => ledger.open()).toThrow(LedgerStateError);
    expect(() => ledger.close()).toThrow(LedgerStateError);
  });
});
