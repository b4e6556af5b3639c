import { describe, expect, it } from "vitest";
import { createRegistry } from "../src/core.js";
import { StorefrontSelectors as S } from "../src/library/web/storefront-selectors.js";
import { preflightSuite, runSuite, type LeaseFactory } from "../src/runner/test-runner.js";
import { deviceUpgradeSuite } from "../src/suites/device-upgrade.js";
import { findSuite, suites } from "../src/suites/index.js";
import { storefrontSuite } from "../src/suites/storefront.js";
import type { SuiteEnv } from "../src/suites/types.js";
import { FIXED_NOW } from "./support/harness.js";
import { BASE_URL, FakeObjectStore } from "./support/object-store.js";
import { RecordingSink } from "./support/recording-sink.js";
import { ScriptedStorefront } from "./support/storefront-page.js";

const env: SuiteEnv = { apiUrl: BASE_URL, storefrontUrl: "https://shop.test/", storefrontBrand: "Shop.test" };

describe("bundled suites", () => {
  it("only reference registered actions", () => {
    const registry = createRegistry();
    for (const suite of suites) {
      expect(() => preflightSuite(suite, registry)).not.toThrow();
    }
  });

  it("are found by id", () => {
    expect(findSuite("device-upgrade")).toBe(deviceUpgradeSuite);
    expect(findSuite("nope")).toBeUndefined();
  });

  it("runs the device upgrade flow end to end", async () => {
    const store = new FakeObjectStore();
    const lease: LeaseFactory = async () => ({ backends: { http: store }, release: async () => {} });

    const report = await runSuite(deviceUpgradeSuite, {
      env,
      lease,
      sink: new RecordingSink(),
      timeoutMs: 5000,
      clock: () => new Date(FIXED_NOW),
    });

    expect(report.verdict).toBe("pass");
    expect(report.cases[0].entries.map((e) => e.action)).toEqual([
      "create_object_and_verify",
      "get_object_and_verify",
      "create_object_and_verify",
      "delete_object_and_verify",
      "get_object_and_expect_not_found",
      "get_object_and_verify",
      "delete_object_and_verify",
    ]);
    expect(store.has("obj-1")).toBe(false);
    expect(store.has("obj-2")).toBe(false);
  });

  it("runs a storefront search case against a scripted page", async () => {
    const page = new ScriptedStorefront();
    page.titlesAfterGoto.set("https://shop.test/", "Shop.test: Online Shopping");
    page.counts.set(S.searchResultItem, 12);
    const lease: LeaseFactory = async () => ({ backends: { web: page }, release: async () => {} });
    const searchOnly = { ...storefrontSuite, cases: [storefrontSuite.cases[0]] };

    const report = await runSuite(searchOnly, {
      env,
      lease,
      sink: new RecordingSink(),
      timeoutMs: 5000,
      registry: createRegistry(),
    });

    expect(report.verdict).toBe("pass");
    expect(report.cases[0].entries.map((e) => e.claim)).toEqual([
      'title contains "Shop.test"',
      'search box holds "iPhone 15"',
      "result list rendered",
      "count>0",
    ]);
  });
});
