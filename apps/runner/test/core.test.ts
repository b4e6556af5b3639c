import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/index.js";
import { createLeaseFactory } from "../src/core.js";
import { FetchHttpBackend } from "../src/physical/http.js";
import { ScriptedStorefront } from "./support/storefront-page.js";

function fakePool() {
  const acquired: string[] = [];
  const released: string[] = [];
  const pool = {
    acquire: async (runId: string) => {
      acquired.push(runId);
      return {
        backend: new ScriptedStorefront(),
        release: async () => {
          released.push(runId);
        },
      };
    },
  };
  return { pool, acquired, released };
}

describe("createLeaseFactory", () => {
  it("binds only an HTTP backend for API suites", async () => {
    const { pool, acquired } = fakePool();
    const lease = createLeaseFactory(loadConfig({}), pool);

    const bound = await lease("objects-api-1-x", ["http"]);

    expect(bound.backends.http).toBeInstanceOf(FetchHttpBackend);
    expect(bound.backends.web).toBeUndefined();
    expect(acquired).toEqual([]);
    await bound.release();
  });

  it("leases a browser per run and hands it back on release", async () => {
    const { pool, acquired, released } = fakePool();
    const lease = createLeaseFactory(loadConfig({}), pool);

    const bound = await lease("storefront-1-x", ["web"]);
    expect(bound.backends.web).toBeInstanceOf(ScriptedStorefront);
    expect(acquired).toEqual(["storefront-1-x"]);

    await bound.release();
    expect(released).toEqual(["storefront-1-x"]);
  });
});
