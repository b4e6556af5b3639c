import { describe, expect, it } from "vitest";
import { step } from "../src/actions/composite.js";
import { createTestLayer } from "../src/actions/test-layer.js";
import { ActionFailure } from "../src/errors.js";
import { createObjectAndVerify, requestByGetAndSuccess } from "../src/library/api/objects.js";
import { createHarness } from "./support/harness.js";
import { BASE_URL, FakeObjectStore } from "./support/object-store.js";

describe("createTestLayer", () => {
  it("hands back the produced value", async () => {
    const { context } = createHarness({ http: new FakeObjectStore() });
    const t = createTestLayer(context);

    const response = await t.perform(requestByGetAndSuccess, { url: BASE_URL });

    expect(response.status).toBe(200);
  });

  it("throws an ActionFailure carrying the chain", async () => {
    const store = new FakeObjectStore().respondWith("GET", BASE_URL, 500);
    const { context } = createHarness({ http: store });
    const t = createTestLayer(context);

    const error = await t.perform(requestByGetAndSuccess, { url: BASE_URL }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ActionFailure);
    if (!(error instanceof ActionFailure)) return;
    expect(error.chain).toBe("request_by_get_and_success → VerificationFailure(expected 200, got 500)");
    expect(error.message).toBe(
      "request_by_get_and_success → VerificationFailure(expected 200, got 500)\n" +
        "  claim: status==200\n" +
        "  detail: expected 200, got 500",
    );
  });

  it("stores a step's value in the test scope", async () => {
    const { context } = createHarness({ http: new FakeObjectStore() });
    const t = createTestLayer(context);
    const create = step(
      createObjectAndVerify,
      (env: { url: string }) => ({ url: env.url, name: "Tablet", data: null }),
      { store: "tablet" },
    );

    const value = await t.run(create, { url: BASE_URL });

    expect(value).toEqual({ id: "obj-1", name: "Tablet", data: null });
    expect(context.state.keys()).toEqual(["test/tablet"]);
  });
});
