import { describe, expect, it } from "vitest";
import { formatFailureChain } from "../src/actions/result.js";
import { performDeviceUpgrade } from "../src/library/api/device-upgrade.js";
import {
  createObjectAndVerify,
  deleteObjectAndVerify,
  getObjectAndExpectNotFound,
  getObjectAndVerify,
  getObjectsByIdsAndVerify,
  requestByGetAndFailure,
  requestByGetAndSuccess,
  requestByPostAndSuccess,
} from "../src/library/api/objects.js";
import { createHarness } from "./support/harness.js";
import { BASE_URL, FakeObjectStore } from "./support/object-store.js";

function seeded(): FakeObjectStore {
  return new FakeObjectStore()
    .seed({ id: "3", name: "Apple iPhone 12 Mini", data: null })
    .seed({ id: "5", name: "Samsung Galaxy Z Fold2", data: { price: 689.99 } })
    .seed({ id: "10", name: "Apple iPad Mini 5th Gen", data: { capacity: "64 GB" } })
    .seed({ id: "11", name: "Apple iPad Air", data: null });
}

describe("status-level requests", () => {
  it("passes a GET that answers 200", async () => {
    const { context, ledger } = createHarness({ http: new FakeObjectStore() });

    const result = await requestByGetAndSuccess.execute(context, { url: BASE_URL });

    expect(result.outcome).toBe("success");
    expect(result.claim).toBe("status==200");
    expect(ledger.report().map((e) => e.outcome)).toEqual(["passed"]);
  });

  it("fails a GET that answers 500 and records it as the first failure", async () => {
    const store = new FakeObjectStore().respondWith("GET", BASE_URL, 500);
    const { context, ledger } = createHarness({ http: store });

    const result = await requestByGetAndSuccess.execute(context, { url: BASE_URL });

    expect(result.outcome === "failure" && result.failure.message).toBe("expected 200, got 500");
    expect(ledger.firstFailure()).toMatchObject({
      sequence: 1,
      action: "request_by_get_and_success",
      outcome: "failed",
      claim: "status==200",
    });
  });

  it("passes a GET on an unknown route when a non-200 is expected", async () => {
    const { context } = createHarness({ http: new FakeObjectStore() });

    const result = await requestByGetAndFailure.execute(context, { url: `${BASE_URL}/invalid_endpoint` });

    expect(result.outcome).toBe("success");
    expect(result.claim).toBe("status!=200");
  });

  it("fails the non-200 expectation when the server answers 200", async () => {
    const { context } = createHarness({ http: new FakeObjectStore() });

    const result = await requestByGetAndFailure.execute(context, { url: BASE_URL });

    expect(result.outcome === "failure" && result.failure.message).toBe("expected non-200, got 200");
  });

  it("accepts 201 for a POST", async () => {
    const store = new FakeObjectStore().respondWith("POST", BASE_URL, 201);
    const { context } = createHarness({ http: store });

    const result = await requestByPostAndSuccess.execute(context, { url: BASE_URL, body: { name: "x" } });

    expect(result.outcome).toBe("success");
    expect(store.calls[0].body).toEqual({ name: "x" });
  });
});

describe("get_objects_by_ids_and_verify", () => {
  it("sends one id parameter per id and matches the returned set", async () => {
    const store = seeded();
    const { context } = createHarness({ http: store });

    const result = await getObjectsByIdsAndVerify.execute(context, { url: BASE_URL, ids: ["3", "5", "10"] });

    expect(result.claim).toBe("status==200 && ids=={3,5,10}");
    expect(store.calls[0].ids).toEqual(["3", "5", "10"]);
    expect(result.outcome === "success" && result.value.map((o) => o.id)).toEqual(["3", "5", "10"]);
  });

  it("records the ids that were requested, not later edits to them", async () => {
    const { context, ledger } = createHarness({ http: seeded() });
    const input = { url: BASE_URL, ids: ["3"] };

    await getObjectsByIdsAndVerify.execute(context, input);
    input.ids.push("999");

    expect(ledger.report()[0].input).toEqual({ url: BASE_URL, ids: ["3"] });
  });

  it("reports the id sets when an object is missing", async () => {
    const store = new FakeObjectStore()
      .seed({ id: "3", name: "a", data: null })
      .seed({ id: "5", name: "b", data: null });
    const { context } = createHarness({ http: store });

    const result = await getObjectsByIdsAndVerify.execute(context, { url: BASE_URL, ids: ["3", "5", "10"] });

    expect(result.outcome === "failure" && result.failure.message).toBe(
      "expected ids {10,3,5}, got ids {3,5}",
    );
  });
});

describe("object lifecycle actions", () => {
  it("creates an object and produces the stored record", async () => {
    const { context } = createHarness({ http: new FakeObjectStore() });

    const result = await createObjectAndVerify.execute(context, {
      url: BASE_URL,
      name: "iPhone 12",
      data: { color: "Blue" },
    });

    expect(result.claim).toBe('status in [200, 201] && created "iPhone 12" with matching data');
    expect(result.outcome === "success" && result.value).toEqual({
      id: "obj-1",
      name: "iPhone 12",
      data: { color: "Blue" },
    });
  });

  it("fails creation when the echoed record has no id", async () => {
    const store = new FakeObjectStore().respondWith("POST", BASE_URL, 201);
    const { context } = createHarness({ http: store });

    const result = await createObjectAndVerify.execute(context, { url: BASE_URL, name: "iPhone 12", data: null });

    expect(result.outcome === "failure" && result.failure.message).toBe(
      "expected an object with an id, got malformed body (id: Required)",
    );
  });

  it("checks the name of a fetched object", async () => {
    const store = new FakeObjectStore().seed({ id: "7", name: "Pixel", data: null });
    const { context } = createHarness({ http: store });

    const result = await getObjectAndVerify.execute(context, { url: BASE_URL, id: "7", expectedName: "iPhone" });

    expect(result.claim).toBe('status==200 && id==7 && name=="iPhone"');
    expect(result.outcome === "failure" && result.failure.message).toBe(
      'expected name "iPhone", got name "Pixel"',
    );
  });

  it("deletes an object and then sees it gone", async () => {
    const store = new FakeObjectStore().seed({ id: "7", name: "Pixel", data: null });
    const { context, ledger } = createHarness({ http: store });

    const deleted = await deleteObjectAndVerify.execute(context, { url: `${BASE_URL}/`, id: "7" });
    const gone = await getObjectAndExpectNotFound.execute(context, { url: BASE_URL, id: "7" });

    expect(store.calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      `DELETE ${BASE_URL}/7`,
      `GET ${BASE_URL}/7`,
    ]);
    expect(deleted.outcome === "success" && deleted.value).toBe("7");
    expect(gone.claim).toBe("object 7 is gone (status==404)");
    expect(ledger.report().map((e) => e.outcome)).toEqual(["passed", "passed"]);
  });
});

describe("perform_device_upgrade", () => {
  const input = { url: BASE_URL, oldDeviceId: "old-1", newDeviceName: "iPhone 15" };

  function withOldPhone(): FakeObjectStore {
    return new FakeObjectStore().seed({
      id: "old-1",
      name: "iPhone 12",
      data: { color: "Blue", storage: "64GB" },
    });
  }

  it("moves the data to a new device and removes the old one", async () => {
    const store = withOldPhone();
    const { context, ledger } = createHarness({ http: store });

    const result = await performDeviceUpgrade.execute(context, input);

    expect(result.outcome === "success" && result.value).toEqual({
      id: "obj-1",
      name: "iPhone 15",
      data: { color: "Blue", storage: "64GB" },
    });
    expect(result.claim).toBe(
      [
        "status==200 && id==old-1",
        'status in [200, 201] && created "iPhone 15" with matching data',
        "deleted old-1 (status in [200, 204])",
        "object old-1 is gone (status==404)",
      ].join(" && "),
    );
    expect(store.has("old-1")).toBe(false);
    expect(ledger.report()).toHaveLength(4);
  });

  it("stops at a failed delete and names it in the chain", async () => {
    const store = withOldPhone().respondWith("DELETE", `${BASE_URL}/old-1`, 500);
    const { context } = createHarness({ http: store });

    const result = await performDeviceUpgrade.execute(context, input);

    expect(result.outcome === "failure" && formatFailureChain(result)).toBe(
      "perform_device_upgrade → delete_object_and_verify → VerificationFailure(expected 200 or 204, got 500)",
    );
    expect(store.calls.map((c) => c.method)).toEqual(["GET", "POST", "DELETE"]);
  });

  it("fails on the first step when the old device does not exist", async () => {
    const { context } = createHarness({ http: new FakeObjectStore() });

    const result = await performDeviceUpgrade.execute(context, input);

    expect(result.path).toEqual(["perform_device_upgrade", "get_object_and_verify"]);
    expect(result.outcome === "failure" && result.failure.message).toBe("expected 200, got 404");
  });
});
