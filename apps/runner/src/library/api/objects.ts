import { isDeepStrictEqual } from "node:util";
import { z } from "zod";
import { defineAtomic } from "../../actions/atomic.js";
import { expectThat, fail, pass } from "../../actions/result.js";
import type { Verdict } from "../../actions/types.js";
import type { HttpResponse, QueryParams } from "../../physical/types.js";

// ── Object store records ─────────────────────────────────────────────

export const objectDataSchema = z.record(z.unknown()).nullable();

export const objectRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  data: objectDataSchema.optional(),
});

export type ObjectData = z.infer<typeof objectDataSchema>;
export type ObjectRecord = z.infer<typeof objectRecordSchema>;

export interface GetRequest {
  url: string;
  params?: QueryParams;
  headers?: Record<string, string>;
}

export interface BodyRequest {
  url: string;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface DeleteRequest {
  url: string;
  headers?: Record<string, string>;
}

export interface ObjectRef {
  url: string;
  id: string;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string };

function parseBody<T>(response: HttpResponse, schema: z.ZodType<T>): Parsed<T> {
  let json: unknown;
  try {
    json = JSON.parse(response.body);
  } catch {
    return { ok: false, reason: `non-JSON body ${JSON.stringify(response.body.slice(0, 80))}` };
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, reason: `malformed body (${issue.path.join(".") || "root"}: ${issue.message})` };
  }
  return { ok: true, value: parsed.data };
}

function record(response: HttpResponse): ObjectRecord {
  return objectRecordSchema.parse(JSON.parse(response.body));
}

function objectUrl(ref: ObjectRef): string {
  return `${ref.url.replace(/\/+$/, "")}/${encodeURIComponent(ref.id)}`;
}

function statusIn(response: HttpResponse, accepted: readonly number[]): Verdict {
  return expectThat(accepted.includes(response.status), accepted.join(" or "), String(response.status));
}

function show(value: unknown): string {
  return JSON.stringify(value) ?? "undefined";
}

// ── Status-level requests ────────────────────────────────────────────

export const requestByGetAndSuccess = defineAtomic({
  name: "request_by_get_and_success",
  operation: "get",
  claim: "status==200",
  perform: (adapter, input: GetRequest) =>
    adapter.get(input.url, { params: input.params, headers: input.headers }),
  verify: (response) => statusIn(response, [200]),
});

export const requestByGetAndFailure = defineAtomic({
  name: "request_by_get_and_failure",
  operation: "get",
  claim: "status!=200",
  perform: (adapter, input: GetRequest) =>
    adapter.get(input.url, { params: input.params, headers: input.headers }),
  verify: (response) => expectThat(response.status !== 200, "non-200", String(response.status)),
});

export const requestByPostAndSuccess = defineAtomic({
  name: "request_by_post_and_success",
  operation: "post",
  claim: "status in [200, 201]",
  perform: (adapter, input: BodyRequest) =>
    adapter.post(input.url, { body: input.body, headers: input.headers }),
  verify: (response) => statusIn(response, [200, 201]),
});

export const requestByPutAndSuccess = defineAtomic({
  name: "request_by_put_and_success",
  operation: "put",
  claim: "status==200",
  perform: (adapter, input: BodyRequest) =>
    adapter.put(input.url, { body: input.body, headers: input.headers }),
  verify: (response) => statusIn(response, [200]),
});

export const requestByDeleteAndSuccess = defineAtomic({
  name: "request_by_delete_and_success",
  operation: "delete",
  claim: "status in [200, 204]",
  perform: (adapter, input: DeleteRequest) => adapter.delete(input.url, { headers: input.headers }),
  verify: (response) => statusIn(response, [200, 204]),
});

// ── Object-level actions ─────────────────────────────────────────────

export interface IdsQuery {
  url: string;
  ids: readonly string[];
}

/** GET with one `id` query parameter per id; the returned id set must equal `ids`. */
export const getObjectsByIdsAndVerify = defineAtomic({
  name: "get_objects_by_ids_and_verify",
  operation: "get",
  claim: (input: IdsQuery) => `status==200 && ids=={${input.ids.join(",")}}`,
  perform: (adapter, input: IdsQuery) =>
    adapter.get(input.url, { params: input.ids.map((id): [string, string] => ["id", id]) }),
  verify: (response, input) => {
    if (response.status !== 200) return fail("200", String(response.status));
    const body = parseBody(response, z.array(z.object({ id: z.string() }).passthrough()).nullable());
    if (!body.ok) return fail("a list of objects", body.reason);

    const expected = [...new Set(input.ids)].sort();
    const returned = [...new Set((body.value ?? []).map((item) => item.id))].sort();
    return expectThat(
      isDeepStrictEqual(returned, expected),
      `ids {${expected.join(",")}}`,
      `ids {${returned.join(",")}}`,
    );
  },
  produce: (response) => z.array(objectRecordSchema).parse(JSON.parse(response.body) ?? []),
});

export interface CreateObjectInput {
  url: string;
  name: string;
  data: ObjectData;
}

/** POST `{name, data}`; the echoed record must carry an id and the same name and data. */
export const createObjectAndVerify = defineAtomic({
  name: "create_object_and_verify",
  operation: "post",
  claim: (input: CreateObjectInput) => `status in [200, 201] && created "${input.name}" with matching data`,
  perform: (adapter, input: CreateObjectInput) =>
    adapter.post(input.url, { body: { name: input.name, data: input.data } }),
  verify: (response, input) => {
    const status = statusIn(response, [200, 201]);
    if (!status.passed) return status;
    const body = parseBody(response, objectRecordSchema);
    if (!body.ok) return fail("an object with an id", body.reason);
    if (body.value.name !== input.name) {
      return fail(`name ${show(input.name)}`, `name ${show(body.value.name)}`);
    }
    const data = body.value.data ?? null;
    return expectThat(isDeepStrictEqual(data, input.data), `data ${show(input.data)}`, `data ${show(data)}`);
  },
  produce: (response) => record(response),
});

export interface GetObjectInput extends ObjectRef {
  expectedName?: string;
  expectedData?: ObjectData;
}

/** GET `<url>/<id>`; the record's id must match, and name and data when given. */
export const getObjectAndVerify = defineAtomic({
  name: "get_object_and_verify",
  operation: "get",
  claim: (input: GetObjectInput) => {
    const parts = ["status==200", `id==${input.id}`];
    if (input.expectedName !== undefined) parts.push(`name==${show(input.expectedName)}`);
    if (input.expectedData !== undefined) parts.push("data matches");
    return parts.join(" && ");
  },
  perform: (adapter, input: GetObjectInput) => adapter.get(objectUrl(input)),
  verify: (response, input) => {
    const status = statusIn(response, [200]);
    if (!status.passed) return status;
    const body = parseBody(response, objectRecordSchema);
    if (!body.ok) return fail(`object ${input.id}`, body.reason);
    if (body.value.id !== input.id) return fail(`id ${input.id}`, `id ${body.value.id}`);
    if (input.expectedName !== undefined && body.value.name !== input.expectedName) {
      return fail(`name ${show(input.expectedName)}`, `name ${show(body.value.name)}`);
    }
    if (input.expectedData !== undefined) {
      const data = body.value.data ?? null;
      return expectThat(
        isDeepStrictEqual(data, input.expectedData),
        `data ${show(input.expectedData)}`,
        `data ${show(data)}`,
      );
    }
    return pass();
  },
  produce: (response) => record(response),
});

export const deleteObjectAndVerify = defineAtomic({
  name: "delete_object_and_verify",
  operation: "delete",
  claim: (input: ObjectRef) => `deleted ${input.id} (status in [200, 204])`,
  perform: (adapter, input: ObjectRef) => adapter.delete(objectUrl(input)),
  verify: (response) => statusIn(response, [200, 204]),
  produce: (_response, input) => input.id,
});

export const getObjectAndExpectNotFound = defineAtomic({
  name: "get_object_and_expect_not_found",
  operation: "get",
  claim: (input: ObjectRef) => `object ${input.id} is gone (status==404)`,
  perform: (adapter, input: ObjectRef) => adapter.get(objectUrl(input)),
  verify: (response) => statusIn(response, [404]),
  produce: (_response, input) => input.id,
});

export const objectActions = [
  requestByGetAndSuccess,
  requestByGetAndFailure,
  requestByPostAndSuccess,
  requestByPutAndSuccess,
  requestByDeleteAndSuccess,
  getObjectsByIdsAndVerify,
  createObjectAndVerify,
  getObjectAndVerify,
  deleteObjectAndVerify,
  getObjectAndExpectNotFound,
] as const;
