import assert from "node:assert/strict";
import test from "node:test";
import axios, { AxiosError, AxiosHeaders } from "axios";
import { decodeCatalog, fetchCatalog } from "./catalog";
import { DecodeError, HttpError } from "./errors";

const RAW_CATALOG = [
  {
    id: "todo",
    id_location: null,
    group: "restriction",
    level: "allow",
    version: "1.40.0",
    docs: "Checks for usage of `todo!`."
  },
  {
    id: "should_assert_eq",
    group: "deprecated",
    level: "none",
    version: "pre 1.29.0"
  }
];

test("decodeCatalog maps level to default_level and ignores unknown fields", () => {
  assert.deepEqual(decodeCatalog(RAW_CATALOG), [
    { id: "todo", group: "restriction", default_level: "allow", version: "1.40.0" },
    { id: "should_assert_eq", group: "deprecated", default_level: "none", version: "pre 1.29.0" }
  ]);
});

test("decodeCatalog requires an array root", () => {
  assert.throws(() => decodeCatalog({ lints: [] }), {
    message: "Invalid lint catalog: root must be a JSON array"
  });
});

test("decodeCatalog rejects an unknown group", () => {
  assert.throws(
    () => decodeCatalog([{ id: "x", group: "Style", level: "warn", version: "1.0.0" }]),
    (error: unknown) =>
      error instanceof DecodeError && error.message === "Invalid lint catalog: entry 0: unknown group \"Style\""
  );
});

test("decodeCatalog rejects an unknown level", () => {
  assert.throws(
    () =>
      decodeCatalog([
        { id: "x", group: "style", level: "warn", version: "1.0.0" },
        { id: "y", group: "style", level: "forbid", version: "1.0.0" }
      ]),
    { message: "Invalid lint catalog: entry 1: unknown level \"forbid\"" }
  );
});

test("decodeCatalog rejects entries with missing fields", () => {
  assert.throws(() => decodeCatalog([{ group: "style", level: "warn", version: "1.0.0" }]), {
    message: "Invalid lint catalog: entry 0: \"id\" must be a string"
  });
  assert.throws(() => decodeCatalog([{ id: "x", group: "style", level: "warn" }]), {
    message: "Invalid lint catalog: entry 0: \"version\" must be a string"
  });
  assert.throws(() => decodeCatalog(["x"]), {
    message: "Invalid lint catalog: entry 0 must be a JSON object"
  });
});

test("fetchCatalog requests the URL with the configured timeout", async (t) => {
  const calls: Array<{ url: string; timeout: unknown }> = [];
  t.mock.method(axios, "get", async (url: string, config: { timeout?: number }) => {
    calls.push({ url, timeout: config.timeout });
    return { data: RAW_CATALOG, status: 200 };
  });

  const catalog = await fetchCatalog("https://catalog.test/lints.json", 1500);

  assert.deepEqual(calls, [{ url: "https://catalog.test/lints.json", timeout: 1500 }]);
  assert.deepEqual(
    catalog.map((item) => item.id),
    ["todo", "should_assert_eq"]
  );
});

test("fetchCatalog reports the HTTP status of a failed request", async (t) => {
  const headers = new AxiosHeaders();
  t.mock.method(axios, "get", async () => {
    throw new AxiosError("Request failed with status code 404", AxiosError.ERR_BAD_REQUEST, undefined, undefined, {
      data: "not found",
      status: 404,
      statusText: "Not Found",
      headers: {},
      config: { headers }
    });
  });

  await assert.rejects(fetchCatalog("https://catalog.test/missing.json", 1000), (error: unknown) => {
    assert.ok(error instanceof HttpError);
    assert.equal(error.status, 404);
    assert.equal(error.url, "https://catalog.test/missing.json");
    assert.equal(
      error.message,
      "Failed to fetch lint catalog from https://catalog.test/missing.json: Request failed with status code 404"
    );
    return true;
  });
});

test("fetchCatalog wraps non-HTTP failures without a status", async (t) => {
  t.mock.method(axios, "get", async () => {
    throw new Error("socket hang up");
  });

  await assert.rejects(fetchCatalog("https://catalog.test/lints.json", 1000), (error: unknown) => {
    assert.ok(error instanceof HttpError);
    assert.equal(error.status, undefined);
    assert.equal(error.message, "Failed to fetch lint catalog from https://catalog.test/lints.json: socket hang up");
    return true;
  });
});

test("fetchCatalog rejects a body that is not a lint array", async (t) => {
  t.mock.method(axios, "get", async () => ({ data: "<html></html>", status: 200 }));

  await assert.rejects(fetchCatalog("https://catalog.test/lints.json", 1000), DecodeError);
});
