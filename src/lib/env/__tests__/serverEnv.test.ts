import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { requireStatementsApi, serverEnv } from "../server";

describe("serverEnv", () => {
  it("applies defaults to an empty environment", () => {
    assert.deepEqual(serverEnv({}), {
      PIPELINE_CONCURRENCY: 4,
      HTTP_TIMEOUT_MS: 10_000,
      DUPLICATE_LABEL_POLICY: "alias_priority",
      QUICK_RATIO_POLICY: "current_assets",
    });
  });

  it("coerces numeric settings", () => {
    const env = serverEnv({ PIPELINE_CONCURRENCY: "8", HTTP_TIMEOUT_MS: "2500" });
    assert.equal(env.PIPELINE_CONCURRENCY, 8);
    assert.equal(env.HTTP_TIMEOUT_MS, 2500);
  });

  it("rejects an unknown policy", (t) => {
    t.mock.method(console, "error", () => undefined);
    assert.throws(
      () => serverEnv({ DUPLICATE_LABEL_POLICY: "random" }),
      /Invalid server environment variables/,
    );
  });

  it("rejects concurrency out of range", (t) => {
    t.mock.method(console, "error", () => undefined);
    assert.throws(() => serverEnv({ PIPELINE_CONCURRENCY: "0" }), /Invalid server environment variables/);
  });
});

describe("requireStatementsApi", () => {
  it("returns the provider settings", () => {
    const env = serverEnv({ STATEMENTS_API_URL: "https://statements.test", STATEMENTS_API_KEY: "test-secret" });
    assert.deepEqual(requireStatementsApi(env), {
      baseUrl: "https://statements.test",
      apiKey: "test-secret",
      timeoutMs: 10_000,
    });
  });

  it("requires a base URL", () => {
    assert.throws(() => requireStatementsApi(serverEnv({})), {
      message: "STATEMENTS_API_URL is required to fetch statements over HTTP",
    });
  });
});
