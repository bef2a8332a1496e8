import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { companyName, DEFAULT_COMPANIES, normalizeTicker } from "../universe";

describe("company universe", () => {
  it("has ten unique upper-case tickers", () => {
    const tickers = DEFAULT_COMPANIES.map((c) => c.ticker);
    assert.equal(tickers.length, 10);
    assert.equal(new Set(tickers).size, 10);
    assert.ok(tickers.every((t) => t === normalizeTicker(t)));
  });

  it("looks up names case-insensitively", () => {
    assert.equal(companyName(" aapl "), "Apple Inc.");
    assert.equal(companyName("ZZZZ"), undefined);
  });
});
