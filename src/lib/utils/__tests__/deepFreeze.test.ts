import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { deepFreeze } from "../deepFreeze";

describe("deepFreeze", () => {
  it("freezes nested objects and arrays in place", () => {
    const table = { bands: [{ min: 1, points: 10 }], meta: { name: "liquidity" } };
    const frozen = deepFreeze(table);

    assert.equal(frozen, table);
    assert.ok(Object.isFrozen(table));
    assert.ok(Object.isFrozen(table.bands));
    assert.ok(Object.isFrozen(table.bands[0]));
    assert.ok(Object.isFrozen(table.meta));
  });

  it("passes primitives through", () => {
    assert.equal(deepFreeze(5), 5);
    assert.equal(deepFreeze(null), null);
  });
});
