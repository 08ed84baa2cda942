import assert from "node:assert/strict";
import { test } from "node:test";
import { LazyArtifact } from "./lazy-artifact.ts";

test("LazyArtifact - state machine", async (t) => {
  await t.test("computes once and caches", () => {
    let calls = 0;
    const a = new LazyArtifact(false, () => ++calls);
    assert.deepEqual(a.state, { status: "unset" });
    assert.equal(a.read(), 1);
    assert.equal(a.read(), 1);
    assert.equal(calls, 1);
    assert.deepEqual(a.state, { status: "computed", value: 1 });
  });

  await t.test("alwaysRefresh recomputes on every read", () => {
    let calls = 0;
    const a = new LazyArtifact(true, () => ++calls);
    assert.equal(a.read(), 1);
    assert.equal(a.read(), 2);
    assert.equal(a.peek(), 2);
  });

  await t.test("reset demotes to unset", () => {
    const a = new LazyArtifact<string>();
    a.set("x");
    assert.equal(a.isComputed, true);
    a.reset();
    assert.equal(a.isComputed, false);
    assert.equal(a.peek(), undefined);
  });

  await t.test("read without any compute function throws when unset", () => {
    const a = new LazyArtifact<number>();
    assert.throws(() => a.read(), /no value and no compute function/);
    assert.equal(a.read(() => 7), 7);
  });
});
