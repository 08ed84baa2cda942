import assert from "node:assert/strict";
import { test } from "node:test";
import { jsonSerializableParams, paramsToRecord } from "./params.ts";

class FileProduct {
  constructor(readonly path: string) {}
  toJsonSerializable() {
    return this.path;
  }
}

class MetaProduct {
  constructor(readonly products: Record<string, FileProduct>) {}
  toJsonSerializable() {
    return Object.fromEntries(
      Object.entries(this.products).map(([k, v]) => [k, v.toJsonSerializable()]),
    );
  }
}

test("jsonSerializableParams", async (t) => {
  await t.test("product and upstream artifacts are converted", () => {
    const params = jsonSerializableParams({
      product: new MetaProduct({
        nb: new FileProduct("out/nb.ipynb"),
        data: new FileProduct("out/data.csv"),
      }),
      upstream: { clean: new FileProduct("out/clean.csv") },
      rows: 10,
    });
    assert.deepEqual(params, {
      product: { nb: "out/nb.ipynb", data: "out/data.csv" },
      upstream: { clean: "out/clean.csv" },
      rows: 10,
    });
  });

  await t.test("other values pass through unchanged", () => {
    const nested = { a: [1, 2] };
    const params = jsonSerializableParams({ nested, upstream: null });
    assert.equal(params.nested, nested);
    assert.equal(params.upstream, null);
    assert.equal("product" in params, false);
  });

  await t.test("objects exposing toDict are unwrapped first", () => {
    const asParams = {
      toDict: () => ({ product: new FileProduct("p.ipynb"), x: 1 }),
    };
    assert.deepEqual(paramsToRecord(asParams), {
      product: new FileProduct("p.ipynb"),
      x: 1,
    });
    assert.deepEqual(jsonSerializableParams(asParams), {
      product: "p.ipynb",
      x: 1,
    });
  });

  await t.test("the input record is not mutated", () => {
    const input = { product: new FileProduct("a.ipynb") };
    jsonSerializableParams(input);
    assert.ok(input.product instanceof FileProduct);
  });
});
