import assert from "node:assert/strict";
import { test } from "node:test";
import { extensionOf, inferLanguage } from "./language.ts";

test("inferLanguage", async (t) => {
  await t.test("script extensions map to canonical names", () => {
    for (
      const [ext, lang] of [
        ["py", "python"],
        [".py", "python"],
        ["r", "r"],
        ["R", "r"],
        ["Rmd", "r"],
        [".rmd", "r"],
      ]
    ) {
      assert.equal(inferLanguage(ext), lang, ext);
    }
  });

  await t.test("containers and unknowns are inconclusive, never errors", () => {
    for (const ext of ["ipynb", ".ipynb", "md", "", "txt", "PY"]) {
      assert.equal(inferLanguage(ext), undefined, ext);
    }
    assert.equal(inferLanguage(undefined), undefined);
  });

  await t.test("extensionOf", () => {
    assert.equal(extensionOf("/a/b/task.Rmd"), "Rmd");
    assert.equal(extensionOf("nb.ipynb"), "ipynb");
    assert.equal(extensionOf("Makefile"), "");
  });
});
