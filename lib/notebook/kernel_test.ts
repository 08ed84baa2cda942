import assert from "node:assert/strict";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { test } from "node:test";
import { NoSuchKernelError, SourceInitializationError } from "./errors.ts";
import {
  determineKernelName,
  ensureKernelspec,
  FsKernelCatalog,
  isPython,
  jupyterKernelDirs,
  sniffPython,
  StaticKernelCatalog,
} from "./kernel.ts";
import { newCodeCell, newNotebook, type NotebookMetadata } from "./model.ts";

const python3 = {
  name: "python3",
  display_name: "Python 3",
  language: "python",
};
const ir = { name: "ir", display_name: "R", language: "R" };
const catalog = new StaticKernelCatalog([python3, ir]);

const nbOf = (source: string, metadata: NotebookMetadata = {}) =>
  newNotebook([newCodeCell(source, { tags: ["parameters"] })], metadata);

test("determineKernelName - priority", async (t) => {
  const withMetadata = nbOf("x = 1", { kernelspec: { name: "from-metadata" } });

  await t.test("explicit name beats metadata", () => {
    assert.equal(
      determineKernelName(withMetadata, "explicit", "py", "python"),
      "explicit",
    );
  });

  await t.test("metadata beats extension", () => {
    assert.equal(
      determineKernelName(withMetadata, undefined, "R", "r"),
      "from-metadata",
    );
  });

  await t.test("extension beats the language argument and the heuristic", () => {
    assert.equal(determineKernelName(nbOf("x = 1"), undefined, "R", "python"), "ir");
    assert.equal(determineKernelName(nbOf("x <- 1"), undefined, "py"), "python3");
  });

  await t.test("language is used when there is no extension", () => {
    assert.equal(determineKernelName(nbOf("x <- 1"), undefined, undefined, "r"), "ir");
  });

  await t.test("container extensions fall through to the heuristic", () => {
    assert.equal(determineKernelName(nbOf("x = 1"), undefined, "ipynb"), "python3");
    assert.equal(determineKernelName(nbOf("x <- 1"), undefined, "ipynb"), undefined);
  });
});

test("sniffPython - content heuristic", async (t) => {
  await t.test("valid Python without <- is python", () => {
    assert.equal(sniffPython(nbOf("x = 1\nprint(x)")), "python");
    assert.equal(isPython(nbOf("x = 1")), true);
  });

  await t.test("text that does not parse is never python", () => {
    assert.equal(sniffPython(nbOf("f <- function(x) {\n  x + 1\n}")), "not-python");
    assert.equal(sniffPython(nbOf("print 'hello'")), "not-python");
  });

  await t.test("<- overrides a successful parse", () => {
    // parses as the comparison x < -1
    assert.equal(sniffPython(nbOf("x <- 1")), "inconclusive");
    assert.equal(isPython(nbOf("x <- 1")), false);
  });

  await t.test("metadata language decides when present", () => {
    assert.equal(
      sniffPython(nbOf("x <- 1", { kernelspec: { language: "python" } })),
      "python",
    );
    assert.equal(
      sniffPython(nbOf("x = 1", { kernelspec: { language: "R" } })),
      "not-python",
    );
  });
});

test("ensureKernelspec", async (t) => {
  await t.test("writes the full identity from the catalog", () => {
    const nb = nbOf("x <- 1");
    const kernel = ensureKernelspec(nb, { ext: "R", catalog });
    assert.deepEqual(kernel, ir);
    assert.deepEqual(nb.metadata.kernelspec, {
      display_name: "R",
      language: "R",
      name: "ir",
    });
  });

  await t.test("unresolvable kernels come with guidance", () => {
    assert.throws(
      () => ensureKernelspec(nbOf("x <- 1"), { catalog, loc: "task.txt" }),
      (err: unknown) =>
        err instanceof SourceInitializationError &&
        err.code === "INITIALIZATION" &&
        err.message.startsWith(
          'Notebook "task.txt" does not contain kernelspec metadata',
        ) &&
        err.message.includes('"jupyter kernelspec list"'),
    );
  });

  await t.test("unknown kernel names list what is installed", () => {
    assert.throws(
      () =>
        ensureKernelspec(nbOf("x = 1"), {
          kernelspecName: "julia-1.9",
          catalog,
        }),
      (err: unknown) =>
        err instanceof SourceInitializationError &&
        err.cause instanceof NoSuchKernelError &&
        err.message.startsWith(
          'Notebook uses kernel "julia-1.9", which is not installed ' +
            '(installed kernels: "ir", "python3").',
        ),
    );
  });
});

test("kernel catalogs", async (t) => {
  await t.test("StaticKernelCatalog", () => {
    assert.deepEqual(catalog.get("python3"), python3);
    assert.deepEqual(catalog.names(), ["ir", "python3"]);
    assert.throws(() => catalog.get("nope"), NoSuchKernelError);
  });

  await t.test("FsKernelCatalog reads kernel.json files", () => {
    const root = mkdtempSync(join(tmpdir(), "nbsource-kernels-"));
    try {
      const first = join(root, "first");
      const second = join(root, "second");
      mkdirSync(join(first, "py-test"), { recursive: true });
      mkdirSync(join(second, "py-test"), { recursive: true });
      mkdirSync(join(second, "broken"), { recursive: true });
      writeFileSync(
        join(first, "py-test", "kernel.json"),
        JSON.stringify({
          argv: ["python", "-m", "ipykernel_launcher"],
          display_name: "Py Test",
          language: "python",
        }),
      );
      writeFileSync(
        join(second, "py-test", "kernel.json"),
        JSON.stringify({ argv: [], display_name: "Shadowed", language: "python" }),
      );
      writeFileSync(join(second, "broken", "kernel.json"), "{}");

      const fsCatalog = new FsKernelCatalog([first, second, join(root, "missing")]);
      assert.deepEqual(fsCatalog.names(), ["broken", "py-test"]);
      assert.deepEqual(fsCatalog.get("py-test"), {
        name: "py-test",
        display_name: "Py Test",
        language: "python",
      });
      assert.throws(() => fsCatalog.get("broken"), NoSuchKernelError);
      assert.throws(() => fsCatalog.get("absent"), NoSuchKernelError);
    } finally {
      rmSync(root, { recursive: true, force: true });
    }
  });

  await t.test("jupyterKernelDirs", () => {
    assert.deepEqual(
      jupyterKernelDirs({ JUPYTER_PATH: "/opt/jp" }, "linux", "/home/u"),
      [
        "/opt/jp/kernels",
        "/home/u/.local/share/jupyter/kernels",
        "/usr/local/share/jupyter/kernels",
        "/usr/share/jupyter/kernels",
      ],
    );
    assert.deepEqual(
      jupyterKernelDirs({ JUPYTER_DATA_DIR: "/data" }, "darwin", "/Users/u"),
      [
        "/data/kernels",
        "/usr/local/share/jupyter/kernels",
        "/usr/share/jupyter/kernels",
      ],
    );
  });

  await t.test("jupyterKernelDirs includes environment prefixes", () => {
    assert.deepEqual(
      jupyterKernelDirs(
        { VIRTUAL_ENV: "/work/.venv", CONDA_PREFIX: "/opt/conda/envs/ml" },
        "linux",
        "/home/u",
      ),
      [
        "/home/u/.local/share/jupyter/kernels",
        "/work/.venv/share/jupyter/kernels",
        "/opt/conda/envs/ml/share/jupyter/kernels",
        "/usr/local/share/jupyter/kernels",
        "/usr/share/jupyter/kernels",
      ],
    );
  });
});
