import assert from "node:assert/strict";
import { test } from "node:test";
import { UnsupportedLanguageError } from "./errors.ts";
import { notebookEvents } from "./events.ts";
import { StaticKernelCatalog } from "./kernel.ts";
import {
  newCodeCell,
  newMarkdownCell,
  newNotebook,
  type NotebookDocument,
  parseNotebook,
  writeNotebook,
} from "./model.ts";
import {
  INJECTED_CELL_COMMENT,
  injectCell,
  parameterizeNotebook,
} from "./parameterize.ts";

const kernelspec = {
  name: "python3",
  display_name: "Python 3",
  language: "python",
};

const pythonNb = () =>
  newNotebook(
    [
      newMarkdownCell("intro"),
      newCodeCell("a = None\nb = 2", { tags: ["parameters"] }),
      newCodeCell("print(a, b)", { tags: [] }),
    ],
    { kernelspec },
  );

const sources = (nb: NotebookDocument) => nb.cells.map((c) => c.source);

test("parameterizeNotebook", async (t) => {
  await t.test("injects right after the parameters cell", () => {
    const nb = pythonNb();
    const out = parameterizeNotebook(nb, { a: 1 });
    assert.deepEqual(sources(out), [
      "intro",
      "a = None\nb = 2",
      "# Parameters\na = 1\n",
      "print(a, b)",
    ]);
    assert.deepEqual(out.cells[2].metadata, { tags: ["injected-parameters"] });
    assert.deepEqual(out.metadata.papermill, { parameters: { a: 1 } });
    assert.equal(out.cells[2].id, undefined);
  });

  await t.test("never mutates its input", () => {
    const nb = pythonNb();
    const before = writeNotebook(nb);
    parameterizeNotebook(nb, { a: 1 });
    assert.equal(writeNotebook(nb), before);
  });

  await t.test("a previous injected cell is replaced", () => {
    const once = parameterizeNotebook(pythonNb(), { a: 1 });
    const twice = parameterizeNotebook(once, { a: 3 });
    assert.deepEqual(sources(twice), [
      "intro",
      "a = None\nb = 2",
      "# Parameters\na = 3\n",
      "print(a, b)",
    ]);
  });

  await t.test("without a parameters cell it prepends and warns", () => {
    const events = notebookEvents();
    const warnings: string[] = [];
    events.on("warning", ({ message }) => {
      warnings.push(message);
    });
    const nb = newNotebook([newCodeCell("x = 1")], { kernelspec });
    const out = parameterizeNotebook(nb, { x: 2 }, { events });
    assert.deepEqual(sources(out), ["# Parameters\nx = 2\n", "x = 1"]);
    assert.deepEqual(warnings, [
      "Input notebook does not contain a cell with tag 'parameters'",
    ]);
  });

  await t.test("report mode hides the injected source", () => {
    const out = parameterizeNotebook(pythonNb(), {}, {
      reportMode: true,
      comment: "Preview",
    });
    assert.equal(out.cells[2].source, "# Preview\n");
    assert.deepEqual(out.cells[2].metadata.jupyter, { source_hidden: true });
  });

  await t.test("nbformat 4.5 documents get a stable cell id", () => {
    const nb = { ...pythonNb(), nbformat_minor: 5 };
    assert.equal(
      parameterizeNotebook(nb, {}).cells[2].id,
      "injected-parameters",
    );
  });

  await t.test("R kernels get R code", () => {
    const nb = newNotebook([newCodeCell("x <- 1", { tags: ["parameters"] })], {
      kernelspec: { name: "ir", display_name: "R", language: "R" },
    });
    assert.equal(
      parameterizeNotebook(nb, { x: 2 }).cells[1].source,
      "# Parameters\nx = 2L\n",
    );
  });

  await t.test("Julia kernels get Julia code", () => {
    const nb = newNotebook([newCodeCell("x = 1", { tags: ["parameters"] })], {
      kernelspec: { name: "julia-1.9", display_name: "Julia", language: "julia" },
    });
    assert.equal(
      parameterizeNotebook(nb, { x: 2, up: { a: "a.csv" } }).cells[1].source,
      '# Parameters\nx = 2\nup = Dict("a" => "a.csv")\n',
    );
  });

  await t.test("kernels without a translator are rejected", () => {
    const nb = newNotebook([newCodeCell("x = 1", { tags: ["parameters"] })], {
      kernelspec: { name: "gophernotes", display_name: "Go", language: "go" },
    });
    assert.throws(
      () => parameterizeNotebook(nb, { x: 2 }),
      UnsupportedLanguageError,
    );
  });
});

test("injectCell", async (t) => {
  await t.test("parameterizes a contents model in place", () => {
    const catalog = new StaticKernelCatalog([kernelspec]);
    const content = JSON.parse(
      writeNotebook(newNotebook([newCodeCell("upstream = None", {
        tags: ["parameters"],
      })])),
    );
    const model = { name: "clean.py", content, path: "tasks/clean.py" };
    injectCell(model, { upstream: { raw: "raw.csv" } }, { catalog });

    const nb = parseNotebook(model.content);
    assert.deepEqual(
      sources(nb),
      [
        "upstream = None",
        `# ${INJECTED_CELL_COMMENT}\nupstream = {"raw": "raw.csv"}\n`,
      ],
    );
    assert.deepEqual(nb.metadata.papermill, {
      parameters: { upstream: { raw: "raw.csv" } },
      environment_variables: {},
      version: null,
    });
    assert.deepEqual(nb.metadata.kernelspec, kernelspec);
  });
});
