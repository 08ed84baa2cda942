import assert from "node:assert/strict";
import { test } from "node:test";
import { parseFenceInfo, readMarkdown, writeMarkdown } from "./markdown.ts";
import { newCodeCell, newMarkdownCell, newNotebook } from "./model.ts";

const fence = "```";

const mdNotebook = [
  "---",
  "jupyter:",
  "  kernelspec:",
  "    display_name: Python 3",
  "    language: python",
  "    name: python3",
  "---",
  "",
  "# Title",
  "",
  "Some text.",
  "",
  `${fence}python tags=["parameters"]`,
  "upstream = None",
  fence,
  "",
  "More text.",
  "",
  fence,
  "plain block",
  fence,
  "",
  `${fence}python`,
  "x = 1",
  fence,
  "",
].join("\n");

test("markdown notebooks", async (t) => {
  await t.test("frontmatter, prose and fenced code cells", () => {
    const nb = readMarkdown(mdNotebook);
    assert.deepEqual(nb.metadata.kernelspec, {
      display_name: "Python 3",
      language: "python",
      name: "python3",
    });
    assert.deepEqual(
      nb.cells.map((c) => [c.cell_type, c.source, c.metadata]),
      [
        ["markdown", "# Title\n\nSome text.", {}],
        ["code", "upstream = None", { tags: ["parameters"] }],
        ["markdown", `More text.\n\n${fence}\nplain block\n${fence}`, {}],
        ["code", "x = 1", {}],
      ],
    );
  });

  await t.test("writing", () => {
    const nb = newNotebook([
      newMarkdownCell("# T"),
      newCodeCell("a = 1", { tags: ["parameters"] }),
    ]);
    assert.equal(
      writeMarkdown(nb),
      `# T\n\n${fence}python tags=["parameters"]\na = 1\n${fence}\n`,
    );
  });

  await t.test("JSON5 fence attributes", () => {
    assert.deepEqual(
      parseFenceInfo("python", '{ tags: ["parameters"] }', "markdown"),
      { language: "python", metadata: { tags: ["parameters"] } },
    );
  });
});

test("R Markdown notebooks", async (t) => {
  await t.test("only {r ...} chunks are cells", () => {
    const rmd = [
      `${fence}{r, tags=c("parameters")}`,
      "upstream <- NULL",
      fence,
      "",
      `${fence}r`,
      "shown_only <- 1",
      fence,
      "",
    ].join("\n");
    const nb = readMarkdown(rmd, "rmarkdown");
    assert.deepEqual(
      nb.cells.map((c) => [c.cell_type, c.source, c.metadata]),
      [
        ["code", "upstream <- NULL", { tags: ["parameters"] }],
        ["markdown", `${fence}r\nshown_only <- 1\n${fence}`, {}],
      ],
    );
  });

  await t.test("writing chunks", () => {
    const nb = newNotebook([newCodeCell("x <- 1", { tags: ["parameters"] })]);
    assert.equal(
      writeMarkdown(nb, "rmarkdown"),
      `${fence}{r, tags=c("parameters")}\nx <- 1\n${fence}\n`,
    );
  });
});
