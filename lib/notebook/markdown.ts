/**
 * Markdown and R Markdown notebooks.
 *
 * - YAML frontmatter at the head of the document may carry notebook metadata
 *   under `jupyter:` (same shape as the percent-format header).
 * - Markdown: every top-level fenced block with a language becomes a code
 *   cell. Fence meta is either a JSON5 object (`python { tags: ["x"] }`) or
 *   `key=value` options (`python tags=["x"]`).
 * - R Markdown: only chunks written as ```` ```{r ...} ```` are code cells;
 *   chunk options use the same `key=value` syntax (`tags=c("x")`).
 * - Everything between code cells is a markdown cell.
 */
import type { Code, Root } from "mdast";
import JSON5 from "json5";
import remarkFrontmatter from "remark-frontmatter";
import { remark } from "remark";
import {
  type CellMetadata,
  newCodeCell,
  newMarkdownCell,
  newNotebook,
  type NotebookCell,
  type NotebookDocument,
  type NotebookMetadata,
} from "./model.ts";
import {
  formatCellOptions,
  headerYaml,
  parseCellHeader,
  parseHeaderYaml,
  toCellMetadata,
} from "./percent.ts";

export type MarkdownFlavor = "markdown" | "rmarkdown";

export const remarkProcessor = remark().use(remarkFrontmatter, ["yaml"]);

type YamlNode = { type: "yaml"; value: string };

function isYamlNode(node: unknown): node is YamlNode {
  return !!node && typeof node === "object" &&
    "type" in node && node.type === "yaml" &&
    "value" in node && typeof node.value === "string";
}

function isCodeNode(node: unknown): node is Code {
  return !!node && typeof node === "object" &&
    "type" in node && node.type === "code";
}

function trimBlankEdges(text: string) {
  return text.replace(/^(?:[ \t]*\n)+/, "").replace(/(?:\n[ \t]*)+$/, "");
}

/**
 * Interpret a fence info string. Returns `undefined` when the fence is not a
 * code cell for the given flavor.
 */
export function parseFenceInfo(
  lang: string | null | undefined,
  meta: string | null | undefined,
  flavor: MarkdownFlavor,
): { language: string; metadata: CellMetadata } | undefined {
  const info = [lang, meta].filter((s) => !!s).join(" ").trim();
  if (!info) return undefined;

  if (info.startsWith("{")) {
    const close = info.lastIndexOf("}");
    const inner = info.slice(1, close > 0 ? close : undefined).trim();
    const language = /^[A-Za-z0-9_]+/.exec(inner)?.[0];
    if (!language) return undefined;
    const options = inner.slice(language.length).replace(/^\s*,/, "");
    return { language, metadata: parseCellHeader(options).metadata };
  }
  if (flavor === "rmarkdown") return undefined;

  const language = lang ?? "";
  const rest = (meta ?? "").trim();
  if (rest.startsWith("{")) {
    try {
      const attrs: unknown = JSON5.parse(rest);
      if (attrs && typeof attrs === "object" && !Array.isArray(attrs)) {
        return { language, metadata: toCellMetadata({ ...attrs }) };
      }
    } catch {
      // not JSON5, fall through to key=value options
    }
  }
  return { language, metadata: parseCellHeader(rest).metadata };
}

export function readMarkdown(
  text: string,
  flavor: MarkdownFlavor = "markdown",
): NotebookDocument {
  const tree: Root = remarkProcessor.parse(text);
  const cells: NotebookCell[] = [];
  let metadata: NotebookMetadata = {};
  let cursor = 0;

  const pushMarkdown = (end: number) => {
    const slice = trimBlankEdges(text.slice(cursor, end));
    if (slice.trim()) cells.push(newMarkdownCell(slice));
  };

  for (const node of tree.children) {
    const start = node.position?.start.offset;
    const end = node.position?.end.offset;
    if (start === undefined || end === undefined) continue;

    if (isYamlNode(node) && start === 0) {
      metadata = parseHeaderYaml(node.value);
      cursor = end;
      continue;
    }
    if (!isCodeNode(node)) continue;

    const fence = parseFenceInfo(node.lang, node.meta, flavor);
    if (!fence) continue;
    pushMarkdown(start);
    cells.push(newCodeCell(node.value, fence.metadata));
    cursor = end;
  }
  pushMarkdown(text.length);

  return newNotebook(cells, metadata);
}

function rOptions(metadata: CellMetadata) {
  return Object.entries(metadata)
    .filter(([k, v]) =>
      v !== undefined && !(k === "tags" && Array.isArray(v) && !v.length)
    )
    .map(([k, v]) => {
      const value = Array.isArray(v)
        ? `c(${v.map((x) => JSON.stringify(x)).join(", ")})`
        : JSON.stringify(v);
      return `${k}=${value}`;
    })
    .join(", ");
}

export function writeMarkdown(
  nb: NotebookDocument,
  flavor: MarkdownFlavor = "markdown",
) {
  const language = nb.metadata.kernelspec?.language?.toLowerCase() ??
    (flavor === "rmarkdown" ? "r" : "python");
  const out: string[] = [];

  const yamlText = headerYaml(nb.metadata);
  if (yamlText) out.push(`---\n${yamlText}\n---`);

  for (const cell of nb.cells) {
    if (cell.cell_type !== "code") {
      out.push(cell.source);
      continue;
    }
    let info: string;
    if (flavor === "rmarkdown") {
      const options = rOptions(cell.metadata);
      info = `{${language}${options ? ", " + options : ""}}`;
    } else {
      const options = formatCellOptions(cell.metadata);
      info = `${language}${options ? " " + options : ""}`;
    }
    out.push("```" + info + "\n" + cell.source + "\n```");
  }

  return out.join("\n\n") + "\n";
}
