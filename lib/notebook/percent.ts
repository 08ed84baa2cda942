/**
 * Percent-format scripts: plain source files whose cells are delimited by
 * `# %%` comment lines (the comment prefix follows the language).
 *
 * ```python
 * # ---
 * # jupyter:
 * #   kernelspec:
 * #     display_name: Python 3
 * #     language: python
 * #     name: python3
 * # ---
 *
 * # %% [markdown]
 * # Some *prose*
 *
 * # %% tags=["parameters"]
 * upstream = None
 * ```
 *
 * - The optional commented YAML header carries notebook metadata under
 *   `jupyter:`.
 * - A cell marker may be followed by a title, a cell type in brackets
 *   (`[markdown]`, `[md]`, `[raw]`) and `key=value` options; values are
 *   JSON5, or R vectors like `c("a", "b")`.
 * - Markdown and raw cells are written as comments.
 * - A script without any marker is a single code cell.
 */
import JSON5 from "json5";
import { parse as YAMLparse, stringify as YAMLstringify } from "yaml";
import { NotebookFormatError } from "./errors.ts";
import {
  type CellMetadata,
  cellMetadataSchema,
  type CellType,
  newCodeCell,
  newMarkdownCell,
  newNotebook,
  newRawCell,
  type NotebookCell,
  type NotebookDocument,
  type NotebookMetadata,
  notebookMetadataSchema,
} from "./model.ts";

export type CellHeader = {
  title: string;
  cellType: CellType;
  metadata: CellMetadata;
};

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/* ========================== Cell options ============================= */

/** Index just past a `key=value` value that starts at `start`. */
function valueEnd(text: string, start: number) {
  let depth = 0;
  let quote: string | undefined;
  let i = start;
  for (; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if ("[{(".includes(ch)) depth++;
    else if ("]})".includes(ch)) depth--;
    else if (depth <= 0 && (/\s/.test(ch) || ch === ",")) break;
  }
  return i;
}

/** JSON5 value, R vector (`c(...)`) or bare word. */
export function parseOptionValue(raw: string): unknown {
  const text = raw.trim();
  if (text === "TRUE" || text === "FALSE") return text === "TRUE";
  const rVector = /^(?:c|list)\(([\s\S]*)\)$/.exec(text);
  const candidate = rVector ? `[${rVector[1]}]` : text;
  try {
    const value: unknown = JSON5.parse(candidate);
    return value;
  } catch {
    return text;
  }
}

/**
 * Parse what follows a cell marker, e.g. ` Title [markdown] tags=["x"]`.
 * Anything that is not a cell type or an option becomes the title.
 */
export function parseCellHeader(text: string): CellHeader {
  let rest = text;
  let cellType: CellType = "code";
  const typed = /\[(markdown|md|raw)\]/.exec(rest);
  if (typed) {
    cellType = typed[1] === "raw" ? "raw" : "markdown";
    rest = rest.replace(typed[0], " ");
  }

  const options: Record<string, unknown> = {};
  const title: string[] = [];
  let i = 0;
  while (i < rest.length) {
    const ws = /^[\s,]+/.exec(rest.slice(i));
    if (ws) {
      i += ws[0].length;
      continue;
    }
    const key = /^([A-Za-z_][\w.-]*)\s*=\s*/.exec(rest.slice(i));
    if (!key) {
      const word = /^\S+/.exec(rest.slice(i));
      const w = word ? word[0] : rest[i];
      title.push(w);
      i += w.length;
      continue;
    }
    i += key[0].length;
    const end = valueEnd(rest, i);
    options[key[1]] = parseOptionValue(rest.slice(i, end));
    i = end;
  }
  return { title: title.join(" "), cellType, metadata: toCellMetadata(options) };
}

/** Options as cell metadata; a single tag is promoted to a list. */
export function toCellMetadata(options: Record<string, unknown>): CellMetadata {
  const { tags, ...rest } = options;
  if (tags === undefined) return cellMetadataSchema.parse(rest);
  const list: unknown[] = Array.isArray(tags) ? tags : [tags];
  return cellMetadataSchema.parse({ ...rest, tags: list.map(String) });
}

/** Render cell metadata as `key=value` options (empty tags are omitted). */
export function formatCellOptions(metadata: CellMetadata) {
  return Object.entries(metadata)
    .filter(([k, v]) =>
      v !== undefined && !(k === "tags" && Array.isArray(v) && !v.length)
    )
    .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
    .join(" ");
}

/* ============================ Header ================================= */

export function parseHeaderYaml(yamlText: string): NotebookMetadata {
  let parsed: unknown;
  try {
    parsed = YAMLparse(yamlText);
  } catch (error) {
    throw new NotebookFormatError("Notebook header YAML failed to parse", {
      cause: error,
    });
  }
  if (!parsed || typeof parsed !== "object" || !("jupyter" in parsed)) {
    return {};
  }
  const result = notebookMetadataSchema.safeParse(parsed.jupyter);
  if (!result.success) {
    throw new NotebookFormatError(
      `Invalid notebook metadata in header: ${result.error.message}`,
      { cause: result.error },
    );
  }
  return result.data;
}

/** Metadata worth writing to a text header (bookkeeping is dropped). */
export function headerMetadata(metadata: NotebookMetadata) {
  const { papermill: _papermill, ...rest } = metadata;
  return rest;
}

export function headerYaml(metadata: NotebookMetadata) {
  const meta = headerMetadata(metadata);
  if (!Object.keys(meta).length) return undefined;
  return YAMLstringify({ jupyter: meta }).trimEnd();
}

/* ============================ Reader ================================= */

function trimBlankLines(lines: string[]) {
  let start = 0;
  let end = lines.length;
  while (start < end && !lines[start].trim()) start++;
  while (end > start && !lines[end - 1].trim()) end--;
  return lines.slice(start, end);
}

function uncomment(line: string, prefix: string) {
  if (line.startsWith(prefix + " ")) return line.slice(prefix.length + 1);
  if (line.startsWith(prefix)) return line.slice(prefix.length);
  return line;
}

function makeCell(header: CellHeader, lines: string[], prefix: string) {
  const body = trimBlankLines(lines);
  if (header.cellType === "code") {
    return newCodeCell(body.join("\n"), header.metadata);
  }
  const text = body.map((l) => uncomment(l, prefix)).join("\n");
  return header.cellType === "raw"
    ? newRawCell(text, header.metadata)
    : newMarkdownCell(text, header.metadata);
}

export function readPercent(
  text: string,
  commentPrefix = "#",
): NotebookDocument {
  const prefix = commentPrefix;
  const lines = text.split(/\r?\n/);
  const fence = `${prefix} ---`;
  let i = 0;
  let metadata: NotebookMetadata = {};

  while (i < lines.length && !lines[i].trim()) i++;
  if (lines[i]?.trim() === fence) {
    const close = lines.findIndex((l, idx) => idx > i && l.trim() === fence);
    if (close > i) {
      const yamlText = lines.slice(i + 1, close)
        .map((l) => uncomment(l, prefix))
        .join("\n");
      metadata = parseHeaderYaml(yamlText);
      i = close + 1;
    }
  }

  const marker = new RegExp(`^${escapeRegExp(prefix)}\\s*%%(.*)$`);
  const cells: NotebookCell[] = [];
  let header: CellHeader = { title: "", cellType: "code", metadata: {} };
  let body: string[] = [];
  let sawMarker = false;

  const flush = () => {
    if (sawMarker || trimBlankLines(body).length) {
      cells.push(makeCell(header, body, prefix));
    }
  };

  for (; i < lines.length; i++) {
    const m = marker.exec(lines[i]);
    if (!m) {
      body.push(lines[i]);
      continue;
    }
    flush();
    sawMarker = true;
    header = parseCellHeader(m[1]);
    body = [];
  }
  flush();

  return newNotebook(cells, metadata);
}

/* ============================ Writer ================================= */

export function writePercent(nb: NotebookDocument, commentPrefix = "#") {
  const prefix = commentPrefix;
  const comment = (line: string) => (line ? `${prefix} ${line}` : prefix);
  const out: string[] = [];

  const yamlText = headerYaml(nb.metadata);
  if (yamlText) {
    out.push(`${prefix} ---`, ...yamlText.split("\n").map(comment));
    out.push(`${prefix} ---`, "");
  }

  for (const cell of nb.cells) {
    const kind = cell.cell_type === "code" ? "" : ` [${cell.cell_type}]`;
    const options = formatCellOptions(cell.metadata);
    out.push(`${prefix} %%${kind}${options ? " " + options : ""}`);
    out.push(
      cell.cell_type === "code"
        ? cell.source
        : cell.source.split("\n").map(comment).join("\n"),
    );
    out.push("");
  }

  return out.join("\n").replace(/\n+$/, "") + "\n";
}
