import type { NotebookDocument } from "./model.ts";

const leadingDocstring = /^\s*[rRuU]?("""|''')([\s\S]*?)\1/;

/**
 * A notebook's description: the top cell when it is markdown, otherwise a
 * triple-quoted string opening the first code cell.
 */
export function extractDocstring(nb: NotebookDocument): string | undefined {
  const [first] = nb.cells;
  if (!first) return undefined;
  if (first.cell_type === "markdown") return first.source;

  const code = nb.cells.find((c) => c.cell_type === "code");
  const m = code ? leadingDocstring.exec(code.source) : null;
  return m ? m[2] : undefined;
}
