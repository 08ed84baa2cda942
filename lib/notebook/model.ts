/**
 * In-memory notebook model (nbformat v4) and its JSON serialization.
 *
 * Documents read from disk are validated with zod before anything else looks
 * at them. Cell `source` is always a single string in memory; nbformat allows
 * either a string or a list of lines on disk and we accept both, but we always
 * write a list of lines (keeping line endings), like nbformat does.
 *
 * `writeNotebook` mirrors `nbformat.writes`: keys sorted, one-space indent,
 * non-ASCII kept as is, trailing newline.
 */
import { z } from "zod";
import { NotebookFormatError } from "./errors.ts";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };

/* ============================== Schemas ============================== */

const multilineSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((src) => (Array.isArray(src) ? src.join("") : src));

export const kernelIdentitySchema = z.object({
  name: z.string().min(1),
  display_name: z.string(),
  language: z.string(),
});

export const kernelspecMetadataSchema = z.looseObject({
  name: z.string().optional(),
  display_name: z.string().optional(),
  language: z.string().optional(),
});

export const cellMetadataSchema = z.looseObject({
  tags: z.array(z.string()).optional(),
});

export const cellSchema = z.looseObject({
  cell_type: z.enum(["code", "markdown", "raw"]),
  id: z.string().optional(),
  source: multilineSchema,
  metadata: cellMetadataSchema.default({}),
  outputs: z.array(z.unknown()).optional(),
  execution_count: z.number().int().nullable().optional(),
});

export const notebookMetadataSchema = z.looseObject({
  kernelspec: kernelspecMetadataSchema.optional(),
  papermill: z.record(z.string(), z.unknown()).optional(),
});

export const notebookSchema = z.looseObject({
  cells: z.array(cellSchema),
  metadata: notebookMetadataSchema.default({}),
  nbformat: z.literal(4),
  nbformat_minor: z.number().int().nonnegative(),
});

export type KernelIdentity = z.infer<typeof kernelIdentitySchema>;
export type CellType = z.infer<typeof cellSchema>["cell_type"];
export type CellMetadata = z.infer<typeof cellMetadataSchema>;
export type NotebookCell = z.infer<typeof cellSchema>;
export type NotebookMetadata = z.infer<typeof notebookMetadataSchema>;
export type NotebookDocument = z.infer<typeof notebookSchema>;

/* ============================= Builders ============================== */

export const NBFORMAT = 4;
export const NBFORMAT_MINOR = 4;

export function newNotebook(
  cells: NotebookCell[] = [],
  metadata: NotebookMetadata = {},
): NotebookDocument {
  return {
    cells,
    metadata,
    nbformat: NBFORMAT,
    nbformat_minor: NBFORMAT_MINOR,
  };
}

export function newCodeCell(
  source: string,
  metadata: CellMetadata = {},
): NotebookCell {
  return {
    cell_type: "code",
    source,
    metadata,
    outputs: [],
    execution_count: null,
  };
}

export function newMarkdownCell(
  source: string,
  metadata: CellMetadata = {},
): NotebookCell {
  return { cell_type: "markdown", source, metadata };
}

export function newRawCell(
  source: string,
  metadata: CellMetadata = {},
): NotebookCell {
  return { cell_type: "raw", source, metadata };
}

export function cloneNotebook(nb: NotebookDocument): NotebookDocument {
  return structuredClone(nb);
}

/** All cell sources joined with a newline, in document order. */
export function concatenatedSource(nb: NotebookDocument) {
  return nb.cells.map((c) => c.source).join("\n");
}

/* ============================ Read / write =========================== */

export function readNotebook(text: string): NotebookDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new NotebookFormatError("Notebook is not valid JSON", {
      cause: error,
    });
  }
  return parseNotebook(raw);
}

export function parseNotebook(raw: unknown): NotebookDocument {
  const result = notebookSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new NotebookFormatError(`Invalid notebook document: ${detail}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/** Split text into lines, keeping the line terminators. */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const v: unknown = Reflect.get(value, key);
      if (v !== undefined) out[key] = sortKeys(v);
    }
    return out;
  }
  return value;
}

function cellForDisk(cell: NotebookCell) {
  const { source, ...rest } = cell;
  const out: Record<string, unknown> = { ...rest, source: splitLines(source) };
  if (cell.cell_type === "code") {
    out.outputs = cell.outputs ?? [];
    out.execution_count = cell.execution_count ?? null;
  } else {
    delete out.outputs;
    delete out.execution_count;
  }
  return out;
}

export function writeNotebook(nb: NotebookDocument): string {
  const disk = { ...nb, cells: nb.cells.map(cellForDisk) };
  return JSON.stringify(sortKeys(disk), null, 1) + "\n";
}
