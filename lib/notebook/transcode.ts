/**
 * Text ⇄ notebook conversion across the supported formats.
 *
 * The format comes from an explicit hint (a file extension such as "py",
 * ".Rmd" or "ipynb", or a format name) or, without one, from sniffing the
 * text.
 */
import { getLanguageByExtension, lineCommentFor } from "../universal/code.ts";
import { readMarkdown, writeMarkdown } from "./markdown.ts";
import {
  type NotebookDocument,
  readNotebook,
  writeNotebook,
} from "./model.ts";
import { readPercent, writePercent } from "./percent.ts";

export const notebookFormats = [
  "ipynb",
  "percent",
  "markdown",
  "rmarkdown",
] as const;

export type NotebookFormat = typeof notebookFormats[number];

export type FormatSpec = {
  format: NotebookFormat;
  /** Language implied by the extension, used for comment syntax. */
  language?: string;
};

function isNotebookFormat(s: string): s is NotebookFormat {
  return notebookFormats.some((f) => f === s);
}

/** Resolve an extension or format name; `undefined` when unknown. */
export function formatFor(hint: string | undefined): FormatSpec | undefined {
  if (!hint) return undefined;
  const ext = hint.startsWith(".") ? hint.slice(1) : hint;
  if (isNotebookFormat(ext)) return { format: ext };
  if (ext === "md" || ext === "markdown") return { format: "markdown" };
  if (ext === "Rmd" || ext === "rmd") {
    return { format: "rmarkdown", language: "r" };
  }
  const language = getLanguageByExtension(ext)?.id;
  return language ? { format: "percent", language } : undefined;
}

/** Best guess at the format of `text` when nothing else is known. */
export function sniffFormat(text: string): NotebookFormat {
  const head = text.trimStart();
  if (head.startsWith("{")) return "ipynb";
  if (/^\s*```/m.test(text) && !/^\s*#\s*%%/m.test(text)) return "markdown";
  return "percent";
}

export function readsNotebook(text: string, hint?: string): NotebookDocument {
  const spec = formatFor(hint) ?? { format: sniffFormat(text) };
  switch (spec.format) {
    case "ipynb":
      return readNotebook(text);
    case "markdown":
      return readMarkdown(text, "markdown");
    case "rmarkdown":
      return readMarkdown(text, "rmarkdown");
    case "percent":
      return readPercent(text, lineCommentFor(spec.language));
  }
}

export function writesNotebook(nb: NotebookDocument, hint = "ipynb") {
  const spec = formatFor(hint) ?? { format: "ipynb" };
  switch (spec.format) {
    case "ipynb":
      return writeNotebook(nb);
    case "markdown":
      return writeMarkdown(nb, "markdown");
    case "rmarkdown":
      return writeMarkdown(nb, "rmarkdown");
    case "percent":
      return writePercent(
        nb,
        lineCommentFor(spec.language ?? nb.metadata.kernelspec?.language),
      );
  }
}
