import { extname } from "node:path";
import { getLanguageByExtension } from "../universal/code.ts";

/**
 * Determine the programming language (lower case) from a file extension.
 *
 * Returns `undefined` when the extension is inconclusive: container formats
 * like "ipynb" or "md" can hold any language, so callers should look for
 * other evidence (kernel metadata, content) instead of failing.
 */
export function inferLanguage(extension: string | undefined) {
  if (!extension) return undefined;
  const ext = extension.startsWith(".") ? extension.slice(1) : extension;
  return getLanguageByExtension(ext)?.id;
}

/** Extension of a path without the dot ("" when there is none). */
export function extensionOf(path: string) {
  return extname(path).slice(1);
}
