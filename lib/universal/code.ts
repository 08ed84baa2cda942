/**
 * universal/code.ts
 * Language registry for notebook sources:
 *  - canonical language ids and aliases
 *  - script extensions that unambiguously imply a language
 *  - line comment syntax (used by percent-format scripts)
 *  - the Jupyter kernel conventionally installed for the language
 *
 * Extensions are matched exactly: "R" and "r" are both registered for R, but
 * "PY" is not Python. Container formats such as "ipynb" or "md" are never
 * registered because they say nothing about the language inside.
 */

import { z } from "zod";

/* -------------------------------------------------------------------------------------------------
 * Language registry
 * -----------------------------------------------------------------------------------------------*/

export const languageSpecSchema = z.object({
  id: z.string().min(1),
  aliases: z.array(z.string()).readonly().optional(),
  /** Without the leading dot, case sensitive. */
  extensions: z.array(z.string()).readonly().optional(),
  comment: z.object({ line: z.string().min(1) }),
  defaultKernel: z.string().min(1).optional(),
});

export type LanguageSpec = z.infer<typeof languageSpecSchema>;

export const languageRegistry = new Map<string, LanguageSpec>();
export const languageExtnIndex = new Map<string, LanguageSpec>();

export function registerLanguage(spec: LanguageSpec): LanguageSpec {
  const parsed = languageSpecSchema.parse(spec);
  languageRegistry.set(parsed.id, parsed);
  for (const alias of parsed.aliases ?? []) languageRegistry.set(alias, parsed);
  for (const ext of parsed.extensions ?? []) languageExtnIndex.set(ext, parsed);
  return parsed;
}

export function getLanguageByIdOrAlias(
  idOrAlias: string | undefined,
): LanguageSpec | undefined {
  if (idOrAlias === undefined) return undefined;
  return languageRegistry.get(idOrAlias) ??
    languageRegistry.get(idOrAlias.toLowerCase());
}

export function getLanguageByExtension(
  extension: string,
): LanguageSpec | undefined {
  return languageExtnIndex.get(extension);
}

/** Line comment prefix for a language, "#" when unknown. */
export function lineCommentFor(language: string | undefined) {
  return getLanguageByIdOrAlias(language)?.comment.line ?? "#";
}

(function preloadLanguages() {
  registerLanguage({
    id: "python",
    aliases: ["py", "python3"],
    extensions: ["py"],
    comment: { line: "#" },
    defaultKernel: "python3",
  });
  registerLanguage({
    id: "r",
    extensions: ["r", "R", "Rmd", "rmd"],
    comment: { line: "#" },
    defaultKernel: "ir",
  });
  registerLanguage({
    id: "julia",
    aliases: ["jl"],
    extensions: ["jl"],
    comment: { line: "#" },
  });
  registerLanguage({
    id: "bash",
    aliases: ["sh", "shell"],
    extensions: ["sh"],
    comment: { line: "#" },
  });
})();
