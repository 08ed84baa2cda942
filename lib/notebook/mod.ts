export * from "./errors.ts";
export * from "./events.ts";
export * from "./model.ts";
export * from "./language.ts";
export * from "./python.ts";
export * from "./percent.ts";
export * from "./markdown.ts";
export * from "./transcode.ts";
export * from "./cells.ts";
export * from "./kernel.ts";
export * from "./params.ts";
export * from "./translate.ts";
export * from "./parameterize.ts";
export * from "./validate.ts";
export * from "./extract.ts";
export * from "./docstring.ts";
export * from "./source.ts";
export {
  getLanguageByExtension,
  getLanguageByIdOrAlias,
  type LanguageSpec,
  registerLanguage,
} from "../universal/code.ts";
