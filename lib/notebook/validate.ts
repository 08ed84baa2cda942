/**
 * Render-time validation of a parameterized notebook.
 *
 * Every finding is collected into one `ValidationReport` and raised once as
 * a `RenderError`, so the caller sees everything that is wrong at the same
 * time. Missing parameters (declared but not passed) are only a warning: the
 * notebook's own defaults are used.
 */
import { findCellWithTag, PARAMETERS_TAG } from "./cells.ts";
import {
  RenderError,
  type ValidationReport,
  type ValidationSection,
} from "./errors.ts";
import {
  defaultNotebookEvents,
  type NotebookEventBus,
  reportWarning,
} from "./events.ts";
import { concatenatedSource, type NotebookDocument } from "./model.ts";
import {
  type CheckerResult,
  checkPythonSource,
  type StaticChecker,
  usedNames,
} from "./python.ts";

export type ValidateOptions = {
  /** Name shown in checker diagnostics. */
  filename?: string;
  /** Source of the parameters cell; looked up in the notebook when absent. */
  parametersSource?: string;
  checker?: StaticChecker;
  events?: NotebookEventBus;
  loc?: string;
};

export type ParamsComparison = {
  declared: string[];
  missing: string[];
  extra: string[];
};

/** Python-style set literal, sorted so the text is stable: `{'a', 'b'}`. */
export function formatNameSet(names: Iterable<string>) {
  return `{${Array.from(names).sort().map((n) => `'${n}'`).join(", ")}}`;
}

export function diffParams(
  paramsSource: string,
  params: Iterable<string>,
): ParamsComparison {
  const declared = usedNames(paramsSource);
  const supplied = new Set(params);
  return {
    declared: Array.from(declared).sort(),
    missing: Array.from(declared).filter((n) => !supplied.has(n)).sort(),
    extra: Array.from(supplied).filter((n) => !declared.has(n)).sort(),
  };
}

/**
 * Compare what the parameters cell declares with what was passed. Warns on
 * missing parameters; returns the error text for extra ones ("" if none).
 */
export function compareParams(
  paramsSource: string,
  params: Record<string, unknown>,
  options: Pick<ValidateOptions, "events" | "loc"> = {},
) {
  const { missing, extra } = diffParams(paramsSource, Object.keys(params));
  if (missing.length) {
    reportWarning(options.events ?? defaultNotebookEvents, {
      message: `Missing parameters: ${
        formatNameSet(missing)
      }, will use default value`,
      loc: options.loc,
    });
  }
  return extra.length
    ? `Passed non-declared parameters: ${formatNameSet(extra)}`
    : "";
}

/** Run the static checker over all cell sources, joined by newlines. */
export function checkSource(
  nb: NotebookDocument,
  filename: string,
  checker: StaticChecker = checkPythonSource,
): CheckerResult {
  return checker(concatenatedSource(nb), filename);
}

export function formatReport(report: ValidationReport) {
  return report.sections.map((s) => `${s.title}:\n${s.body}`).join("\n");
}

/**
 * Validate `nb` (usually the rendered notebook) against the passed
 * parameters. Returns the report when clean, throws `RenderError` otherwise.
 */
export function checkNotebook(
  nb: NotebookDocument,
  params: Record<string, unknown>,
  options: ValidateOptions = {},
): ValidationReport {
  const filename = options.filename ?? "notebook";
  const parametersSource = options.parametersSource ??
    findCellWithTag(nb, PARAMETERS_TAG).cell?.source;
  if (parametersSource === undefined) {
    const loc = options.loc ? ` "${options.loc}"` : "";
    throw new RenderError(
      `Notebook${loc} does not have a cell tagged "parameters"`,
    );
  }

  const { missing, extra } = diffParams(parametersSource, Object.keys(params));
  const sections: ValidationSection[] = [];
  const extraText = compareParams(parametersSource, params, options);
  if (extraText) sections.push({ title: "Invalid parameters", body: extraText });

  const res = checkSource(nb, filename, options.checker);
  if (res.warnings) {
    sections.push({ title: "Static analysis warnings", body: res.warnings });
  }
  if (res.errors) {
    sections.push({ title: "Static analysis errors", body: res.errors });
  }

  const report: ValidationReport = { missing, extra, sections };
  if (sections.length) throw new RenderError(formatReport(report), report);
  return report;
}
