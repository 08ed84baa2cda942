/**
 * Parameter injection.
 *
 * `parameterizeNotebook` never mutates its input. The injected cell (tagged
 * `injected-parameters`) goes right after the `parameters` cell; an
 * injected cell left over from a previous run is replaced in place; with no
 * `parameters` cell at all it is prepended and a warning is emitted. The
 * values used are recorded under `metadata.papermill.parameters`.
 */
import {
  findCellWithTag,
  INJECTED_PARAMETERS_TAG,
  normalizeCellTags,
  PARAMETERS_TAG,
} from "./cells.ts";
import {
  defaultNotebookEvents,
  type NotebookEventBus,
  reportWarning,
} from "./events.ts";
import { ensureKernelspec, FsKernelCatalog, type KernelCatalog } from "./kernel.ts";
import {
  cloneNotebook,
  newCodeCell,
  type NotebookCell,
  type NotebookDocument,
  parseNotebook,
} from "./model.ts";
import { jsonSerializableParams, type TaskParams } from "./params.ts";
import { codify, findTranslator } from "./translate.ts";

export type ParameterizeOptions = {
  /** Hide the injected cell's source (for human-facing previews). */
  reportMode?: boolean;
  /** First line of the injected cell, as a comment. */
  comment?: string;
  events?: NotebookEventBus;
};

export const INJECTED_CELL_COMMENT = "This cell was injected automatically " +
  "based on your stated upstream dependencies (cell above) and pipeline.yaml " +
  "preferences. It is temporary and will be removed when you save this " +
  "notebook";

function injectedCell(
  nb: NotebookDocument,
  parameters: Record<string, unknown>,
  options: ParameterizeOptions,
): NotebookCell {
  const kernelspec = nb.metadata.kernelspec;
  const translator = findTranslator(kernelspec?.name, kernelspec?.language);
  const cell = newCodeCell(
    codify(translator, parameters, options.comment),
    { tags: [INJECTED_PARAMETERS_TAG] },
  );
  if (options.reportMode) {
    cell.metadata.jupyter = { source_hidden: true };
  }
  if (nb.nbformat_minor >= 5) cell.id = INJECTED_PARAMETERS_TAG;
  return cell;
}

export function parameterizeNotebook(
  nb: NotebookDocument,
  parameters: Record<string, unknown>,
  options: ParameterizeOptions = {},
): NotebookDocument {
  const out = cloneNotebook(nb);
  const cell = injectedCell(out, parameters, options);

  const injected = findCellWithTag(out, INJECTED_PARAMETERS_TAG);
  const params = findCellWithTag(out, PARAMETERS_TAG);
  if (injected.index !== undefined) {
    out.cells.splice(injected.index, 1, cell);
  } else if (params.index !== undefined) {
    out.cells.splice(params.index + 1, 0, cell);
  } else {
    reportWarning(options.events ?? defaultNotebookEvents, {
      message: "Input notebook does not contain a cell with tag 'parameters'",
    });
    out.cells.unshift(cell);
  }

  out.metadata.papermill = { ...out.metadata.papermill, parameters };
  return out;
}

/* ========================= Contents models =========================== */

/** A Jupyter contents-API model: file name plus notebook JSON. */
export type NotebookContentsModel = {
  name: string;
  content: unknown;
  [key: string]: unknown;
};

export type InjectCellOptions = {
  catalog?: KernelCatalog;
  events?: NotebookEventBus;
};

/**
 * Inject parameters into a notebook opened for editing. The kernel comes
 * from the file extension when the notebook has none; `model.content` is
 * replaced with the parameterized notebook.
 */
export function injectCell(
  model: NotebookContentsModel,
  params: TaskParams,
  options: InjectCellOptions = {},
) {
  const nb = parseNotebook(model.content);
  ensureKernelspec(nb, {
    ext: model.name.split(".").pop(),
    catalog: options.catalog ?? new FsKernelCatalog(),
    loc: model.name,
  });

  nb.metadata.papermill ??= {
    parameters: {},
    environment_variables: {},
    version: null,
  };
  normalizeCellTags(nb);

  model.content = parameterizeNotebook(nb, jsonSerializableParams(params), {
    reportMode: false,
    comment: INJECTED_CELL_COMMENT,
    events: options.events,
  });
  return model;
}
