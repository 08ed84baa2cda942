import {
  defaultNotebookEvents,
  type NotebookEventBus,
  reportNotice,
} from "./events.ts";
import type { NotebookCell, NotebookDocument } from "./model.ts";

export const PARAMETERS_TAG = "parameters";
export const INJECTED_PARAMETERS_TAG = "injected-parameters";
export const DEBUGGING_SETTINGS_TAG = "debugging-settings";

export type TaggedCell =
  | { cell: NotebookCell; index: number }
  | { cell: undefined; index: undefined };

/**
 * First cell (in document order) whose tags include `tag`. Cells without
 * tags, or with an empty list, never match.
 */
export function findCellWithTag(nb: NotebookDocument, tag: string): TaggedCell {
  for (const [index, cell] of nb.cells.entries()) {
    const tags = cell.metadata.tags;
    if (tags?.length && tags.includes(tag)) return { cell, index };
  }
  return { cell: undefined, index: undefined };
}

/** Give every cell a (possibly empty) tags list, in place. */
export function normalizeCellTags(nb: NotebookDocument) {
  for (const cell of nb.cells) {
    if (!Array.isArray(cell.metadata.tags)) cell.metadata.tags = [];
  }
  return nb;
}

/**
 * Undo what rendering added so the notebook can be saved back as source:
 * drops the injected-parameters and debugging-settings cells and empty tag
 * lists. Mutates and returns `nb`.
 */
export function cleanupRenderedNotebook(
  nb: NotebookDocument,
  events: NotebookEventBus = defaultNotebookEvents,
) {
  for (const tag of [INJECTED_PARAMETERS_TAG, DEBUGGING_SETTINGS_TAG]) {
    const { index } = findCellWithTag(nb, tag);
    if (index === undefined) continue;
    reportNotice(events, { message: `Removing ${tag} cell...` });
    nb.cells.splice(index, 1);
  }

  for (const cell of nb.cells) {
    if (Array.isArray(cell.metadata.tags) && !cell.metadata.tags.length) {
      delete cell.metadata.tags;
    }
  }
  return nb;
}
