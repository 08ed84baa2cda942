import pc from "picocolors";
import { type EventBus, eventBus } from "../universal/event-bus.ts";

export type NotebookWarning = {
  readonly message: string;
  /** Document location, when the notebook was loaded from a file. */
  readonly loc?: string;
};

export type NotebookNotice = {
  readonly message: string;
  readonly loc?: string;
};

export type NotebookEvents = {
  warning: NotebookWarning;
  notice: NotebookNotice;
};

export type NotebookEventBus = EventBus<NotebookEvents>;

export function notebookEvents(): NotebookEventBus {
  return eventBus<NotebookEvents>();
}

/** Process-wide bus used when a caller does not supply its own. */
export const defaultNotebookEvents = notebookEvents();

/**
 * Emit a warning; with nobody listening it goes to stderr so it is never
 * lost.
 */
export function reportWarning(
  bus: NotebookEventBus,
  warning: NotebookWarning,
) {
  if (bus.isObserved("warning")) {
    bus.emit("warning", warning);
    return;
  }
  const where = warning.loc ? pc.dim(` (${warning.loc})`) : "";
  console.warn(`${pc.yellow("warning")} ${warning.message}${where}`);
}

export function reportNotice(bus: NotebookEventBus, notice: NotebookNotice) {
  if (bus.isObserved("notice")) {
    bus.emit("notice", notice);
    return;
  }
  console.log(notice.message);
}
