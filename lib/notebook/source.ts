/**
 * `NotebookSource`: a script or notebook resolved into a kernel-bound,
 * parameterizable Jupyter document.
 *
 * Four cached artifacts back the accessors: the unrendered text and document
 * (computed together) and the rendered text and document. With `hotReload`
 * the unrendered pair is recomputed from the backing file on every read and
 * reading the rendered text re-runs the render, so nothing is ever stale.
 *
 * ```ts
 * const source = NotebookSource.fromFile("tasks/clean.py", {
 *   staticAnalysis: true,
 * });
 * source.render({ product: "out/clean.ipynb", upstream: null });
 * writeFileSync("out/clean-input.ipynb", source.nbStrRendered);
 * ```
 */
import { readFileSync } from "node:fs";
import { basename } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { LazyArtifact } from "../universal/lazy-artifact.ts";
import { findCellWithTag, normalizeCellTags, PARAMETERS_TAG } from "./cells.ts";
import { extractDocstring } from "./docstring.ts";
import {
  RenderError,
  SourceInitializationError,
  UnsupportedLanguageError,
  UsageError,
} from "./errors.ts";
import { defaultNotebookEvents, type NotebookEventBus } from "./events.ts";
import {
  extractorForLanguage,
  extractProduct,
  extractUpstream,
} from "./extract.ts";
import { ensureKernelspec, FsKernelCatalog, type KernelCatalog } from "./kernel.ts";
import { extensionOf, inferLanguage } from "./language.ts";
import {
  cloneNotebook,
  type NotebookDocument,
  readNotebook,
  writeNotebook,
} from "./model.ts";
import { parameterizeNotebook } from "./parameterize.ts";
import {
  jsonSerializableParams,
  type SerializedParams,
  type TaskParams,
} from "./params.ts";
import type { StaticChecker } from "./python.ts";
import { readsNotebook } from "./transcode.ts";
import { checkNotebook } from "./validate.ts";

/** Content that knows where it was loaded from. */
export interface Placeholder {
  readonly path: string;
  toString(): string;
}

export type NotebookPrimitive = string | Placeholder | URL;

export const notebookSourceOptionsSchema = z.object({
  hotReload: z.boolean().default(false),
  /** Format of raw-text sources ("py", "R", "ipynb", ...). */
  extIn: z.string().min(1).optional(),
  kernelspecName: z.string().min(1).optional(),
  staticAnalysis: z.boolean().default(false),
});

export type NotebookSourceSettings = z.infer<typeof notebookSourceOptionsSchema>;

export type NotebookSourceOptions =
  & z.input<typeof notebookSourceOptionsSchema>
  & {
    catalog?: KernelCatalog;
    events?: NotebookEventBus;
    checker?: StaticChecker;
  };

type Unrendered = { text: string; nb: NotebookDocument };

export function isPlaceholder(value: unknown): value is Placeholder {
  return !!value && typeof value === "object" && "path" in value &&
    typeof value.path === "string";
}

export class NotebookSource {
  readonly settings: NotebookSourceSettings;
  readonly #catalog: KernelCatalog;
  readonly #events: NotebookEventBus;
  readonly #checker?: StaticChecker;
  readonly #path?: string;
  readonly #extIn: string;
  readonly #language?: string;
  #primitive: string;
  #params?: SerializedParams;

  readonly #unrendered: LazyArtifact<Unrendered>;
  readonly #renderedText = new LazyArtifact<string>();
  readonly #renderedObj: LazyArtifact<NotebookDocument>;

  constructor(primitive: NotebookPrimitive, options: NotebookSourceOptions = {}) {
    const parsed = notebookSourceOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new SourceInitializationError(
        `Invalid notebook source options: ${parsed.error.message}`,
        { cause: parsed.error },
      );
    }
    this.settings = parsed.data;
    this.#catalog = options.catalog ?? new FsKernelCatalog();
    this.#events = options.events ?? defaultNotebookEvents;
    this.#checker = options.checker;

    if (typeof primitive === "string") {
      this.#primitive = primitive;
    } else if (primitive instanceof URL) {
      this.#path = fileURLToPath(primitive);
      this.#primitive = this.#readPath(this.#path);
    } else if (isPlaceholder(primitive)) {
      this.#path = primitive.path;
      try {
        this.#primitive = String(primitive);
      } catch (error) {
        throw new SourceInitializationError(
          `Could not read notebook "${primitive.path}"`,
          { cause: error },
        );
      }
    } else {
      throw new TypeError(
        "Notebooks must be initialized from strings, Placeholder or URL, " +
          `got ${typeof primitive}`,
      );
    }

    const { hotReload, extIn } = this.settings;
    if (this.#path === undefined && hotReload) {
      throw new SourceInitializationError(
        "hotReload only works if the notebook was loaded from a file",
      );
    }
    if (this.#path !== undefined && extIn !== undefined) {
      throw new SourceInitializationError(
        '"extIn" must be omitted when the notebook is loaded from a file, ' +
          "the extension is taken from the path",
      );
    }
    if (this.#path === undefined && extIn === undefined) {
      throw new SourceInitializationError(
        '"extIn" is required when the notebook is initialized from a ' +
          "string. Either load it from a file or pass the source code " +
          'together with "extIn"',
      );
    }
    this.#extIn = extIn ?? extensionOf(this.#path ?? "");

    // inconclusive for container formats like ipynb, which is fine: the
    // kernel metadata or the content decides then
    this.#language = inferLanguage(this.#extIn);

    this.#unrendered = new LazyArtifact(hotReload, () => this.#toUnrendered());
    this.#renderedObj = new LazyArtifact(
      hotReload,
      () => readNotebook(this.nbStrRendered),
    );

    // resolves the kernel, throws when that is not possible
    const { nb } = this.#unrendered.read();
    if (!findCellWithTag(nb, PARAMETERS_TAG).cell) {
      throw this.#missingParametersCell();
    }
  }

  static fromFile(path: string, options: NotebookSourceOptions = {}) {
    const placeholder: Placeholder = {
      path,
      toString: () => readFileSync(path, "utf-8"),
    };
    return new NotebookSource(placeholder, options);
  }

  #readPath(path: string) {
    try {
      return readFileSync(path, "utf-8");
    } catch (error) {
      throw new SourceInitializationError(`Could not read notebook "${path}"`, {
        cause: error,
      });
    }
  }

  #missingParametersCell() {
    const loc = this.loc ? ` "${this.loc}"` : "";
    return new SourceInitializationError(
      `Notebook${loc} does not have a cell tagged "parameters"`,
    );
  }

  #toUnrendered(): Unrendered {
    const nb = readsNotebook(this.primitive, this.#extIn);
    ensureKernelspec(nb, {
      kernelspecName: this.settings.kernelspecName,
      ext: this.#extIn,
      language: this.#language,
      catalog: this.#catalog,
      loc: this.loc,
    });
    return { text: writeNotebook(nb), nb };
  }

  /** Raw source; re-read from disk on each access under hot reload. */
  get primitive() {
    if (this.settings.hotReload && this.#path !== undefined) {
      this.#primitive = this.#readPath(this.#path);
    }
    return this.#primitive;
  }

  get hotReload() {
    return this.settings.hotReload;
  }

  get staticAnalysis() {
    return this.settings.staticAnalysis;
  }

  get nbStrUnrendered() {
    return this.#unrendered.read().text;
  }

  get nbObjUnrendered() {
    return this.#unrendered.read().nb;
  }

  /** Fill in the parameters; the only way rendered state changes. */
  render(params: TaskParams) {
    const serialized = jsonSerializableParams(params);
    this.#render(serialized);
    this.#params = serialized;
  }

  #render(params: SerializedParams) {
    const { nb: unrendered } = this.#unrendered.read();

    const nb = normalizeCellTags(cloneNotebook(unrendered));
    nb.metadata.papermill = {};
    const rendered = parameterizeNotebook(nb, params, {
      events: this.#events,
    });
    const text = writeNotebook(rendered);

    this.#postRenderValidation(params, text, unrendered);
    this.#renderedText.set(text);
    this.#renderedObj.reset();
  }

  #postRenderValidation(
    params: SerializedParams,
    text: string,
    unrendered: NotebookDocument,
  ) {
    if (!this.settings.staticAnalysis) return;
    if (this.language !== "python") {
      throw new UnsupportedLanguageError(
        "staticAnalysis is only implemented for Python notebooks, set the " +
          "option to false",
        this.language,
      );
    }
    try {
      checkNotebook(readNotebook(text), params, {
        filename: this.#path ?? "notebook",
        parametersSource: findCellWithTag(unrendered, PARAMETERS_TAG).cell
          ?.source,
        checker: this.#checker,
        events: this.#events,
        loc: this.loc,
      });
    } catch (error) {
      if (!(error instanceof RenderError)) throw error;
      throw new RenderError(error.message, error.report, text);
    }
  }

  /** Rendered notebook text; re-rendered on each access under hot reload. */
  get nbStrRendered(): string {
    const text = this.#renderedText.peek();
    if (text === undefined || this.#params === undefined) {
      throw new UsageError(
        "Attempted to read an unrendered notebook, render it first",
      );
    }
    if (this.settings.hotReload) {
      this.#render(this.#params);
      return this.#renderedText.peek() ?? text;
    }
    return text;
  }

  get nbObjRendered(): NotebookDocument {
    return this.#renderedObj.read();
  }

  /**
   * Best effort: from the extension when conclusive, else from the kernel
   * metadata (lower case, so "R" reads as "r"), else `undefined`.
   */
  get language(): string | undefined {
    return this.#language ??
      this.nbObjUnrendered.metadata.kernelspec?.language?.toLowerCase();
  }

  get loc() {
    return this.#path;
  }

  get name() {
    return this.#path === undefined ? undefined : basename(this.#path);
  }

  get doc() {
    return extractDocstring(this.nbObjUnrendered);
  }

  #parametersSource() {
    const { cell } = findCellWithTag(this.nbObjUnrendered, PARAMETERS_TAG);
    if (!cell) throw this.#missingParametersCell();
    return cell.source;
  }

  extractUpstream() {
    return extractUpstream(
      extractorForLanguage(this.language),
      this.#parametersSource(),
    );
  }

  extractProduct() {
    return extractProduct(
      extractorForLanguage(this.language),
      this.#parametersSource(),
    );
  }

  toString() {
    return this.nbObjRendered.cells.map((c) => c.source).join("\n");
  }

  describe() {
    return this.loc !== undefined
      ? `NotebookSource('${this.loc}')`
      : "NotebookSource(loaded from string)";
  }
}
