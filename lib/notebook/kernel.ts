/**
 * Kernel resolution: which Jupyter kernel a document runs on.
 *
 * `determineKernelName` applies a fixed priority (first hit wins):
 *
 * 1. the kernel name the caller passed explicitly
 * 2. `metadata.kernelspec.name` already on the document
 * 3. the language implied by the file extension (when there is one, it
 *    overrides the `language` argument), mapped to that language's default
 *    kernel (`python` → `python3`, `r` → `ir`)
 * 4. a content heuristic that can only ever answer "python3"
 *
 * `ensureKernelspec` then validates the name against a `KernelCatalog` and
 * writes the full identity to the document.
 */
import { existsSync, readdirSync, readFileSync } from "node:fs";
import { homedir, platform } from "node:os";
import { delimiter, join } from "node:path";
import { z } from "zod";
import { getLanguageByIdOrAlias } from "../universal/code.ts";
import { NoSuchKernelError, SourceInitializationError } from "./errors.ts";
import { inferLanguage } from "./language.ts";
import {
  concatenatedSource,
  type KernelIdentity,
  type NotebookDocument,
} from "./model.ts";
import { parsesAsPython } from "./python.ts";

/* ============================== Catalog ============================== */

export interface KernelCatalog {
  /** @throws NoSuchKernelError when `name` is not installed */
  get(name: string): KernelIdentity;
  names(): string[];
}

export class StaticKernelCatalog implements KernelCatalog {
  readonly #kernels = new Map<string, KernelIdentity>();

  constructor(kernels: Iterable<KernelIdentity> = []) {
    for (const k of kernels) this.#kernels.set(k.name, k);
  }

  get(name: string): KernelIdentity {
    const found = this.#kernels.get(name);
    if (!found) throw new NoSuchKernelError(name, this.names());
    return found;
  }

  names() {
    return Array.from(this.#kernels.keys()).sort();
  }
}

export const kernelJsonSchema = z.looseObject({
  argv: z.array(z.string()),
  display_name: z.string(),
  language: z.string(),
});

export type KernelJson = z.infer<typeof kernelJsonSchema>;

/**
 * Jupyter data directories searched for `kernels/<name>/kernel.json`, in
 * order: `JUPYTER_PATH`, the user data dir, the active virtualenv or conda
 * prefix, then the system dirs.
 */
export function jupyterKernelDirs(
  env: Record<string, string | undefined> = process.env,
  os: string = platform(),
  home: string = homedir(),
): string[] {
  const dirs: string[] = [];
  for (const p of (env.JUPYTER_PATH ?? "").split(delimiter)) {
    if (p) dirs.push(join(p, "kernels"));
  }

  let userData: string;
  if (env.JUPYTER_DATA_DIR) userData = env.JUPYTER_DATA_DIR;
  else if (os === "darwin") userData = join(home, "Library", "Jupyter");
  else if (os === "win32" && env.APPDATA) {
    userData = join(env.APPDATA, "jupyter");
  } else userData = join(home, ".local", "share", "jupyter");
  dirs.push(join(userData, "kernels"));

  // environment prefixes, where `ipykernel install --sys-prefix` writes
  for (const prefix of [env.VIRTUAL_ENV, env.CONDA_PREFIX]) {
    if (prefix) dirs.push(join(prefix, "share", "jupyter", "kernels"));
  }

  if (os === "win32") {
    if (env.PROGRAMDATA) dirs.push(join(env.PROGRAMDATA, "jupyter", "kernels"));
  } else {
    dirs.push("/usr/local/share/jupyter/kernels", "/usr/share/jupyter/kernels");
  }
  return dirs;
}

/**
 * Catalog of the kernels installed on this machine. Directories are scanned
 * on every call, so kernels installed after construction are seen too.
 */
export class FsKernelCatalog implements KernelCatalog {
  constructor(readonly dirs: readonly string[] = jupyterKernelDirs()) {}

  #kernelJsonPath(name: string) {
    for (const dir of this.dirs) {
      const candidate = join(dir, name, "kernel.json");
      if (existsSync(candidate)) return candidate;
    }
    return undefined;
  }

  get(name: string): KernelIdentity {
    const path = this.#kernelJsonPath(name);
    if (!path) throw new NoSuchKernelError(name, this.names());
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new NoSuchKernelError(name, this.names(), { cause: error });
    }
    const parsed = kernelJsonSchema.safeParse(raw);
    if (!parsed.success) {
      throw new NoSuchKernelError(name, this.names(), {
        cause: parsed.error,
      });
    }
    return {
      name,
      display_name: parsed.data.display_name,
      language: parsed.data.language,
    };
  }

  names() {
    const found = new Set<string>();
    for (const dir of this.dirs) {
      if (!existsSync(dir)) continue;
      for (const entry of readdirSync(dir, { withFileTypes: true })) {
        if (
          entry.isDirectory() &&
          existsSync(join(dir, entry.name, "kernel.json"))
        ) {
          found.add(entry.name);
        }
      }
    }
    return Array.from(found).sort();
  }
}

/* ============================ Heuristics ============================= */

export type PythonSniff = "python" | "not-python" | "inconclusive";

/**
 * Guess whether a document is Python. Best effort and ambiguous by
 * construction: lots of R parses as Python, so a successful parse only counts
 * when the text has no `<-` (R's assignment, and rare in Python).
 */
export function sniffPython(nb: NotebookDocument): PythonSniff {
  const language = nb.metadata.kernelspec?.language;
  if (language !== undefined) {
    return language === "python" ? "python" : "not-python";
  }

  const code = concatenatedSource(nb);
  if (!parsesAsPython(code)) return "not-python";
  return code.includes("<-") ? "inconclusive" : "python";
}

export function isPython(nb: NotebookDocument) {
  return sniffPython(nb) === "python";
}

/* ============================= Resolution ============================ */

export function determineKernelName(
  nb: NotebookDocument,
  kernelspecName?: string,
  ext?: string,
  language?: string,
): string | undefined {
  if (kernelspecName !== undefined) return kernelspecName;

  const fromMetadata = nb.metadata.kernelspec?.name;
  if (fromMetadata !== undefined) return fromMetadata;

  const lang = ext ? inferLanguage(ext) : language;
  const defaultKernel = lang
    ? getLanguageByIdOrAlias(lang)?.defaultKernel
    : undefined;
  if (defaultKernel) return defaultKernel;

  return isPython(nb) ? "python3" : undefined;
}

export type EnsureKernelspecOptions = {
  kernelspecName?: string;
  ext?: string;
  language?: string;
  catalog: KernelCatalog;
  /** Document location, used in error messages. */
  loc?: string;
};

const listKernelsHint = 'To see list of installed kernels run ' +
  '"jupyter kernelspec list" in the terminal (first column indicates the ' +
  'name). Python is usually named "python3", R usually "ir"';

/** Resolve, validate and write `metadata.kernelspec`; mutates `nb`. */
export function ensureKernelspec(
  nb: NotebookDocument,
  options: EnsureKernelspecOptions,
): KernelIdentity {
  const { kernelspecName, ext, language, catalog, loc } = options;
  const kernelName = determineKernelName(nb, kernelspecName, ext, language);
  const subject = loc ? `Notebook "${loc}"` : "Notebook";

  if (kernelName === undefined) {
    throw new SourceInitializationError(
      `${subject} does not contain kernelspec metadata and ` +
        "kernelspecName was not specified, either add kernelspec info to " +
        `your source file or specify a kernelspec by name. ${listKernelsHint}`,
    );
  }

  let kernel: KernelIdentity;
  try {
    kernel = catalog.get(kernelName);
  } catch (error) {
    if (!(error instanceof NoSuchKernelError)) throw error;
    const installed = error.available.length
      ? error.available.map((n) => `"${n}"`).join(", ")
      : "none";
    throw new SourceInitializationError(
      `${subject} uses kernel "${kernelName}", which is not installed ` +
        `(installed kernels: ${installed}). ${listKernelsHint}`,
      { cause: error },
    );
  }

  nb.metadata.kernelspec = {
    display_name: kernel.display_name,
    language: kernel.language,
    name: kernelName,
  };
  return kernel;
}
