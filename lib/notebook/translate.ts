/**
 * Parameter translators: render JSON-like values as source code for the
 * notebook's language, producing the body of the injected-parameters cell.
 *
 * Python:
 *   # Parameters
 *   product = {"nb": "out.ipynb"}
 *   upstream = None
 *
 * R:
 *   # Parameters
 *   product = list("nb" = "out.ipynb")
 *   upstream = NULL
 *
 * Julia and Bash follow the same shape with their own literals
 * (`Dict("nb" => "out.ipynb")`, `nothing`; `product=out.ipynb`).
 */
import { UnsupportedLanguageError } from "./errors.ts";

export interface Translator {
  readonly language: string;
  translate(value: unknown): string;
  comment(text: string): string;
  assign(name: string, code: string): string;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function escapeNonAscii(text: string) {
  let out = "";
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (code < 0x80) out += ch;
    else if (code <= 0xff) out += `\\x${code.toString(16).padStart(2, "0")}`;
    else if (code <= 0xffff) out += `\\u${code.toString(16).padStart(4, "0")}`;
    else out += `\\U${code.toString(16).padStart(8, "0")}`;
  }
  return out;
}

/** Shared dispatch; subclasses only decide the literal syntax. */
abstract class BaseTranslator implements Translator {
  abstract readonly language: string;

  abstract none(): string;
  abstract bool(value: boolean): string;
  abstract number(value: number): string;
  abstract string(value: string): string;
  abstract list(items: string[]): string;
  abstract dict(entries: [string, string][]): string;

  translate(value: unknown): string {
    if (value === null || value === undefined) return this.none();
    if (typeof value === "boolean") return this.bool(value);
    if (typeof value === "number") return this.number(value);
    if (typeof value === "bigint") return value.toString();
    if (typeof value === "string") return this.string(value);
    if (Array.isArray(value)) {
      return this.list(value.map((v: unknown) => this.translate(v)));
    }
    if (isPlainRecord(value)) {
      return this.dict(
        Object.entries(value).map((
          [k, v],
        ): [string, string] => [this.string(k), this.translate(v)]),
      );
    }
    return this.string(String(value));
  }

  comment(text: string) {
    return `# ${text}`;
  }

  assign(name: string, code: string) {
    return `${name} = ${code}`;
  }
}

export class PythonTranslator extends BaseTranslator {
  readonly language = "python";

  none() {
    return "None";
  }

  bool(value: boolean) {
    return value ? "True" : "False";
  }

  number(value: number) {
    if (Number.isNaN(value)) return "float('nan')";
    if (value === Infinity) return "float('inf')";
    if (value === -Infinity) return "float('-inf')";
    return String(value);
  }

  string(value: string) {
    const escaped = escapeNonAscii(
      value
        .replace(/\\/g, "\\\\")
        .replace(/\n/g, "\\n")
        .replace(/\r/g, "\\r")
        .replace(/\t/g, "\\t"),
    ).replace(/"/g, '\\"');
    return `"${escaped}"`;
  }

  list(items: string[]) {
    return `[${items.join(", ")}]`;
  }

  dict(entries: [string, string][]) {
    return `{${entries.map(([k, v]) => `${k}: ${v}`).join(", ")}}`;
  }
}

export class RTranslator extends BaseTranslator {
  readonly language = "r";

  none() {
    return "NULL";
  }

  bool(value: boolean) {
    return value ? "TRUE" : "FALSE";
  }

  number(value: number) {
    if (Number.isNaN(value)) return "NaN";
    if (value === Infinity) return "Inf";
    if (value === -Infinity) return "-Inf";
    return Number.isInteger(value) ? `${value}L` : String(value);
  }

  string(value: string) {
    const escaped = value
      .replace(/\\/g, "\\\\")
      .replace(/\n/g, "\\n")
      .replace(/\r/g, "\\r")
      .replace(/\t/g, "\\t")
      .replace(/"/g, '\\"');
    return `"${escaped}"`;
  }

  list(items: string[]) {
    return `list(${items.join(", ")})`;
  }

  dict(entries: [string, string][]) {
    return `list(${entries.map(([k, v]) => `${k} = ${v}`).join(", ")})`;
  }
}

export class JuliaTranslator extends BaseTranslator {
  readonly language = "julia";

  none() {
    return "nothing";
  }

  bool(value: boolean) {
    return value ? "true" : "false";
  }

  number(value: number) {
    if (Number.isNaN(value)) return "NaN";
    if (value === Infinity) return "Inf";
    if (value === -Infinity) return "-Inf";
    return String(value);
  }

  string(value: string) {
    const escaped = value
      .replace(/\\/g, "\\\\")
      .replace(/\n/g, "\\n")
      .replace(/\r/g, "\\r")
      .replace(/\t/g, "\\t")
      .replace(/"/g, '\\"')
      .replace(/\$/g, "\\$");
    return `"${escaped}"`;
  }

  list(items: string[]) {
    return `[${items.join(", ")}]`;
  }

  dict(entries: [string, string][]) {
    return `Dict(${entries.map(([k, v]) => `${k} => ${v}`).join(", ")})`;
  }
}

const SHELL_SAFE = /^[\w@%+=:,./-]+$/;

/**
 * Bash has no null: `None` becomes an empty assignment. Mappings become
 * associative arrays, which need `declare -A`.
 */
export class BashTranslator extends BaseTranslator {
  readonly language = "bash";

  none() {
    return "";
  }

  bool(value: boolean) {
    return value ? "true" : "false";
  }

  number(value: number) {
    return String(value);
  }

  string(value: string) {
    if (value === "") return "''";
    if (SHELL_SAFE.test(value)) return value;
    return `'${value.replace(/'/g, `'"'"'`)}'`;
  }

  list(items: string[]) {
    return `(${items.join(" ")})`;
  }

  dict(entries: [string, string][]) {
    return `(${entries.map(([k, v]) => `[${k}]=${v}`).join(" ")})`;
  }

  assign(name: string, code: string) {
    return code.startsWith("([")
      ? `declare -A ${name}=${code}`
      : `${name}=${code}`;
  }
}

/* ============================== Registry ============================= */

const translators = new Map<string, Translator>();

export function registerTranslator(key: string, translator: Translator) {
  translators.set(key, translator);
}

(function preloadTranslators() {
  const python = new PythonTranslator();
  const r = new RTranslator();
  for (const key of ["python", "python3"]) registerTranslator(key, python);
  for (const key of ["r", "R", "ir"]) registerTranslator(key, r);
  registerTranslator("julia", new JuliaTranslator());
  for (const key of ["bash", "sh"]) registerTranslator(key, new BashTranslator());
})();

/** Translator for a kernel, looked up by kernel name first, then language. */
export function findTranslator(
  kernelName: string | undefined,
  language: string | undefined,
): Translator {
  const found = (kernelName ? translators.get(kernelName) : undefined) ??
    (language ? translators.get(language) : undefined);
  if (!found) {
    throw new UnsupportedLanguageError(
      `No parameter translator for kernel "${kernelName ?? ""}" or ` +
        `language "${language ?? ""}"`,
      language,
    );
  }
  return found;
}

/** Source of the injected cell: a comment line, then one assignment each. */
export function codify(
  translator: Translator,
  parameters: Record<string, unknown>,
  comment = "Parameters",
) {
  const lines = [translator.comment(comment)];
  for (const [name, value] of Object.entries(parameters)) {
    lines.push(translator.assign(name, translator.translate(value)));
  }
  return lines.join("\n") + "\n";
}
