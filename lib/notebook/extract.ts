/**
 * `upstream` / `product` declarations read from a parameters cell.
 *
 * Supported languages form a closed set; anything else is the explicit
 * `unsupported` variant, which fails when asked to extract.
 *
 * ```python
 * upstream = ["clean", "features"]
 * product = {"nb": "out.ipynb", "data": "out.csv"}
 * ```
 *
 * ```r
 * upstream <- c("clean", "features")
 * product <- list(nb = "out.ipynb", data = "out.csv")
 * ```
 *
 * Only literal values are understood; anything else is a
 * `NotebookFormatError`.
 */
import { NotebookFormatError, UnsupportedLanguageError } from "./errors.ts";
import type { JsonValue } from "./model.ts";
import { parsePython } from "./python.ts";

export type Extractor =
  | { readonly kind: "python" }
  | { readonly kind: "r" }
  | { readonly kind: "unsupported"; readonly language?: string };

export function extractorForLanguage(language: string | undefined): Extractor {
  switch (language?.toLowerCase()) {
    case "python":
      return { kind: "python" };
    case "r":
      return { kind: "r" };
    default:
      return { kind: "unsupported", language };
  }
}

/* ========================== Literal scanning ========================= */

const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\",
  "'": "'",
  '"': '"',
  n: "\n",
  t: "\t",
  r: "\r",
  a: "\x07",
  b: "\b",
  f: "\f",
  v: "\v",
  "0": "\0",
};

const HEX_ESCAPE_WIDTHS: Record<string, number> = { x: 2, u: 4, U: 8 };

class LiteralCursor {
  pos = 0;

  constructor(readonly text: string, readonly what: string) {}

  skipSpace() {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (/\s/.test(ch)) this.pos++;
      else if (ch === "#") {
        while (this.pos < this.text.length && this.text[this.pos] !== "\n") {
          this.pos++;
        }
      } else break;
    }
  }

  peek() {
    this.skipSpace();
    return this.text[this.pos] ?? "";
  }

  startsWith(s: string) {
    this.skipSpace();
    return this.text.startsWith(s, this.pos);
  }

  expect(s: string) {
    if (!this.startsWith(s)) this.fail(`expected "${s}"`);
    this.pos += s.length;
  }

  /** Consume `s` when it is next; report whether it was. */
  accept(s: string) {
    if (!this.startsWith(s)) return false;
    this.pos += s.length;
    return true;
  }

  word() {
    this.skipSpace();
    const m = /^[A-Za-z_.][\w.]*/.exec(this.text.slice(this.pos));
    if (!m) return undefined;
    this.pos += m[0].length;
    return m[0];
  }

  number(): number | undefined {
    this.skipSpace();
    const m = /^[-+]?(?:\d[\d_]*\.?\d*(?:[eE][-+]?\d+)?|\.\d+)L?/.exec(
      this.text.slice(this.pos),
    );
    if (!m) return undefined;
    this.pos += m[0].length;
    return Number(m[0].replace(/_/g, "").replace(/L$/, ""));
  }

  string(): string | undefined {
    this.skipSpace();
    const prefix = /^(?:[rR][bB]?|[bB][rR]?|[uU])?(?='|")/.exec(
      this.text.slice(this.pos),
    );
    if (!prefix) return undefined;
    const raw = /r/i.test(prefix[0]);
    this.pos += prefix[0].length;
    const q3 = this.text.slice(this.pos, this.pos + 3);
    const quote = q3 === '"""' || q3 === "'''" ? q3 : this.text[this.pos];
    this.pos += quote.length;
    let out = "";
    while (this.pos < this.text.length) {
      if (this.text.startsWith(quote, this.pos)) {
        this.pos += quote.length;
        return out;
      }
      const ch = this.text[this.pos++];
      if (ch === "\\" && !raw) out += this.#escape();
      else out += ch;
    }
    return this.fail("unterminated string");
  }

  #escape() {
    const next = this.text[this.pos++] ?? "";
    const width = HEX_ESCAPE_WIDTHS[next];
    if (width !== undefined) {
      const hex = this.text.slice(this.pos, this.pos + width);
      if (!new RegExp(`^[0-9a-fA-F]{${width}}$`).test(hex)) {
        return this.fail(`invalid \\${next} escape`);
      }
      this.pos += width;
      return String.fromCodePoint(parseInt(hex, 16));
    }
    if (next === "\n") return "";
    return SIMPLE_ESCAPES[next] ?? `\\${next}`;
  }

  end() {
    this.skipSpace();
    if (this.text[this.pos] === ";") this.pos++;
    this.skipSpace();
    if (this.pos < this.text.length) this.fail("unexpected trailing text");
  }

  fail(reason: string): never {
    throw new NotebookFormatError(
      `Could not read ${this.what} (${reason}): ${this.text.trim()}`,
    );
  }
}

/* ============================== Python =============================== */

function pythonLiteral(c: LiteralCursor): JsonValue {
  const str = c.string();
  if (str !== undefined) {
    // adjacent literals concatenate
    let joined = str;
    for (let more = c.string(); more !== undefined; more = c.string()) {
      joined += more;
    }
    return joined;
  }
  const num = c.number();
  if (num !== undefined) return num;

  const pairs: Record<string, string> = { "[": "]", "(": ")", "{": "}" };
  const open = c.peek();
  const close = pairs[open];
  if (close) {
    c.expect(open);
    const items: JsonValue[] = [];
    const dict: { [key: string]: JsonValue } = {};
    let isDict = false;
    while (!c.accept(close)) {
      const item = pythonLiteral(c);
      if (open === "{" && c.accept(":")) {
        isDict = true;
        dict[String(item)] = pythonLiteral(c);
      } else items.push(item);
      if (!c.accept(",")) {
        c.expect(close);
        break;
      }
    }
    if (isDict || (open === "{" && !items.length)) return dict;
    return items;
  }

  const word = c.word();
  if (word === "None") return null;
  if (word === "True") return true;
  if (word === "False") return false;
  return c.fail(word ? `"${word}" is not a literal` : "expected a literal");
}

/** Value assigned to `name` at the top level of a Python cell. */
function pythonAssignment(source: string, name: string): string | undefined {
  let found: string | undefined;
  const top = parsePython(source).topNode;
  for (let stmt = top.firstChild; stmt; stmt = stmt.nextSibling) {
    if (stmt.name !== "AssignStatement") continue;
    const target = stmt.firstChild;
    if (!target || source.slice(target.from, target.to) !== name) continue;
    // optional annotation, then the value after "="
    const rest = source.slice(target.to, stmt.to);
    const op = /^\s*(?::[^=\n]*)?=(?!=)/.exec(rest);
    if (op) found = rest.slice(op[0].length);
  }
  return found;
}

/* ================================= R ================================= */

function rLiteral(c: LiteralCursor): JsonValue {
  const str = c.string();
  if (str !== undefined) return str;
  const num = c.number();
  if (num !== undefined) return num;

  const word = c.word();
  if (word === "NULL") return null;
  if (word === "TRUE" || word === "T") return true;
  if (word === "FALSE" || word === "F") return false;
  if ((word === "c" || word === "list") && c.accept("(")) {
    const items: JsonValue[] = [];
    const named: { [key: string]: JsonValue } = {};
    let isNamed = false;
    while (!c.accept(")")) {
      const save = c.pos;
      const key = c.string() ?? c.word();
      if (key !== undefined && c.accept("=") && !c.startsWith("=")) {
        isNamed = true;
        named[key] = rLiteral(c);
      } else {
        c.pos = save;
        items.push(rLiteral(c));
      }
      if (!c.accept(",")) {
        c.expect(")");
        break;
      }
    }
    return isNamed ? named : items;
  }
  return c.fail(word ? `"${word}" is not a literal` : "expected a literal");
}

/** Index just past a balanced R expression starting at `start`. */
function rExpressionEnd(text: string, start: number) {
  let depth = 0;
  let quote: string | undefined;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === "(") depth++;
    else if (ch === ")") depth--;
    else if (ch === "\n" && depth <= 0) return i;
  }
  return text.length;
}

function rAssignment(source: string, name: string): string | undefined {
  const re = new RegExp(`^[ \\t]*${name}[ \\t]*(?:<-|=)[ \\t]*`, "gm");
  let found: string | undefined;
  for (const m of source.matchAll(re)) {
    const start = (m.index ?? 0) + m[0].length;
    found = source.slice(start, rExpressionEnd(source, start));
  }
  return found;
}

/* ============================= Extraction ============================ */

function declared(
  extractor: Extractor,
  source: string,
  name: string,
): JsonValue | undefined {
  switch (extractor.kind) {
    case "python": {
      const text = pythonAssignment(source, name);
      if (text === undefined) return undefined;
      const c = new LiteralCursor(text, name);
      const value = pythonLiteral(c);
      c.end();
      return value;
    }
    case "r": {
      const text = rAssignment(source, name);
      if (text === undefined) return undefined;
      const c = new LiteralCursor(text, name);
      const value = rLiteral(c);
      c.end();
      return value;
    }
    case "unsupported":
      throw new UnsupportedLanguageError(
        `Extracting "${name}" is not supported for language ` +
          `"${extractor.language ?? "unknown"}"`,
        extractor.language,
      );
  }
}

/**
 * Names of upstream dependencies: list, tuple or set items, or dict keys.
 * `undefined` when not declared or declared as None/NULL.
 */
export function extractUpstream(
  extractor: Extractor,
  source: string,
): string[] | undefined {
  const value = declared(extractor, source, "upstream");
  if (value === undefined || value === null) return undefined;
  const names = Array.isArray(value)
    ? value.map(String)
    : typeof value === "object"
    ? Object.keys(value)
    : [String(value)];
  return Array.from(new Set(names));
}

/** The declared product; `undefined` when not declared or None/NULL. */
export function extractProduct(
  extractor: Extractor,
  source: string,
): JsonValue | undefined {
  const value = declared(extractor, source, "product");
  return value === null ? undefined : value;
}
