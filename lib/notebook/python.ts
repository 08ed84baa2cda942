/**
 * Python source analysis on top of the Lezer Python grammar.
 *
 * - `pythonSyntaxErrors` / `parsesAsPython`: the parse gate used by the
 *   kernel heuristic and the static checker. Lezer recovers from errors by
 *   inserting error nodes, so any error node means "does not parse". Python 2
 *   `print 'x'` statements count as errors too.
 * - `usedNames`: every identifier appearing in the source, the way a
 *   parameters cell "declares" its parameters.
 * - `checkPythonSource`: a small pyflakes-style checker reporting syntax
 *   errors (as errors) and undefined names / unused imports (as warnings).
 *
 * The name analysis is flow- and scope-insensitive: a name counts as defined
 * when it is bound anywhere in the source. It under-reports compared to a
 * real scope analysis and never reports a name that is bound somewhere.
 */
import { readFileSync } from "node:fs";
import type { SyntaxNode, Tree } from "@lezer/common";
import { parser } from "@lezer/python";
import { z } from "zod";

export type SourcePosition = { line: number; column: number };

export type PythonDiagnostic = SourcePosition & {
  offset: number;
  message: string;
};

export type CheckerResult = {
  /** Newline-separated warning lines, "" when clean. */
  warnings: string;
  /** Newline-separated error lines, "" when clean. */
  errors: string;
};

/** Static checker contract: source text and a filename for diagnostics. */
export type StaticChecker = (source: string, filename: string) => CheckerResult;

const builtins: ReadonlySet<string> = new Set(
  z.array(z.string()).parse(
    JSON.parse(
      readFileSync(new URL("./python-builtins.json", import.meta.url), "utf-8"),
    ),
  ),
);

export function parsePython(source: string): Tree {
  return parser.parse(source);
}

export function positionOf(source: string, offset: number): SourcePosition {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source[i] === "\n") {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}

const STRING_LEADING_KEYWORDS = new Set([
  "and", "assert", "await", "case", "elif", "else", "if", "in", "is",
  "match", "not", "or", "raise", "return", "while", "with", "yield",
]);

/**
 * The grammar accepts a name directly followed by a string literal
 * (`print 'hi'`, Python 2 statements) which Python 3 rejects.
 */
function juxtaposedString(source: string, stringFrom: number) {
  const m = /(^|[^\w.])([A-Za-z_]\w*)[ \t]+$/.exec(
    source.slice(Math.max(0, stringFrom - 80), stringFrom),
  );
  return !!m && !STRING_LEADING_KEYWORDS.has(m[2]);
}

export function pythonSyntaxErrors(
  source: string,
  tree: Tree = parsePython(source),
): PythonDiagnostic[] {
  const found: PythonDiagnostic[] = [];
  let lastOffset = -1;
  tree.iterate({
    enter(node) {
      if (node.from === lastOffset) return;
      const isString = node.name === "String" || node.name === "FormatString";
      if (
        !node.type.isError &&
        !(isString && juxtaposedString(source, node.from))
      ) return;
      lastOffset = node.from;
      found.push({
        ...positionOf(source, node.from),
        offset: node.from,
        message: "invalid syntax",
      });
    },
  });
  return found;
}

export function parsesAsPython(source: string) {
  return pythonSyntaxErrors(source).length === 0;
}

/** Every identifier (variables, attributes, keyword-argument names). */
export function usedNames(source: string): Set<string> {
  const names = new Set<string>();
  parsePython(source).iterate({
    enter(node) {
      if (node.name === "VariableName" || node.name === "PropertyName") {
        names.add(source.slice(node.from, node.to));
      }
    },
  });
  return names;
}

/* ========================== Name resolution ========================== */

type NameRole = "bind" | "use" | "ignore";

type NameOccurrence = {
  name: string;
  node: SyntaxNode;
  role: NameRole;
};

type ImportBinding = { name: string; display: string; offset: number };

const TARGET_CONTAINERS = new Set([
  "TupleExpression",
  "ParenthesizedExpression",
  "ArrayExpression",
]);

/**
 * Classifies identifiers by looking at their siblings. Keywords and operators
 * are compared by source text so the analysis does not depend on whether the
 * grammar exposes a token as a named node.
 */
class NameAnalysis {
  readonly occurrences: NameOccurrence[] = [];
  readonly imports: ImportBinding[] = [];
  starImport = false;
  readonly #importRoles = new Map<number, NameRole>();

  constructor(readonly source: string, readonly tree: Tree) {
    tree.iterate({
      enter: (ref) => {
        if (ref.name === "ImportStatement") this.#analyzeImport(ref.node);
      },
    });
    tree.iterate({
      enter: (ref) => {
        if (ref.name !== "VariableName") return;
        const node = ref.node;
        this.occurrences.push({
          name: this.text(node),
          node,
          role: this.#roleOf(node),
        });
      },
    });
  }

  text(node: SyntaxNode) {
    return this.source.slice(node.from, node.to);
  }

  /** The token(s) right before `node` inside its parent. */
  leading(node: SyntaxNode) {
    const prev = node.prevSibling;
    const gap = this.source
      .slice(prev ? prev.to : (node.parent?.from ?? 0), node.from)
      .trim();
    if (gap) return gap;
    return prev ? this.text(prev) : "";
  }

  /** The token(s) right after `node` inside its parent. */
  trailing(node: SyntaxNode) {
    const next = node.nextSibling;
    const gap = this.source
      .slice(node.to, next ? next.from : (node.parent?.to ?? node.to))
      .trim();
    if (gap) return gap;
    return next ? this.text(next) : "";
  }

  #laterAssignment(node: SyntaxNode) {
    for (let s: SyntaxNode | null = node; s; s = s.nextSibling) {
      if (s !== node && this.text(s) === "=") return true;
      if (this.trailing(s) === "=") return true;
    }
    return false;
  }

  #roleOf(node: SyntaxNode): NameRole {
    const importRole = this.#importRoles.get(node.from);
    if (importRole) return importRole;

    let top = node;
    while (top.parent && TARGET_CONTAINERS.has(top.parent.name)) {
      top = top.parent;
    }
    const parent = top.parent;
    if (!parent) return "use";

    const before = this.leading(top);
    const after = this.trailing(top);
    if (before === "as" || after === ":=") return "bind";

    switch (parent.name) {
      case "AssignStatement":
        return this.#laterAssignment(top) || after.startsWith(":")
          ? "bind"
          : "use";
      case "FunctionDefinition":
      case "ClassDefinition":
        return "bind";
      case "ParamList":
        return before === "=" ? "use" : "bind";
      case "ArgList":
        if (after === "=") return "ignore";
        break;
      case "ScopeStatement":
        return "bind";
      case "Decorator":
        // @pkg.mod.name: only the head is a name lookup
        return before === "." ? "ignore" : "use";
    }

    // a lone generator argument, f(x for x in xs), keeps its clauses
    // directly inside the ArgList
    if (
      parent.name === "ForStatement" || parent.name.includes("Comprehension") ||
      parent.name === "ArgList"
    ) {
      const head = this.source.slice(parent.from, top.from);
      const keywords = head.match(/\b(for|in)\b/g);
      if (keywords && keywords[keywords.length - 1] === "for") return "bind";
    }
    return "use";
  }

  #analyzeImport(stmt: SyntaxNode) {
    const children: SyntaxNode[] = [];
    for (let c = stmt.firstChild; c; c = c.nextSibling) children.push(c);
    const names = children.filter((c) => c.name === "VariableName");
    const stmtText = this.text(stmt);
    const importAt = stmtText.search(/\bimport\b/);
    const isFrom = /^\s*from\b/.test(stmtText);

    if (isFrom) {
      if (/\bimport\s*\(?\s*\*/.test(stmtText)) this.starImport = true;
      for (const n of names) {
        if (n.from - stmt.from < importAt) {
          this.#importRoles.set(n.from, "ignore");
        } else if (this.trailing(n) === "as") {
          this.#importRoles.set(n.from, "ignore");
        } else {
          this.#bindImport(n, this.text(n));
        }
      }
      return;
    }

    // import a.b.c, d as e
    let i = 0;
    while (i < names.length) {
      const first = names[i];
      const dotted = [first];
      while (i + 1 < names.length && this.leading(names[i + 1]) === ".") {
        dotted.push(names[++i]);
      }
      const last = dotted[dotted.length - 1];
      const hasAlias = this.trailing(last) === "as" && i + 1 < names.length;
      for (const n of dotted) this.#importRoles.set(n.from, "ignore");
      if (hasAlias) {
        const alias = names[++i];
        this.#bindImport(alias, dotted.map((n) => this.text(n)).join("."));
      } else {
        this.#bindImport(first, dotted.map((n) => this.text(n)).join("."));
      }
      i++;
    }
  }

  #bindImport(node: SyntaxNode, display: string) {
    this.#importRoles.set(node.from, "bind");
    this.imports.push({ name: this.text(node), display, offset: node.from });
  }
}

/* ============================== Checker ============================== */

function syntaxErrorText(
  source: string,
  filename: string,
  diag: PythonDiagnostic,
) {
  const lineText = source.split("\n")[diag.line - 1] ?? "";
  return [
    `${filename}:${diag.line}:${diag.column}: ${diag.message}`,
    lineText,
    `${" ".repeat(Math.max(diag.column - 1, 0))}^`,
  ].join("\n");
}

/**
 * Check Python source the way pyflakes does: when the source does not parse,
 * only the syntax errors are reported; otherwise undefined names and unused
 * imports become warnings.
 */
export const checkPythonSource: StaticChecker = (source, filename) => {
  const tree = parsePython(source);
  const syntax = pythonSyntaxErrors(source, tree);
  if (syntax.length) {
    return {
      warnings: "",
      errors: syntax.map((d) => syntaxErrorText(source, filename, d)).join(
        "\n",
      ),
    };
  }

  const analysis = new NameAnalysis(source, tree);
  const bound = new Set<string>();
  const used = new Set<string>();
  for (const occ of analysis.occurrences) {
    if (occ.role === "bind") bound.add(occ.name);
    if (occ.role === "use") used.add(occ.name);
  }

  const findings: PythonDiagnostic[] = [];
  if (!analysis.starImport) {
    for (const occ of analysis.occurrences) {
      if (occ.role !== "use") continue;
      if (bound.has(occ.name) || builtins.has(occ.name)) continue;
      findings.push({
        ...positionOf(source, occ.node.from),
        offset: occ.node.from,
        message: `undefined name '${occ.name}'`,
      });
    }
  }
  for (const imp of analysis.imports) {
    if (used.has(imp.name)) continue;
    findings.push({
      ...positionOf(source, imp.offset),
      offset: imp.offset,
      message: `'${imp.display}' imported but unused`,
    });
  }

  findings.sort((a, b) => a.offset - b.offset);
  return {
    warnings: findings
      .map((f) => `${filename}:${f.line}:${f.column}: ${f.message}`)
      .join("\n"),
    errors: "",
  };
};
