/**
 * minipas Diagnostic types for lex/parse/semantic/runtime errors.
 */
import type { Span } from "./ast.js";
import { MinipasError } from "./errors.js";

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  hint?: string;
}

// Error kinds by code, as they appear in pretty output.
export const ERROR_KINDS: Readonly<Record<string, string>> = {
  E_LEX: "LexicalError",
  E_PARSE: "UnexpectedToken",
  E_DUPLICATE_ID: "DuplicateIdentifier",
  E_ID_NOT_FOUND: "IdentifierNotFound",
  E_PARAM_COUNT: "ParameterCountMismatch",
  E_TYPE_MISMATCH: "TypeMismatch",
  E_EVAL: "EvaluationError",
  E_CALL_DEPTH: "EvaluationError",
  E_CONFIG: "ConfigError",
  E_IO: "IOError",
};

const HINTS: Readonly<Record<string, string>> = {
  E_DUPLICATE_ID: "Rename one of the declarations; a name may be declared once per scope.",
  E_ID_NOT_FOUND: "Declare the name with VAR or PROCEDURE in this scope or an enclosing one.",
  E_PARAM_COUNT: "Pass exactly one argument per formal parameter.",
  E_TYPE_MISMATCH: "Use DIV for INTEGER division and '/' for REAL division; do not mix kinds.",
  E_CALL_DEPTH: "The language has no conditionals, so recursion never terminates.",
};

export function makeDiag(
  code: string,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  return { code, message, span, hint };
}

export function diagnosticFromError(e: unknown): Diagnostic {
  if (e instanceof MinipasError) {
    return makeDiag(e.code, e.message, e.span, HINTS[e.code]);
  }
  return makeDiag("E_EVAL", e instanceof Error ? e.message : String(e));
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  const loc = d.span
    ? `${d.span.file}:${d.span.startLine}:${d.span.startCol}`
    : "<unknown>";
  const kind = ERROR_KINDS[d.code];
  let out = `error[${d.code}]${kind ? ` ${kind}` : ""}: ${d.message}\n  --> ${loc}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}
