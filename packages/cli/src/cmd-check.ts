/**
 * minipas check - parse and analyze without executing
 */
import {
  analyze,
  diagnosticFromError,
  formatDiagnostics,
  parse,
  SemanticError,
} from "@minipas/core";
import { readSource } from "./source.js";

export async function runCheck(
  file: string,
  opts: { pretty?: boolean; debugParse?: boolean }
): Promise<number> {
  const pretty = !!opts.pretty;
  const source = readSource(file, pretty);
  if (!source) return 4;

  const parseResult = parse(source.text, source.file, { debugParse: !!opts.debugParse });
  if (parseResult.diagnostics.length > 0 || !parseResult.program) {
    console.error(formatDiagnostics(parseResult.diagnostics, pretty));
    return 2;
  }

  try {
    analyze(parseResult.program);
  } catch (e) {
    if (e instanceof SemanticError) {
      console.error(formatDiagnostics([diagnosticFromError(e)], pretty));
      return 2;
    }
    throw e;
  }

  console.log(pretty ? "No errors found." : "[]");
  return 0;
}
