/**
 * minipas run - analyze and execute a program
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  analyze,
  ConfigError,
  diagnosticFromError,
  EvaluationError,
  execute,
  formatDiagnostic,
  formatDiagnostics,
  formatValue,
  loadConfig,
  parse,
  SemanticError,
  type CallStack,
  type ExecOptions,
  type ProgramDecl,
  type TraceEvent,
} from "@minipas/core";
import { readSource } from "./source.js";

export interface RunOptions {
  pretty?: boolean;
  trace?: string;
  maxCallDepth?: number;
  debugParse?: boolean;
  cwd?: string;
  homeDir?: string;
}

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

/** One block per frame, program frame first. */
export function formatCallStack(stack: CallStack): string {
  return stack.records
    .map((record) => {
      const header = `${record.type} ${record.name} [nesting ${record.nestingLevel}, scope ${record.scopeLevel}]`;
      const members = record.entries().map(([name, value]) => `  ${name}: ${value.type} = ${formatValue(value)}`);
      return [header, ...members].join("\n");
    })
    .join("\n\n");
}

export async function runRun(file: string, opts: RunOptions): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (code: string, message: string): void => {
    console.error(formatDiagnostic({ code, message }, pretty));
  };

  const source = readSource(file, pretty);
  if (!source) return 4;

  const parseResult = parse(source.text, source.file, { debugParse: !!opts.debugParse });
  if (parseResult.diagnostics.length > 0 || !parseResult.program) {
    console.error(formatDiagnostics(parseResult.diagnostics, pretty));
    return 2;
  }
  const program = parseResult.program;

  let maxCallDepth: number;
  try {
    maxCallDepth = opts.maxCallDepth ?? loadConfig(opts.cwd, opts.homeDir).limits.maxCallDepth;
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(formatDiagnostic(diagnosticFromError(e), pretty));
      return 4;
    }
    throw e;
  }

  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening trace file: ${msg}`);
      return 4;
    }
  }

  const fd = traceFd;
  const traceHandler =
    fd !== null
      ? (event: TraceEvent) => {
          try {
            fs.writeSync(fd, JSON.stringify(event) + "\n");
          } catch (e) {
            const msg = e instanceof Error ? e.message : String(e);
            throw new CliIoError(`Error writing trace file: ${msg}`);
          }
        }
      : undefined;

  const code = runProgram(program, { maxCallDepth, trace: traceHandler, runId: crypto.randomUUID() }, pretty);
  const closeCode = closeTrace(traceFd, emitCliError);
  return code !== 0 ? code : closeCode;
}

function runProgram(program: ProgramDecl, options: ExecOptions, pretty: boolean): number {
  try {
    analyze(program, { trace: options.trace, runId: options.runId });
    const result = execute(program, options);
    console.log(pretty ? formatCallStack(result.callStack) : JSON.stringify(result.callStack, null, 2));
    return 0;
  } catch (e) {
    if (e instanceof CliIoError) {
      console.error(formatDiagnostic({ code: "E_IO", message: e.message }, pretty));
      return 4;
    }
    if (e instanceof SemanticError) {
      console.error(formatDiagnostics([diagnosticFromError(e)], pretty));
      return 2;
    }
    if (e instanceof EvaluationError) {
      if (pretty) {
        console.error(formatDiagnostic(diagnosticFromError(e), true));
        if (e.callStack) {
          console.error("\nCall stack at failure:\n" + formatCallStack(e.callStack));
        }
      } else {
        console.error(
          JSON.stringify({
            code: e.code,
            message: e.message,
            span: e.span,
            details: e.details,
            callStack: e.callStack,
          })
        );
      }
      return 4;
    }
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_EVAL", message: msg }, pretty));
    return 4;
  }
}

function closeTrace(fd: number | null, emitCliError: (code: string, message: string) => void): number {
  if (fd === null) return 0;
  try {
    fs.closeSync(fd);
    return 0;
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error closing trace file: ${msg}`);
    return 4;
  }
}
