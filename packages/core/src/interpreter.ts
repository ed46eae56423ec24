/**
 * minipas Interpreter - walks an analyzed program and drives the call stack.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import { ActivationRecord, CallStack } from "./call-stack.js";
import { EvaluationError } from "./errors.js";
import type { VariableSymbol } from "./symbols.js";
import { makeEmitter, type EmitTrace, type TraceData, type TraceSink } from "./trace.js";
import { checkInteger, checkReal, widen, type Value } from "./values.js";

export const DEFAULT_MAX_CALL_DEPTH = 512;

export interface ExecOptions {
  /** Frames allowed on the stack, program frame included. */
  maxCallDepth?: number;
  trace?: TraceSink;
  runId?: string;
}

export interface ExecResult {
  /** Final stack; the program frame stays on it for inspection. */
  callStack: CallStack;
}

interface ExecContext {
  callStack: CallStack;
  maxCallDepth: number;
  emitTrace: EmitTrace;
}

export function execute(program: AST.ProgramDecl, options: ExecOptions = {}): ExecResult {
  const ctx: ExecContext = {
    callStack: new CallStack(),
    maxCallDepth: options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH,
    emitTrace: makeEmitter(options.runId ?? "run", options.trace),
  };
  const runStartMs = Date.now();

  ctx.emitTrace("run_start", program.span, { program: program.name, file: program.span.file });
  try {
    visitProgram(program, ctx);
    ctx.emitTrace("run_end", program.span, {
      durationMs: Date.now() - runStartMs,
      depth: ctx.callStack.depth,
    });
  } catch (e) {
    const errorData: TraceData = { durationMs: Date.now() - runStartMs, depth: ctx.callStack.depth };
    if (e instanceof EvaluationError) {
      errorData["error"] = e.code;
      errorData["message"] = e.message;
      e.callStack = ctx.callStack;
    } else {
      errorData["error"] = "E_EVAL";
      errorData["message"] = e instanceof Error ? e.message : String(e);
    }
    ctx.emitTrace("run_end", program.span, errorData);
    throw e;
  }

  return { callStack: ctx.callStack };
}

function visitProgram(program: AST.ProgramDecl, ctx: ExecContext): void {
  ctx.callStack.push(new ActivationRecord(program.name, "PROGRAM", 1, 1));
  executeBlock(program.block, ctx);
  // The program frame is never popped.
}

// Declarations have no runtime effect; locals appear on first assignment.
function executeBlock(block: AST.Block, ctx: ExecContext): void {
  executeStatement(block.body, ctx);
}

function executeStatement(stmt: AST.Statement, ctx: ExecContext): void {
  switch (stmt.kind) {
    case "CompoundStatement":
      for (const child of stmt.children) {
        executeStatement(child, ctx);
      }
      break;
    case "Assignment": {
      const value = evalExpr(stmt.value, ctx);
      const symbol = resolvedSymbol(stmt.target);
      owningFrame(symbol, ctx, stmt.target.span).set(symbol.name, widen(value, symbol.type.name));
      break;
    }
    case "ProcedureCall":
      callProcedure(stmt, ctx);
      break;
  }
}

function callProcedure(call: AST.ProcedureCall, ctx: ExecContext): void {
  const proc = call.procSymbol;
  if (!proc) {
    throw new EvaluationError("E_EVAL", `Call to '${call.name}' has not been analyzed.`, call.span);
  }
  const depth = ctx.callStack.depth;
  if (depth >= ctx.maxCallDepth) {
    throw new EvaluationError(
      "E_CALL_DEPTH",
      `Call depth limit of ${ctx.maxCallDepth} exceeded calling '${call.name}'.`,
      call.span,
      { limit: ctx.maxCallDepth, procedure: proc.name }
    );
  }

  const accessLink = frameAtLevel(proc.scopeLevel, ctx, call.span, proc.name);
  const record = new ActivationRecord(proc.name, "PROCEDURE", depth + 1, proc.scopeLevel + 1, accessLink);
  // Arguments are evaluated in the caller's frame, before the new one is pushed.
  proc.params.forEach((param, i) => {
    const arg = call.args[i];
    if (!arg) {
      throw new EvaluationError("E_EVAL", `Missing argument for '${param.name}' in call to '${call.name}'.`, call.span);
    }
    record.set(param.name, widen(evalExpr(arg, ctx), param.type.name));
  });

  ctx.callStack.push(record);
  ctx.emitTrace("call_start", call.span, { procedure: proc.name, depth: ctx.callStack.depth });
  executeBlock(proc.block, ctx);
  ctx.emitTrace("call_end", call.span, { procedure: proc.name, depth: ctx.callStack.depth });
  ctx.callStack.pop();
}

function resolvedSymbol(ref: AST.VariableRef): VariableSymbol {
  if (!ref.symbol) {
    throw new EvaluationError("E_EVAL", `Variable '${ref.name}' has not been analyzed.`, ref.span);
  }
  return ref.symbol;
}

// Follow access links from the top frame to the frame running the scope at `level`.
function frameAtLevel(level: number, ctx: ExecContext, span: Span, name: string): ActivationRecord {
  let frame = ctx.callStack.peek();
  while (frame && frame.scopeLevel > level) {
    frame = frame.accessLink ?? undefined;
  }
  if (!frame || frame.scopeLevel !== level) {
    throw new EvaluationError("E_EVAL", `No active frame holds '${name}'.`, span, { name, level });
  }
  return frame;
}

function owningFrame(symbol: VariableSymbol, ctx: ExecContext, span: Span): ActivationRecord {
  return frameAtLevel(symbol.scopeLevel, ctx, span, symbol.name);
}

function evalExpr(expr: AST.Expr, ctx: ExecContext): Value {
  switch (expr.kind) {
    case "NumberLiteral":
      return expr.value;

    case "VariableRef": {
      const symbol = resolvedSymbol(expr);
      const value = owningFrame(symbol, ctx, expr.span).get(symbol.name);
      if (value === undefined) {
        throw new EvaluationError(
          "E_EVAL",
          `Variable '${expr.name}' is used before it is assigned.`,
          expr.span,
          { name: expr.name }
        );
      }
      return value;
    }

    case "UnaryOp": {
      const operand = evalExpr(expr.operand, ctx);
      if (expr.op === "+") return operand;
      return operand.type === "INTEGER"
        ? checkInteger(0 - operand.value, expr.span)
        : checkReal(0 - operand.value, expr.span);
    }

    case "BinaryOp": {
      const left = evalExpr(expr.left, ctx);
      const right = evalExpr(expr.right, ctx);
      return evalBinaryOp(expr.op, left, right, expr.span);
    }
  }
}

function evalBinaryOp(op: AST.BinaryOperator, left: Value, right: Value, span: Span): Value {
  if (left.type === "INTEGER" && right.type === "INTEGER") {
    switch (op) {
      case "+": return checkInteger(left.value + right.value, span);
      case "-": return checkInteger(left.value - right.value, span);
      case "*": return checkInteger(left.value * right.value, span);
      case "DIV":
        if (right.value === 0) {
          throw new EvaluationError("E_EVAL", "Division by zero.", span);
        }
        return checkInteger(Math.trunc(left.value / right.value), span);
    }
  }

  if (left.type === "REAL" && right.type === "REAL") {
    switch (op) {
      case "+": return checkReal(left.value + right.value, span);
      case "-": return checkReal(left.value - right.value, span);
      case "*": return checkReal(left.value * right.value, span);
      case "/":
        if (right.value === 0) {
          throw new EvaluationError("E_EVAL", "Division by zero.", span);
        }
        return checkReal(left.value / right.value, span);
    }
  }

  const message = left.type === right.type
    ? `Operator '${op}' is not defined for ${left.type} operands.`
    : `Operator '${op}' cannot combine ${left.type} and ${right.type}.`;
  throw new EvaluationError("E_EVAL", message, span, { op, left: left.type, right: right.type });
}
