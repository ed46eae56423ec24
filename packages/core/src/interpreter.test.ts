/**
 * Tests for the minipas interpreter.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { parse } from "./parser.js";
import { analyze } from "./analyzer.js";
import { execute, type ExecOptions } from "./interpreter.js";
import type { CallStack } from "./call-stack.js";
import { EvaluationError } from "./errors.js";
import type { TraceEvent } from "./trace.js";
import type { Value } from "./values.js";
import type * as AST from "./ast.js";

function prepare(src: string): AST.ProgramDecl {
  const result = parse(src, "test.pas");
  assert.deepEqual(result.diagnostics, []);
  assert.ok(result.program);
  analyze(result.program);
  return result.program;
}

function run(src: string, options?: ExecOptions): CallStack {
  return execute(prepare(src), options).callStack;
}

function globals(src: string): Record<string, Value> {
  const stack = run(src);
  assert.equal(stack.depth, 1);
  return Object.fromEntries(stack.records[0].entries());
}

// Run a program expected to fail and hand back the error.
function runError(src: string, options?: ExecOptions): EvaluationError {
  const program = prepare(src);
  try {
    execute(program, options);
  } catch (e) {
    if (e instanceof EvaluationError) return e;
    throw e;
  }
  throw new Error("Expected an EvaluationError");
}

describe("minipas Interpreter", () => {
  it("evaluates arithmetic with precedence", () => {
    assert.deepEqual(
      globals("PROGRAM p; VAR a : INTEGER; BEGIN a := 2 * 7 + 3 END."),
      { a: { type: "INTEGER", value: 17 } }
    );
  });

  it("applies nested unary minus", () => {
    assert.deepEqual(
      globals("PROGRAM p; VAR a : INTEGER; BEGIN a := 5 - - - 2 END."),
      { a: { type: "INTEGER", value: 3 } }
    );
  });

  it("negates a parenthesized negative", () => {
    assert.deepEqual(
      globals("PROGRAM p; VAR a : INTEGER; BEGIN a := 5 + -(-2) END."),
      { a: { type: "INTEGER", value: 7 } }
    );
  });

  it("divides integers with DIV and reals with /", () => {
    assert.deepEqual(
      globals("PROGRAM p; VAR q, n : INTEGER; r : REAL; BEGIN q := 10 DIV 4; n := -7 DIV 2; r := 10.0 / 4.0 END."),
      {
        q: { type: "INTEGER", value: 2 },
        n: { type: "INTEGER", value: -3 },
        r: { type: "REAL", value: 2.5 },
      }
    );
  });

  it("runs a program with nested compound statements", () => {
    const src = `
PROGRAM Part10;
VAR
   number     : INTEGER;
   a, b, c, _x : INTEGER;
   y          : REAL;
{ comments are skipped }
BEGIN
   BEGIN
      number := 2;
      a := number;
      b := 10 * a + 10 * NUMBER DIV 4;
      c := a - - b
   END;
   _x := 11;
   y := 20.0 / 8.0 + 3.5;
END.
`;
    assert.deepEqual(globals(src), {
      number: { type: "INTEGER", value: 2 },
      a: { type: "INTEGER", value: 2 },
      b: { type: "INTEGER", value: 25 },
      c: { type: "INTEGER", value: 27 },
      _x: { type: "INTEGER", value: 11 },
      y: { type: "REAL", value: 6 },
    });
  });

  it("stores INTEGER values assigned to REAL variables as REAL", () => {
    assert.deepEqual(
      globals("PROGRAM p; VAR r : REAL; BEGIN r := 2 END."),
      { r: { type: "REAL", value: 2 } }
    );
  });

  it("leaves the stack as it was after each call", () => {
    assert.deepEqual(
      globals(
        "PROGRAM p; VAR total : INTEGER; PROCEDURE addTo(n : INTEGER); BEGIN total := total + n END; " +
          "BEGIN total := 1; addTo(4); addTo(2 * 2 + 1) END."
      ),
      { total: { type: "INTEGER", value: 10 } }
    );
  });

  it("binds arguments to parameters by position", () => {
    assert.deepEqual(
      globals(
        "PROGRAM p; VAR r : INTEGER; PROCEDURE q(a, b : INTEGER); BEGIN r := a - b END; BEGIN q(10, 3) END."
      ),
      { r: { type: "INTEGER", value: 7 } }
    );
  });

  it("evaluates arguments in the caller's frame when a parameter shadows them", () => {
    assert.deepEqual(
      globals(
        "PROGRAM p; VAR x, r : INTEGER; PROCEDURE q(x : INTEGER); BEGIN r := x * 10 END; " +
          "BEGIN x := 4; q(x + 1) END."
      ),
      { x: { type: "INTEGER", value: 4 }, r: { type: "INTEGER", value: 50 } }
    );
  });

  it("writes the variable visible where the procedure is declared", () => {
    assert.deepEqual(
      globals(
        "PROGRAM p; VAR x : INTEGER; PROCEDURE outer; PROCEDURE inner; BEGIN x := 5 END; " +
          "VAR x : INTEGER; BEGIN x := 1; inner END; BEGIN x := 0; outer END."
      ),
      { x: { type: "INTEGER", value: 5 } }
    );
  });

  it("reaches enclosing variables through access links", () => {
    const src = `
PROGRAM Nest;
VAR x : INTEGER;
PROCEDURE outer(a : INTEGER);
VAR y : INTEGER;
  PROCEDURE inner;
  BEGIN
    y := a * 2;
    x := y + 1
  END;
BEGIN
  inner;
  x := x + y
END;
BEGIN
  outer(5)
END.
`;
    assert.deepEqual(globals(src), { x: { type: "INTEGER", value: 21 } });
  });

  it("keeps shadowed outer variables unchanged", () => {
    assert.deepEqual(
      globals("PROGRAM p; VAR x : INTEGER; PROCEDURE q; VAR x : REAL; BEGIN x := 1.5 END; BEGIN x := 7; q END."),
      { x: { type: "INTEGER", value: 7 } }
    );
  });

  it("builds frames with static and dynamic levels", () => {
    const err = runError(`
PROGRAM Nest;
PROCEDURE outer(a : INTEGER);
VAR y : INTEGER;
  PROCEDURE inner;
  BEGIN
    y := a DIV 0
  END;
BEGIN
  inner
END;
BEGIN
  outer(5)
END.
`);
    assert.equal(err.message, "Division by zero.");
    const frames = err.callStack?.records ?? [];
    assert.deepEqual(
      frames.map((f) => `${f.type} ${f.name} ${f.nestingLevel}/${f.scopeLevel}`),
      ["PROGRAM Nest 1/1", "PROCEDURE outer 2/2", "PROCEDURE inner 3/3"]
    );
    assert.equal(frames[1].accessLink, frames[0]);
    assert.equal(frames[2].accessLink, frames[1]);
    assert.deepEqual(frames[1].get("a"), { type: "INTEGER", value: 5 });
  });

  it("links recursive frames to the declaring scope", () => {
    const err = runError("PROGRAM p; PROCEDURE loop; BEGIN loop END; BEGIN loop END.", { maxCallDepth: 10 });
    assert.equal(err.code, "E_CALL_DEPTH");
    assert.equal(err.message, "Call depth limit of 10 exceeded calling 'loop'.");
    const frames = err.callStack?.records ?? [];
    assert.equal(frames.length, 10);
    assert.equal(frames[9].nestingLevel, 10);
    assert.equal(frames[9].scopeLevel, 2);
    assert.equal(frames[9].accessLink, frames[0]);
  });

  it("reports runtime arithmetic errors", () => {
    assert.equal(
      runError("PROGRAM p; VAR a : INTEGER; BEGIN a := 2147483647 + 1 END.").message,
      "Integer overflow."
    );
    assert.equal(
      runError("PROGRAM p; VAR r : REAL; BEGIN r := 1.0 / 0.0 END.").message,
      "Division by zero."
    );
  });

  it("reports reads of unassigned variables", () => {
    const err = runError("PROGRAM p; VAR a, b : INTEGER; BEGIN a := b END.");
    assert.equal(err.code, "E_EVAL");
    assert.equal(err.message, "Variable 'b' is used before it is assigned.");
    assert.equal(err.callStack?.depth, 1);
  });

  it("refuses to run a program that was not analyzed", () => {
    const result = parse("PROGRAM p; BEGIN a := 1 END.", "test.pas");
    assert.ok(result.program);
    const program = result.program;
    assert.throws(() => execute(program), {
      name: "EvaluationError",
      message: "Variable 'a' has not been analyzed.",
    });
  });

  it("emits run and call events", () => {
    const events: TraceEvent[] = [];
    run("PROGRAM p; PROCEDURE q; BEGIN END; BEGIN q END.", {
      trace: (ev) => events.push(ev),
      runId: "test-run",
    });
    assert.deepEqual(events.map((e) => e.event), ["run_start", "call_start", "call_end", "run_end"]);
    assert.deepEqual(events[0].data, { program: "p", file: "test.pas" });
    assert.deepEqual(events[1].data, { procedure: "q", depth: 2 });
    assert.equal(events[3].data?.["depth"], 1);
    assert.equal(events[3].data?.["error"], undefined);
  });

  it("records the error in the final run event", () => {
    const events: TraceEvent[] = [];
    runError("PROGRAM p; VAR a : INTEGER; BEGIN a := 1 DIV 0 END.", { trace: (ev) => events.push(ev) });
    const last = events[events.length - 1];
    assert.equal(last.event, "run_end");
    assert.equal(last.data?.["error"], "E_EVAL");
    assert.equal(last.data?.["message"], "Division by zero.");
  });
});
