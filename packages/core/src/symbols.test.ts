/**
 * Tests for minipas symbol tables.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { SymbolTable, type VariableSymbol } from "./symbols.js";

function variable(name: string, type: "INTEGER" | "REAL", scopeLevel: number): VariableSymbol {
  return { kind: "Variable", name, type: { kind: "BuiltinType", name: type }, scopeLevel };
}

describe("minipas SymbolTable", () => {
  it("starts with the builtin types", () => {
    const global = new SymbolTable("global", 1);
    assert.deepEqual(global.lookup("integer"), { kind: "BuiltinType", name: "INTEGER" });
    assert.deepEqual(global.lookup("real"), { kind: "BuiltinType", name: "REAL" });
    assert.equal(global.symbols().length, 2);
  });

  it("keys symbols by canonical name", () => {
    const global = new SymbolTable("global", 1);
    global.insert(variable("Total", "INTEGER", 1));
    assert.equal(global.lookup("total")?.name, "Total");
    assert.equal(global.lookup("Total"), undefined);
  });

  it("walks outward through enclosing scopes", () => {
    const global = new SymbolTable("global", 1);
    const inner = new SymbolTable("alpha", 2, global);
    global.insert(variable("x", "INTEGER", 1));
    assert.equal(inner.lookup("x")?.kind, "Variable");
    assert.equal(inner.lookup("x", true), undefined);
    assert.equal(inner.lookup("missing"), undefined);
  });

  it("returns the nearest binding when names are shadowed", () => {
    const global = new SymbolTable("global", 1);
    const inner = new SymbolTable("alpha", 2, global);
    global.insert(variable("x", "INTEGER", 1));
    inner.insert(variable("x", "REAL", 2));

    const found = inner.lookup("x");
    assert.equal(found?.kind, "Variable");
    if (found?.kind !== "Variable") return;
    assert.equal(found.type.name, "REAL");
    assert.equal(found.scopeLevel, 2);

    const outer = global.lookup("x");
    assert.equal(outer?.kind === "Variable" ? outer.type.name : null, "INTEGER");
  });

  it("exposes its name, level and parent", () => {
    const global = new SymbolTable("global", 1);
    const inner = new SymbolTable("alpha", 2, global);
    assert.equal(inner.scopeName, "alpha");
    assert.equal(inner.scopeLevel, 2);
    assert.equal(inner.enclosingScope, global);
    assert.equal(global.enclosingScope, null);
  });
});
