/**
 * minipas Semantic Analyzer
 * Resolves every name against the lexical scope chain before anything runs,
 * annotating variable references and call sites with their symbols.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import { SemanticError } from "./errors.js";
import { canonicalName } from "./names.js";
import {
  SymbolTable,
  type BuiltinTypeSymbol,
  type ProcedureSymbol,
  type VariableSymbol,
} from "./symbols.js";
import { makeEmitter, type EmitTrace, type TraceSink } from "./trace.js";
import type { TypeName } from "./values.js";

export interface AnalyzeOptions {
  trace?: TraceSink;
  runId?: string;
}

export interface AnalysisResult {
  /** Every table created during analysis, in creation order. */
  scopes: SymbolTable[];
}

/**
 * Analyze a program in place. The first problem found throws a SemanticError;
 * there is no partial result.
 */
export function analyze(program: AST.ProgramDecl, options: AnalyzeOptions = {}): AnalysisResult {
  const analyzer = new SemanticAnalyzer(makeEmitter(options.runId ?? "analyze", options.trace));
  analyzer.visitProgram(program);
  return { scopes: analyzer.scopes };
}

function assignable(from: TypeName, to: TypeName): boolean {
  return from === to || (from === "INTEGER" && to === "REAL");
}

class SemanticAnalyzer {
  readonly scopes: SymbolTable[] = [];
  private current: SymbolTable | null = null;

  constructor(private readonly emitTrace: EmitTrace) {}

  visitProgram(program: AST.ProgramDecl): void {
    this.enterScope("global", program.span);
    this.visitBlock(program.block);
    this.leaveScope(program.span);
  }

  private get scope(): SymbolTable {
    if (!this.current) {
      throw new Error("Analyzer used outside of a program scope.");
    }
    return this.current;
  }

  private enterScope(name: string, span: Span): SymbolTable {
    const level = this.current ? this.current.scopeLevel + 1 : 1;
    const table = new SymbolTable(name, level, this.current);
    this.scopes.push(table);
    this.current = table;
    this.emitTrace("scope_enter", span, { scope: name, level });
    return table;
  }

  private leaveScope(span: Span): void {
    const table = this.scope;
    this.emitTrace("scope_leave", span, {
      scope: table.scopeName,
      level: table.scopeLevel,
      symbols: table.symbols().length,
    });
    this.current = table.enclosingScope;
  }

  // Procedure headers are entered first so bodies can call siblings declared
  // after them. Variables and bodies are then taken in source order: a body only
  // sees the variables declared above it.
  private visitBlock(block: AST.Block): void {
    const headers = new Map<AST.ProcedureDecl, ProcedureSymbol>();
    for (const decl of block.declarations) {
      if (decl.kind === "ProcedureDecl") {
        headers.set(decl, this.declareProcedure(decl));
      }
    }
    for (const decl of block.declarations) {
      if (decl.kind === "VariableDecl") {
        this.declareVariable(decl);
        continue;
      }
      const symbol = headers.get(decl);
      if (symbol) {
        this.visitProcedureBody(decl, symbol);
      }
    }
    this.visitCompound(block.body);
  }

  private resolveType(typeSpec: AST.TypeSpec): BuiltinTypeSymbol {
    const found = this.scope.lookup(canonicalName(typeSpec.name));
    if (!found || found.kind !== "BuiltinType") {
      throw new SemanticError(
        "E_ID_NOT_FOUND",
        `Identifier not found: type '${typeSpec.name}'.`,
        typeSpec.span,
        { name: typeSpec.name }
      );
    }
    return found;
  }

  private ensureUnique(name: string, text: string, span: Span): void {
    if (this.scope.lookup(name, true)) {
      throw new SemanticError(
        "E_DUPLICATE_ID",
        `Duplicate identifier '${text}' in scope '${this.scope.scopeName}'.`,
        span,
        { name: text, scope: this.scope.scopeName }
      );
    }
  }

  private declareVariable(decl: AST.VariableDecl | AST.Param): VariableSymbol {
    const type = this.resolveType(decl.type);
    const name = canonicalName(decl.name);
    this.ensureUnique(name, decl.name, decl.span);
    const symbol: VariableSymbol = {
      kind: "Variable",
      name,
      type,
      scopeLevel: this.scope.scopeLevel,
    };
    this.scope.insert(symbol);
    return symbol;
  }

  // The procedure symbol lives in the enclosing scope; its formals are typed
  // here and entered into the body scope once the body is visited.
  private declareProcedure(decl: AST.ProcedureDecl): ProcedureSymbol {
    const name = canonicalName(decl.name);
    this.ensureUnique(name, decl.name, decl.span);
    const params: VariableSymbol[] = decl.params.map((p) => ({
      kind: "Variable",
      name: canonicalName(p.name),
      type: this.resolveType(p.type),
      scopeLevel: this.scope.scopeLevel + 1,
    }));
    const symbol: ProcedureSymbol = {
      kind: "Procedure",
      name,
      params,
      block: decl.block,
      scopeLevel: this.scope.scopeLevel,
    };
    this.scope.insert(symbol);
    return symbol;
  }

  private visitProcedureBody(decl: AST.ProcedureDecl, symbol: ProcedureSymbol): void {
    this.enterScope(symbol.name, decl.span);
    decl.params.forEach((p, i) => {
      const param = symbol.params[i];
      if (!param) return;
      this.ensureUnique(param.name, p.name, p.span);
      this.scope.insert(param);
    });
    this.visitBlock(decl.block);
    this.leaveScope(decl.span);
  }

  private visitCompound(stmt: AST.CompoundStatement): void {
    for (const child of stmt.children) {
      this.visitStatement(child);
    }
  }

  private visitStatement(stmt: AST.Statement): void {
    switch (stmt.kind) {
      case "CompoundStatement":
        this.visitCompound(stmt);
        break;
      case "Assignment": {
        const valueType = this.visitExpr(stmt.value);
        const target = this.resolveVariable(stmt.target);
        if (!assignable(valueType, target.type.name)) {
          throw new SemanticError(
            "E_TYPE_MISMATCH",
            `Cannot assign a ${valueType} value to ${target.type.name} variable '${stmt.target.name}'.`,
            stmt.span,
            { name: stmt.target.name, expected: target.type.name, actual: valueType }
          );
        }
        break;
      }
      case "ProcedureCall":
        this.visitProcedureCall(stmt);
        break;
    }
  }

  private visitProcedureCall(call: AST.ProcedureCall): void {
    const found = this.scope.lookup(canonicalName(call.name));
    if (!found || found.kind !== "Procedure") {
      throw new SemanticError(
        "E_ID_NOT_FOUND",
        `Identifier not found: procedure '${call.name}'.`,
        call.span,
        { name: call.name }
      );
    }
    if (found.params.length !== call.args.length) {
      throw new SemanticError(
        "E_PARAM_COUNT",
        `Procedure '${call.name}' expects ${found.params.length} argument(s), got ${call.args.length}.`,
        call.span,
        { name: call.name, expected: found.params.length, actual: call.args.length }
      );
    }
    call.args.forEach((arg, i) => {
      const argType = this.visitExpr(arg);
      const param = found.params[i];
      if (param && !assignable(argType, param.type.name)) {
        throw new SemanticError(
          "E_TYPE_MISMATCH",
          `Argument ${i + 1} of '${call.name}' is ${argType}, expected ${param.type.name}.`,
          arg.span,
          { name: call.name, expected: param.type.name, actual: argType }
        );
      }
    });
    call.procSymbol = found;
  }

  private resolveVariable(ref: AST.VariableRef): VariableSymbol {
    const found = this.scope.lookup(canonicalName(ref.name));
    if (!found || found.kind !== "Variable") {
      throw new SemanticError(
        "E_ID_NOT_FOUND",
        `Identifier not found: '${ref.name}'.`,
        ref.span,
        { name: ref.name }
      );
    }
    ref.symbol = found;
    return found;
  }

  private visitExpr(expr: AST.Expr): TypeName {
    switch (expr.kind) {
      case "NumberLiteral":
        return expr.value.type;
      case "VariableRef":
        return this.resolveVariable(expr).type.name;
      case "UnaryOp":
        return this.visitExpr(expr.operand);
      case "BinaryOp": {
        const left = this.visitExpr(expr.left);
        const right = this.visitExpr(expr.right);
        if (left !== right) {
          throw new SemanticError(
            "E_TYPE_MISMATCH",
            `Operator '${expr.op}' cannot combine ${left} and ${right}.`,
            expr.span,
            { op: expr.op, left, right }
          );
        }
        if ((expr.op === "DIV" && left !== "INTEGER") || (expr.op === "/" && left !== "REAL")) {
          throw new SemanticError(
            "E_TYPE_MISMATCH",
            `Operator '${expr.op}' is not defined for ${left} operands.`,
            expr.span,
            { op: expr.op, left, right }
          );
        }
        return left;
      }
    }
  }
}
