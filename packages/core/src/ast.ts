/**
 * minipas AST Node Definitions
 */
import type { ProcedureSymbol, VariableSymbol } from "./symbols.js";
import type { Value } from "./values.js";

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

// Base node with span
export interface BaseNode {
  kind: string;
  span: Span;
}

// --- Expressions ---
export interface NumberLiteral extends BaseNode {
  kind: "NumberLiteral";
  value: Value;
}

export type BinaryOperator = "+" | "-" | "*" | "DIV" | "/";

export interface BinaryOp extends BaseNode {
  kind: "BinaryOp";
  op: BinaryOperator;
  left: Expr;
  right: Expr;
}

export type UnaryOperator = "+" | "-";

export interface UnaryOp extends BaseNode {
  kind: "UnaryOp";
  op: UnaryOperator;
  operand: Expr;
}

export interface VariableRef extends BaseNode {
  kind: "VariableRef";
  /** Identifier as written in the source. */
  name: string;
  /** Filled in by the analyzer. */
  symbol?: VariableSymbol;
}

export type Expr = NumberLiteral | BinaryOp | UnaryOp | VariableRef;

// --- Statements ---
export interface Assignment extends BaseNode {
  kind: "Assignment";
  target: VariableRef;
  value: Expr;
}

export interface ProcedureCall extends BaseNode {
  kind: "ProcedureCall";
  name: string;
  args: Expr[];
  /** Filled in by the analyzer; the engine never re-resolves the callee. */
  procSymbol?: ProcedureSymbol;
}

export interface CompoundStatement extends BaseNode {
  kind: "CompoundStatement";
  children: Statement[];
}

export type Statement = CompoundStatement | Assignment | ProcedureCall;

// --- Declarations ---
export interface TypeSpec extends BaseNode {
  kind: "TypeSpec";
  name: string;
}

export interface VariableDecl extends BaseNode {
  kind: "VariableDecl";
  name: string;
  type: TypeSpec;
}

export interface Param extends BaseNode {
  kind: "Param";
  name: string;
  type: TypeSpec;
}

export interface ProcedureDecl extends BaseNode {
  kind: "ProcedureDecl";
  name: string;
  params: Param[];
  block: Block;
}

export type Declaration = VariableDecl | ProcedureDecl;

export interface Block extends BaseNode {
  kind: "Block";
  declarations: Declaration[];
  body: CompoundStatement;
}

// --- Program ---
export interface ProgramDecl extends BaseNode {
  kind: "ProgramDecl";
  name: string;
  block: Block;
}

export type Node =
  | Expr
  | Statement
  | TypeSpec
  | VariableDecl
  | Param
  | ProcedureDecl
  | Block
  | ProgramDecl;
