/**
 * minipas Parser using Chevrotain.
 * Produces a minipas AST from tokens.
 */
import { CstParser, EOF, tokenMatcher, type CstElement, type CstNode, type IToken } from "chevrotain";
import {
  allTokens,
  AdditiveOperator,
  Assign,
  Begin,
  Colon,
  Comma,
  Div,
  Dot,
  End,
  Ident,
  Integer,
  IntegerConst,
  LParen,
  Minus,
  MultiplicativeOperator,
  PascalLexer,
  Procedure,
  Program,
  Real,
  RealConst,
  RParen,
  Semi,
  Slash,
  Star,
  Var,
} from "./lexer.js";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import { INT_MAX, integer, real } from "./values.js";

class PascalCstParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false, nodeLocationTracking: "full" });
    this.performSelfAnalysis();
  }

  program = this.RULE("program", () => {
    this.CONSUME(Program);
    this.CONSUME(Ident);
    this.CONSUME(Semi);
    this.SUBRULE(this.block);
    this.CONSUME(Dot);
  });

  block = this.RULE("block", () => {
    this.MANY(() => {
      this.OR([
        { ALT: () => this.SUBRULE(this.varSection) },
        { ALT: () => this.SUBRULE(this.procDecl) },
      ]);
    });
    this.SUBRULE(this.compound);
  });

  varSection = this.RULE("varSection", () => {
    this.CONSUME(Var);
    this.AT_LEAST_ONE(() => {
      this.SUBRULE(this.varDecl);
      this.CONSUME(Semi);
    });
  });

  // x, y : INTEGER
  varDecl = this.RULE("varDecl", () => {
    this.CONSUME(Ident);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.CONSUME2(Ident);
    });
    this.CONSUME(Colon);
    this.SUBRULE(this.typeSpec);
  });

  procDecl = this.RULE("procDecl", () => {
    this.CONSUME(Procedure);
    this.CONSUME(Ident);
    this.OPTION(() => {
      this.CONSUME(LParen);
      this.SUBRULE(this.varDecl);
      this.MANY(() => {
        this.CONSUME(Semi);
        this.SUBRULE2(this.varDecl);
      });
      this.CONSUME(RParen);
    });
    this.CONSUME2(Semi);
    this.SUBRULE(this.block);
    this.CONSUME3(Semi);
  });

  typeSpec = this.RULE("typeSpec", () => {
    this.OR([
      { ALT: () => this.CONSUME(Integer) },
      { ALT: () => this.CONSUME(Real) },
    ]);
  });

  compound = this.RULE("compound", () => {
    this.CONSUME(Begin);
    this.OPTION(() => this.SUBRULE(this.statement));
    this.MANY(() => {
      this.CONSUME(Semi);
      this.OPTION2(() => this.SUBRULE2(this.statement));
    });
    this.CONSUME(End);
  });

  statement = this.RULE("statement", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.compound) },
      { ALT: () => this.SUBRULE(this.identStatement) },
    ]);
  });

  // assignment, call with arguments, or bare call
  identStatement = this.RULE("identStatement", () => {
    this.CONSUME(Ident);
    this.OPTION(() => {
      this.OR([
        {
          ALT: () => {
            this.CONSUME(Assign);
            this.SUBRULE(this.expr);
          },
        },
        {
          ALT: () => {
            this.CONSUME(LParen);
            this.OPTION2(() => {
              this.SUBRULE2(this.expr);
              this.MANY(() => {
                this.CONSUME(Comma);
                this.SUBRULE3(this.expr);
              });
            });
            this.CONSUME(RParen);
          },
        },
      ]);
    });
  });

  expr = this.RULE("expr", () => {
    this.SUBRULE(this.term);
    this.MANY(() => {
      this.CONSUME(AdditiveOperator);
      this.SUBRULE2(this.term);
    });
  });

  term = this.RULE("term", () => {
    this.SUBRULE(this.factor);
    this.MANY(() => {
      this.CONSUME(MultiplicativeOperator);
      this.SUBRULE2(this.factor);
    });
  });

  factor = this.RULE("factor", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(AdditiveOperator);
          this.SUBRULE(this.factor);
        },
      },
      { ALT: () => this.CONSUME(IntegerConst) },
      { ALT: () => this.CONSUME(RealConst) },
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.expr);
          this.CONSUME(RParen);
        },
      },
      { ALT: () => this.CONSUME(Ident) },
    ]);
  });
}

// Singleton parser instance
const cstParser = new PascalCstParser();

// --- CST to AST visitor ---

class AstBuildError extends Error {
  span: Span;

  constructor(message: string, span: Span) {
    super(message);
    this.name = "AstBuildError";
    this.span = span;
  }
}

function isCstNode(el: CstElement): el is CstNode {
  return "children" in el;
}

function nodes(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] ?? []).filter(isCstNode);
}

function tokens(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] ?? []).filter((el): el is IToken => !isCstNode(el));
}

function firstNode(cst: CstNode, key: string): CstNode {
  const found = nodes(cst, key)[0];
  if (!found) throw new Error(`Missing '${key}' in '${cst.name}'`);
  return found;
}

function firstToken(cst: CstNode, key: string): IToken {
  const found = tokens(cst, key)[0];
  if (!found) throw new Error(`Missing '${key}' token in '${cst.name}'`);
  return found;
}

// Sibling subrules and tokens are stored under separate keys; restore source order.
function bySourceOrder<T extends CstElement>(elements: T[]): T[] {
  const offsetOf = (el: CstElement): number =>
    isCstNode(el) ? (el.location?.startOffset ?? 0) : el.startOffset;
  return [...elements].sort((a, b) => offsetOf(a) - offsetOf(b));
}

function position(n: number | undefined, fallback: number): number {
  return n !== undefined && Number.isFinite(n) ? n : fallback;
}

function tokenSpan(token: IToken, file: string): Span {
  return {
    file,
    startLine: position(token.startLine, 1),
    startCol: position(token.startColumn, 1),
    endLine: position(token.endLine, 1),
    endCol: position(token.endColumn, 1) + 1,
  };
}

function cstSpan(node: CstNode, file: string): Span {
  const loc = node.location;
  if (loc) {
    return {
      file,
      startLine: position(loc.startLine, 1),
      startCol: position(loc.startColumn, 1),
      endLine: position(loc.endLine, 1),
      endCol: position(loc.endColumn, 1) + 1,
    };
  }
  return { file, startLine: 1, startCol: 1, endLine: 1, endCol: 1 };
}

function visitProgram(cst: CstNode, file: string): AST.ProgramDecl {
  return {
    kind: "ProgramDecl",
    span: cstSpan(cst, file),
    name: firstToken(cst, "Ident").image,
    block: visitBlock(firstNode(cst, "block"), file),
  };
}

function visitBlock(cst: CstNode, file: string): AST.Block {
  const declarations: AST.Declaration[] = [];
  const sections = bySourceOrder([...nodes(cst, "varSection"), ...nodes(cst, "procDecl")]);
  for (const section of sections) {
    if (section.name === "varSection") {
      for (const decl of nodes(section, "varDecl")) {
        declarations.push(...visitVarDecl(decl, file));
      }
    } else {
      declarations.push(visitProcDecl(section, file));
    }
  }
  return {
    kind: "Block",
    span: cstSpan(cst, file),
    declarations,
    body: visitCompound(firstNode(cst, "compound"), file),
  };
}

// One declaration per name: "a, b : INTEGER" yields two nodes sharing a TypeSpec.
function visitVarDecl(cst: CstNode, file: string): AST.VariableDecl[] {
  const type = visitTypeSpec(firstNode(cst, "typeSpec"), file);
  return tokens(cst, "Ident").map((t) => ({
    kind: "VariableDecl",
    span: tokenSpan(t, file),
    name: t.image,
    type,
  }));
}

function visitParams(cst: CstNode, file: string): AST.Param[] {
  const type = visitTypeSpec(firstNode(cst, "typeSpec"), file);
  return tokens(cst, "Ident").map((t) => ({
    kind: "Param",
    span: tokenSpan(t, file),
    name: t.image,
    type,
  }));
}

function visitProcDecl(cst: CstNode, file: string): AST.ProcedureDecl {
  const params: AST.Param[] = [];
  for (const group of nodes(cst, "varDecl")) {
    params.push(...visitParams(group, file));
  }
  return {
    kind: "ProcedureDecl",
    span: cstSpan(cst, file),
    name: firstToken(cst, "Ident").image,
    params,
    block: visitBlock(firstNode(cst, "block"), file),
  };
}

function visitTypeSpec(cst: CstNode, file: string): AST.TypeSpec {
  const token = tokens(cst, "Integer")[0] ?? firstToken(cst, "Real");
  return { kind: "TypeSpec", span: tokenSpan(token, file), name: token.image };
}

function visitCompound(cst: CstNode, file: string): AST.CompoundStatement {
  return {
    kind: "CompoundStatement",
    span: cstSpan(cst, file),
    children: nodes(cst, "statement").map((s) => visitStatement(s, file)),
  };
}

function visitStatement(cst: CstNode, file: string): AST.Statement {
  const compound = nodes(cst, "compound")[0];
  if (compound) return visitCompound(compound, file);
  return visitIdentStatement(firstNode(cst, "identStatement"), file);
}

function visitIdentStatement(cst: CstNode, file: string): AST.Statement {
  const nameToken = firstToken(cst, "Ident");
  const exprs = nodes(cst, "expr").map((e) => visitExpr(e, file));
  if (tokens(cst, "Assign").length > 0) {
    const value = exprs[0];
    if (!value) throw new AstBuildError("Assignment without a value.", cstSpan(cst, file));
    return {
      kind: "Assignment",
      span: cstSpan(cst, file),
      target: { kind: "VariableRef", span: tokenSpan(nameToken, file), name: nameToken.image },
      value,
    };
  }
  return {
    kind: "ProcedureCall",
    span: cstSpan(cst, file),
    name: nameToken.image,
    args: exprs,
  };
}

function binaryOperator(token: IToken): AST.BinaryOperator {
  if (tokenMatcher(token, Star)) return "*";
  if (tokenMatcher(token, Slash)) return "/";
  if (tokenMatcher(token, Div)) return "DIV";
  if (tokenMatcher(token, Minus)) return "-";
  return "+";
}

// Left-associative fold of operand (op operand)*
function foldBinary(
  cst: CstNode,
  operandKey: string,
  operatorKey: string,
  visitOperand: (node: CstNode, file: string) => AST.Expr,
  file: string
): AST.Expr {
  const operands = nodes(cst, operandKey);
  const operators = bySourceOrder(tokens(cst, operatorKey));
  const first = operands[0];
  if (!first) throw new AstBuildError("Expression without an operand.", cstSpan(cst, file));
  let left = visitOperand(first, file);
  operators.forEach((opToken, i) => {
    const rightNode = operands[i + 1];
    if (!rightNode) throw new AstBuildError("Operator without a right operand.", tokenSpan(opToken, file));
    const right = visitOperand(rightNode, file);
    left = {
      kind: "BinaryOp",
      span: { ...left.span, endLine: right.span.endLine, endCol: right.span.endCol },
      op: binaryOperator(opToken),
      left,
      right,
    };
  });
  return left;
}

function visitExpr(cst: CstNode, file: string): AST.Expr {
  return foldBinary(cst, "term", "AdditiveOperator", visitTerm, file);
}

function visitTerm(cst: CstNode, file: string): AST.Expr {
  return foldBinary(cst, "factor", "MultiplicativeOperator", visitFactor, file);
}

function visitFactor(cst: CstNode, file: string): AST.Expr {
  const sign = tokens(cst, "AdditiveOperator")[0];
  if (sign) {
    return {
      kind: "UnaryOp",
      span: cstSpan(cst, file),
      op: tokenMatcher(sign, Minus) ? "-" : "+",
      operand: visitFactor(firstNode(cst, "factor"), file),
    };
  }
  const intToken = tokens(cst, "IntegerConst")[0];
  if (intToken) {
    const n = parseInt(intToken.image, 10);
    if (n > INT_MAX) {
      throw new AstBuildError(`Integer literal '${intToken.image}' is out of range.`, tokenSpan(intToken, file));
    }
    return { kind: "NumberLiteral", span: tokenSpan(intToken, file), value: integer(n) };
  }
  const realToken = tokens(cst, "RealConst")[0];
  if (realToken) {
    return { kind: "NumberLiteral", span: tokenSpan(realToken, file), value: real(parseFloat(realToken.image)) };
  }
  const inner = nodes(cst, "expr")[0];
  if (inner) return visitExpr(inner, file);
  const ident = firstToken(cst, "Ident");
  return { kind: "VariableRef", span: tokenSpan(ident, file), name: ident.image };
}

// --- Public API ---

export interface ParseOptions {
  /** Keep chevrotain's full "expecting one of" message. */
  debugParse?: boolean;
}

export interface ParseResult {
  program?: AST.ProgramDecl;
  diagnostics: Diagnostic[];
}

function conciseParseMessage(token: IToken): string {
  if (tokenMatcher(token, EOF)) return "Unexpected end of input.";
  return `Unexpected token '${token.image}'.`;
}

export function parse(source: string, file: string = "<stdin>", options: ParseOptions = {}): ParseResult {
  const lexResult = PascalLexer.tokenize(source);
  const diagnostics: Diagnostic[] = [];

  for (const err of lexResult.errors) {
    diagnostics.push(
      makeDiag(
        "E_LEX",
        err.message,
        {
          file,
          startLine: position(err.line, 1),
          startCol: position(err.column, 1),
          endLine: position(err.line, 1),
          endCol: position(err.column, 1) + err.length,
        },
        "Check for characters outside the language or an unclosed '{' comment."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  cstParser.input = lexResult.tokens;
  const cst = cstParser.program();
  const lastToken = lexResult.tokens[lexResult.tokens.length - 1];

  for (const err of cstParser.errors) {
    const token = err.token;
    const span = tokenMatcher(token, EOF) && lastToken ? tokenSpan(lastToken, file) : tokenSpan(token, file);
    diagnostics.push(
      makeDiag(
        "E_PARSE",
        options.debugParse ? err.message : conciseParseMessage(token),
        span,
        "Check syntax near this location."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  try {
    const program = visitProgram(cst, file);
    return { program, diagnostics: [] };
  } catch (e) {
    if (e instanceof AstBuildError) {
      diagnostics.push(makeDiag("E_PARSE", e.message, e.span));
      return { diagnostics };
    }
    throw e;
  }
}
