/**
 * minipas Lexer using Chevrotain.
 */
import { createToken, Lexer } from "chevrotain";

// Identifiers (keywords below point their longer_alt here)
export const Ident = createToken({ name: "Ident", pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

// Operator categories, consumed by the parser in place of the concrete tokens
export const AdditiveOperator = createToken({ name: "AdditiveOperator", pattern: Lexer.NA });
export const MultiplicativeOperator = createToken({ name: "MultiplicativeOperator", pattern: Lexer.NA });

// Keywords are case-insensitive
export const Program = createToken({ name: "Program", pattern: /program/i, longer_alt: Ident });
export const Var = createToken({ name: "Var", pattern: /var/i, longer_alt: Ident });
export const Procedure = createToken({ name: "Procedure", pattern: /procedure/i, longer_alt: Ident });
export const Begin = createToken({ name: "Begin", pattern: /begin/i, longer_alt: Ident });
export const End = createToken({ name: "End", pattern: /end/i, longer_alt: Ident });
export const Div = createToken({
  name: "Div",
  pattern: /div/i,
  longer_alt: Ident,
  categories: MultiplicativeOperator,
});
export const Integer = createToken({ name: "Integer", pattern: /integer/i, longer_alt: Ident });
export const Real = createToken({ name: "Real", pattern: /real/i, longer_alt: Ident });

// Literals
export const RealConst = createToken({ name: "RealConst", pattern: /\d+\.\d+/ });
export const IntegerConst = createToken({ name: "IntegerConst", pattern: /\d+/ });

// Punctuation
export const Assign = createToken({ name: "Assign", pattern: /:=/ });
export const Colon = createToken({ name: "Colon", pattern: /:/ });
export const Semi = createToken({ name: "Semi", pattern: /;/ });
export const Comma = createToken({ name: "Comma", pattern: /,/ });
export const Dot = createToken({ name: "Dot", pattern: /\./ });
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });

// Arithmetic operators
export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: AdditiveOperator });
export const Minus = createToken({ name: "Minus", pattern: /-/, categories: AdditiveOperator });
export const Star = createToken({ name: "Star", pattern: /\*/, categories: MultiplicativeOperator });
export const Slash = createToken({ name: "Slash", pattern: /\//, categories: MultiplicativeOperator });

// Whitespace and comments
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /\s+/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});
export const Comment = createToken({
  name: "Comment",
  pattern: /\{[^}]*\}/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

// Token order matters: longer/more specific tokens first
export const allTokens = [
  WhiteSpace,
  Comment,
  // Keywords (before Ident)
  Program,
  Var,
  Procedure,
  Begin,
  End,
  Div,
  Integer,
  Real,
  Ident,
  // Literals: REAL before INTEGER so "3.14" is not split
  RealConst,
  IntegerConst,
  // := before :
  Assign,
  Colon,
  Semi,
  Comma,
  Dot,
  LParen,
  RParen,
  Plus,
  Minus,
  Star,
  Slash,
  AdditiveOperator,
  MultiplicativeOperator,
];

export const PascalLexer = new Lexer(allTokens);
