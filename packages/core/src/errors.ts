/**
 * minipas error classes. Every error raised after parsing is fatal.
 */
import type { Span } from "./ast.js";
import type { CallStack } from "./call-stack.js";

export type SemanticErrorCode =
  | "E_DUPLICATE_ID"
  | "E_ID_NOT_FOUND"
  | "E_PARAM_COUNT"
  | "E_TYPE_MISMATCH";

export type EvaluationErrorCode = "E_EVAL" | "E_CALL_DEPTH";

export type ErrorDetails = Record<string, string | number>;

export class MinipasError extends Error {
  code: string;
  span?: Span;
  details?: ErrorDetails;

  constructor(code: string, message: string, span?: Span, details?: ErrorDetails) {
    super(message);
    this.name = "MinipasError";
    this.code = code;
    this.span = span;
    this.details = details;
  }
}

export class SemanticError extends MinipasError {
  declare code: SemanticErrorCode;

  constructor(code: SemanticErrorCode, message: string, span?: Span, details?: ErrorDetails) {
    super(code, message, span, details);
    this.name = "SemanticError";
  }
}

export class EvaluationError extends MinipasError {
  declare code: EvaluationErrorCode;
  /** Stack as it stood when the error was raised; frames are not unwound. */
  callStack?: CallStack;

  constructor(code: EvaluationErrorCode, message: string, span?: Span, details?: ErrorDetails) {
    super(code, message, span, details);
    this.name = "EvaluationError";
  }
}

export class ConfigError extends MinipasError {
  constructor(message: string, details?: ErrorDetails) {
    super("E_CONFIG", message, undefined, details);
    this.name = "ConfigError";
  }
}
