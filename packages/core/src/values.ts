/**
 * minipas runtime values.
 */
import type { Span } from "./ast.js";
import { EvaluationError } from "./errors.js";

export type TypeName = "INTEGER" | "REAL";

export interface IntegerValue {
  type: "INTEGER";
  value: number;
}

export interface RealValue {
  type: "REAL";
  value: number;
}

export type Value = IntegerValue | RealValue;

export const INT_MIN = -2147483648;
export const INT_MAX = 2147483647;

export function integer(value: number): IntegerValue {
  return { type: "INTEGER", value };
}

export function real(value: number): RealValue {
  return { type: "REAL", value };
}

export function checkInteger(value: number, span?: Span): IntegerValue {
  if (!Number.isInteger(value) || value < INT_MIN || value > INT_MAX) {
    throw new EvaluationError("E_EVAL", "Integer overflow.", span, { value: String(value) });
  }
  // no negative zero among INTEGERs
  return integer(value === 0 ? 0 : value);
}

export function checkReal(value: number, span?: Span): RealValue {
  if (!Number.isFinite(value)) {
    throw new EvaluationError("E_EVAL", "Invalid real value.", span, { value: String(value) });
  }
  return real(value);
}

// INTEGER flows into REAL slots; nothing flows the other way.
export function widen(value: Value, target: TypeName): Value {
  if (target === "REAL" && value.type === "INTEGER") {
    return real(value.value);
  }
  return value;
}

export function formatValue(v: Value): string {
  if (v.type === "REAL" && Number.isInteger(v.value)) {
    return v.value.toFixed(1);
  }
  return String(v.value);
}
