/**
 * Structured trace events emitted by the analyzer and the engine.
 */
import type { Span } from "./ast.js";

export type TraceEventType =
  | "run_start"
  | "run_end"
  | "scope_enter"
  | "scope_leave"
  | "call_start"
  | "call_end";

export type TraceData = Record<string, string | number>;

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  span?: Span;
  data?: TraceData;
}

export type TraceSink = (event: TraceEvent) => void;

export type EmitTrace = (event: TraceEventType, span?: Span, data?: TraceData) => void;

export function makeEmitter(runId: string, sink?: TraceSink): EmitTrace {
  return (event, span, data) => {
    if (sink) {
      sink({
        ts: new Date().toISOString(),
        runId,
        event,
        span,
        data,
      });
    }
  };
}
