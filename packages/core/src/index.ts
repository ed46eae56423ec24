/**
 * @minipas/core - scope analysis and execution for a small Pascal subset
 */
export * from "./ast.js";
export * from "./values.js";
export * from "./errors.js";
export * from "./diagnostics.js";
export { canonicalName } from "./names.js";
export { SymbolTable, BUILTIN_TYPES } from "./symbols.js";
export type { BuiltinTypeSymbol, VariableSymbol, ProcedureSymbol, ScopeSymbol } from "./symbols.js";
export { PascalLexer, allTokens } from "./lexer.js";
export { parse } from "./parser.js";
export type { ParseResult, ParseOptions } from "./parser.js";
export { analyze } from "./analyzer.js";
export type { AnalyzeOptions, AnalysisResult } from "./analyzer.js";
export { ActivationRecord, CallStack } from "./call-stack.js";
export type { ARType, ActivationRecordJSON } from "./call-stack.js";
export { execute, DEFAULT_MAX_CALL_DEPTH } from "./interpreter.js";
export type { ExecOptions, ExecResult } from "./interpreter.js";
export { makeEmitter } from "./trace.js";
export type { TraceEvent, TraceEventType, TraceData, TraceSink, EmitTrace } from "./trace.js";
export { ConfigSchema, PROJECT_CONFIG_FILE, loadConfig, resolveConfig } from "./config.js";
export type { Config, ResolvedConfig } from "./config.js";
