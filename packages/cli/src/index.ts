/**
 * @minipas/cli - CLI entry point re-exports
 */
export { runCheck } from "./cmd-check.js";
export { runRun, formatCallStack } from "./cmd-run.js";
export type { RunOptions } from "./cmd-run.js";
export { runTrace, summarizeTrace } from "./cmd-trace.js";
export type { TraceSummary } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
