#!/usr/bin/env node
/**
 * minipas - check and run programs in a small Pascal subset
 */
import { createRequire } from "node:module";
import { Command, InvalidArgumentError } from "commander";
import { runCheck } from "./cmd-check.js";
import { runRun } from "./cmd-run.js";
import { runTrace } from "./cmd-trace.js";
import { runConfig } from "./cmd-config.js";
import { unknownCommand } from "./command-name.js";

const require = createRequire(import.meta.url);
const pkg: unknown = require("@minipas/cli/package.json");
const version =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

const program = new Command();

program
  .name("minipas")
  .description("Scope analysis and tree-walking execution for a small Pascal subset")
  .version(version);

program
  .command("check")
  .description("Parse and analyze without execution")
  .argument("<file>", "Source file to check")
  .option("--pretty", "Human-readable output", false)
  .option("--debug-parse", "Show raw parser internals on parse errors", false)
  .action(async (file: string, opts: { pretty?: boolean; debugParse?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("run")
  .description("Analyze and execute a program, then print the call stack")
  .argument("<file>", "Source file to run (or - for stdin)")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--max-call-depth <n>", "Override the configured call depth limit", positiveInt)
  .option("--pretty", "Human-readable output", false)
  .option("--debug-parse", "Show raw parser internals on parse errors", false)
  .action(
    async (
      file: string,
      opts: { trace?: string; maxCallDepth?: number; pretty?: boolean; debugParse?: boolean }
    ) => {
      const code = await runRun(file, opts);
      process.exit(code);
    }
  );

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective configuration and resolution source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const unknown = unknownCommand(process.argv.slice(2), program);
if (unknown) {
  console.error(`Unknown command: ${unknown}`);
  process.exit(1);
}

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
