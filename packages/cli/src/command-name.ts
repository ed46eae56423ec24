/**
 * Subcommand lookup run before commander parses argv.
 */
import type { Command } from "commander";

/** First argument naming a subcommand, skipping global options and their values. */
export function commandName(args: readonly string[], program: Command): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--") return args[i + 1];
    if (!arg.startsWith("-")) return arg;
    if (arg.includes("=")) continue;
    const option = program.options.find((o) => o.long === arg || o.short === arg);
    if (option && (option.required || option.optional)) i++;
  }
  return undefined;
}

export function unknownCommand(args: readonly string[], program: Command): string | undefined {
  const name = commandName(args, program);
  if (name === undefined || name === "help") return undefined;
  const known = program.commands.some((c) => c.name() === name || c.aliases().includes(name));
  return known ? undefined : name;
}
