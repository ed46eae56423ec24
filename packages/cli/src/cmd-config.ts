/**
 * minipas config - effective configuration summary command
 */
import {
  ConfigError,
  diagnosticFromError,
  formatDiagnostic,
  resolveConfig,
  type ResolvedConfig,
} from "@minipas/core";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  let resolved: ResolvedConfig;
  try {
    resolved = resolveConfig(opts.cwd, opts.homeDir);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(formatDiagnostic(diagnosticFromError(e), !opts.json));
      return 4;
    }
    throw e;
  }

  if (opts.json) {
    console.log(
      JSON.stringify({ source: resolved.source, path: resolved.path, config: resolved.config }, null, 2)
    );
    return 0;
  }

  console.log("Effective minipas configuration");
  console.log(`  Source:          ${resolved.source}`);
  console.log(`  Path:            ${resolved.path ?? "(none)"}`);
  console.log(`  Version:         ${resolved.config.version}`);
  console.log(`  Max call depth:  ${resolved.config.limits.maxCallDepth}`);
  return 0;
}
