/**
 * minipas trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";

const TraceLineSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  data: z.record(z.union([z.string(), z.number()])).optional(),
});

export type TraceLine = z.infer<typeof TraceLineSchema>;

export interface TraceSummary {
  runId: string;
  totalEvents: number;
  skippedLines: number;
  scopesEntered: number;
  calls: number;
  callsByProcedure: Record<string, number>;
  maxDepth: number;
  error?: string;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function parseLine(line: string): TraceLine | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (e) {
    if (e instanceof SyntaxError) return null;
    throw e;
  }
  const result = TraceLineSchema.safeParse(raw);
  return result.success ? result.data : null;
}

export function summarizeTrace(events: TraceLine[], skippedLines = 0): TraceSummary {
  const summary: TraceSummary = {
    runId: events[0]?.runId ?? "",
    totalEvents: events.length,
    skippedLines,
    scopesEntered: 0,
    calls: 0,
    callsByProcedure: {},
    maxDepth: 0,
  };

  for (const ev of events) {
    const depth = ev.data?.["depth"];
    if (typeof depth === "number" && depth > summary.maxDepth) {
      summary.maxDepth = depth;
    }
    switch (ev.event) {
      case "run_start":
        summary.startTime = ev.ts;
        break;
      case "run_end": {
        summary.endTime = ev.ts;
        const error = ev.data?.["error"];
        if (typeof error === "string") summary.error = error;
        break;
      }
      case "scope_enter":
        summary.scopesEntered++;
        break;
      case "call_start": {
        summary.calls++;
        const name = ev.data?.["procedure"];
        const key = typeof name === "string" ? name : "unknown";
        summary.callsByProcedure[key] = (summary.callsByProcedure[key] ?? 0) + 1;
        break;
      }
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs =
      new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }
  return summary;
}

export async function runTrace(
  file: string,
  opts: { json?: boolean }
): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  let skipped = 0;
  for (const line of lines) {
    const ev = parseLine(line);
    if (ev) {
      events.push(ev);
    } else {
      skipped++;
    }
  }

  if (events.length === 0) {
    console.error("No valid trace events found.");
    return 4;
  }

  const summary = summarizeTrace(events, skipped);

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Run ID:           ${summary.runId}`);
  console.log(`  Total events:     ${summary.totalEvents}`);
  if (summary.skippedLines > 0) {
    console.log(`  Skipped lines:    ${summary.skippedLines}`);
  }
  console.log(`  Scopes entered:   ${summary.scopesEntered}`);
  console.log(`  Procedure calls:  ${summary.calls}`);
  for (const [name, count] of Object.entries(summary.callsByProcedure)) {
    console.log(`    ${name}: ${count}`);
  }
  console.log(`  Max stack depth:  ${summary.maxDepth}`);
  if (summary.error) {
    console.log(`  Error:            ${summary.error}`);
  }
  if (summary.durationMs !== undefined) {
    console.log(`  Duration:         ${summary.durationMs}ms`);
  }
  return 0;
}
