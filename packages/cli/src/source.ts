/**
 * Source loading shared by check and run.
 */
import * as fs from "node:fs";
import { formatDiagnostic } from "@minipas/core";

export interface LoadedSource {
  text: string;
  /** Name used in spans; "<stdin>" when reading from "-". */
  file: string;
}

export function readSource(file: string, pretty: boolean): LoadedSource | null {
  try {
    if (file === "-") {
      return { text: fs.readFileSync(0, "utf-8"), file: "<stdin>" };
    }
    return { text: fs.readFileSync(file, "utf-8"), file };
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, pretty));
    return null;
  }
}
