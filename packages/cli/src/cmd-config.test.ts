/**
 * Tests for minipas config command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runConfig } from "./cmd-config.js";
import { capture } from "./test-util.js";

function withDirs(fn: (projectDir: string, homeDir: string) => Promise<void>): Promise<void> {
  const projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "minipas-cli-config-project-"));
  const homeDir = fs.mkdtempSync(path.join(os.tmpdir(), "minipas-cli-config-home-"));
  return fn(projectDir, homeDir).finally(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
    fs.rmSync(homeDir, { recursive: true, force: true });
  });
}

describe("minipas config", () => {
  it("prints the project configuration", async () => {
    await withDirs(async (projectDir, homeDir) => {
      const file = path.join(projectDir, ".minipasrc.json");
      fs.writeFileSync(file, JSON.stringify({ version: 1, limits: { maxCallDepth: 64 } }));

      const result = await capture(() => runConfig({ cwd: projectDir, homeDir }));
      assert.equal(result.code, 0);
      assert.equal(result.stderr, "");
      assert.equal(
        result.stdout,
        [
          "Effective minipas configuration",
          "  Source:          project",
          `  Path:            ${file}`,
          "  Version:         1",
          "  Max call depth:  64",
        ].join("\n")
      );
    });
  });

  it("prints defaults as JSON", async () => {
    await withDirs(async (projectDir, homeDir) => {
      const result = await capture(() => runConfig({ json: true, cwd: projectDir, homeDir }));
      assert.equal(result.code, 0);
      assert.deepEqual(JSON.parse(result.stdout), {
        source: "default",
        path: null,
        config: { version: 1, limits: { maxCallDepth: 512 } },
      });
    });
  });

  it("reads the user file", async () => {
    await withDirs(async (projectDir, homeDir) => {
      fs.mkdirSync(path.join(homeDir, ".minipas"));
      fs.writeFileSync(path.join(homeDir, ".minipas", "config.json"), JSON.stringify({ limits: { maxCallDepth: 32 } }));

      const result = await capture(() => runConfig({ json: true, cwd: projectDir, homeDir }));
      const parsed = JSON.parse(result.stdout) as { source: string; config: { limits: { maxCallDepth: number } } };
      assert.equal(parsed.source, "user");
      assert.equal(parsed.config.limits.maxCallDepth, 32);
    });
  });

  it("returns 4 on an invalid file", async () => {
    await withDirs(async (projectDir, homeDir) => {
      fs.writeFileSync(path.join(projectDir, ".minipasrc.json"), JSON.stringify({ version: "one" }));
      const result = await capture(() => runConfig({ json: true, cwd: projectDir, homeDir }));
      assert.equal(result.code, 4);
      assert.equal(result.stdout, "");
      const diag = JSON.parse(result.stderr) as { code: string };
      assert.equal(diag.code, "E_CONFIG");
    });
  });
});
