/**
 * Tests for the command handlers, run against real temp directories with
 * output captured instead of printed.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import chalk from "chalk";
import {
  ConfigError,
  PathNotFoundError,
  SyncFailedError,
  UnsupportedAlgorithmError,
  createSilentLogger,
} from "@manifestly/core";
import { createCliContext } from "../utils/context.js";
import type { CliContext, GlobalOptions } from "../utils/context.js";
import { formatBytes, pluralize, reportError } from "../utils/output.js";
import type { CliOutput } from "../utils/output.js";
import { generateOverrides, runGenerate } from "../commands/generate.js";
import { runRefresh } from "../commands/refresh.js";
import { runChanged } from "../commands/changed.js";
import { runCompare } from "../commands/compare.js";
import { runSync } from "../commands/sync.js";
import { runPatch } from "../commands/patch.js";
import { runPzip } from "../commands/pzip.js";
import { runApply } from "../commands/apply.js";
import { createProgram } from "../program.js";

// ── Test helpers ─────────────────────────────────────────────────────────────

interface CapturedOutput extends CliOutput {
  lines: string[];
  errors: string[];
}

function captureOutput(): CapturedOutput {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    log: (message) => {
      lines.push(message);
    },
    error: (message) => {
      errors.push(message);
    },
  };
}

let tmpDir: string;
let output: CapturedOutput;

function makeContext(global: GlobalOptions = {}): CliContext {
  return createCliContext({ global, env: {}, logger: createSilentLogger(), output });
}

function createFiles(dir: string, files: Record<string, string>): string {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(dir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
  return dir;
}

function readFiles(dir: string): Record<string, string> {
  const files: Record<string, string> = {};
  for (const name of fs.readdirSync(dir).sort()) {
    if (name !== ".manifestly.json") {
      files[name] = fs.readFileSync(path.join(dir, name), "utf-8");
    }
  }
  return files;
}

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "manifestly-cli-test-"));
  output = captureOutput();
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ── context ──────────────────────────────────────────────────────────────────

describe("createCliContext", () => {
  it("applies global options over the environment", () => {
    const ctx = createCliContext({
      global: { format: "json", logLevel: "debug" },
      env: { MANIFESTLY_OUTPUT_FORMAT: "text", MANIFESTLY_HASH_ALGORITHM: "md5" },
      logger: createSilentLogger(),
    });

    expect(ctx.format).toBe("json");
    expect(ctx.config.logLevel).toBe("debug");
    expect(ctx.config.algorithm).toBe("md5");
  });

  it("rejects unknown global option values", () => {
    expect(() => createCliContext({ global: { logLevel: "loud" }, env: {}, logger: createSilentLogger() })).toThrow(
      ConfigError,
    );
    expect(() => createCliContext({ global: { format: "yaml" }, env: {}, logger: createSilentLogger() })).toThrow(
      "--format must be one of: text, json",
    );
  });

  it("rejects an unknown hash algorithm before any I/O", () => {
    expect(() =>
      createCliContext({ overrides: { algorithm: "crc32" }, env: {}, logger: createSilentLogger() }),
    ).toThrow(UnsupportedAlgorithmError);
  });
});

// ── generate / refresh / changed ─────────────────────────────────────────────

describe("generate", () => {
  it("writes the manifest inside the directory", async () => {
    const src = createFiles(path.join(tmpDir, "src"), { "a.txt": "1", "b.txt": "2" });

    const result = await runGenerate(src, {}, makeContext());

    expect(result.location).toBe(path.join(src, ".manifestly.json"));
    expect(fs.existsSync(result.location)).toBe(true);
    expect(output.lines).toEqual([`Wrote ${result.location} (2 files, 2 B, sha256)`]);
  });

  it("prints a JSON summary with --format json", async () => {
    const src = createFiles(path.join(tmpDir, "src"), { "a.txt": "1", "b.txt": "22" });

    const result = await runGenerate(src, {}, makeContext({ format: "json" }));

    expect(JSON.parse(output.lines[0])).toEqual({
      location: result.location,
      root: src,
      algorithm: "sha256",
      files: 2,
      bytes: 3,
    });
  });

  it("leaves a custom output file out of later runs", async () => {
    const src = createFiles(path.join(tmpDir, "src"), { "a.txt": "1" });
    const outputFile = path.join(src, "snapshot.json");

    await runGenerate(src, { outputFile }, makeContext());
    const second = await runGenerate(src, { outputFile }, makeContext());

    expect(second.location).toBe(outputFile);
    expect(second.manifest.paths()).toEqual(["a.txt"]);
  });

  it("maps command options onto config overrides", () => {
    expect(generateOverrides({ hashAlgorithm: "md5", chunkSize: 4096, exclude: ["*.log"] })).toEqual({
      algorithm: "md5",
      chunkSize: 4096,
      excludePatterns: ["*.log"],
    });
    expect(generateOverrides({})).toEqual({});
  });
});

describe("refresh and changed", () => {
  it("reports changes on disk, then records them", async () => {
    const src = createFiles(path.join(tmpDir, "src"), { "a.txt": "1", "b.txt": "2" });
    const { location } = await runGenerate(src, {}, makeContext());
    createFiles(src, { "a.txt": "9", "c.txt": "3" });
    output.lines.length = 0;

    const changes = await runChanged(src, {}, makeContext());

    expect(changes).toEqual({ added: ["c.txt"], removed: [], changed: ["a.txt"], unchanged: ["b.txt"] });
    expect(output.lines).toEqual(["+ c.txt", "~ a.txt", "1 added, 0 removed, 1 changed, 1 unchanged"]);

    output.lines.length = 0;
    const refreshed = await runRefresh(src, {}, makeContext());

    expect(refreshed.location).toBe(location);
    expect(refreshed.manifest.paths()).toEqual(["a.txt", "b.txt", "c.txt"]);
    expect(output.lines).toEqual([`Refreshed ${location} (3 files: 1 added, 0 removed, 1 changed)`]);

    output.lines.length = 0;
    const after = await runChanged(src, {}, makeContext());
    expect(after.unchanged).toEqual(["a.txt", "b.txt", "c.txt"]);
  });

  it("fails for a missing manifest", async () => {
    await expect(runChanged(path.join(tmpDir, "nowhere"), {}, makeContext())).rejects.toBeInstanceOf(
      PathNotFoundError,
    );
  });
});

// ── compare / sync / patch / pzip / apply ────────────────────────────────────

describe("two-tree commands", () => {
  let src: string;
  let tgt: string;

  async function generateBoth(): Promise<void> {
    await runGenerate(src, {}, makeContext());
    await runGenerate(tgt, {}, makeContext());
    output.lines.length = 0;
  }

  beforeEach(() => {
    src = path.join(tmpDir, "src");
    tgt = path.join(tmpDir, "tgt");
    fs.mkdirSync(src);
    fs.mkdirSync(tgt);
  });

  it("compare lists paths relative to the source", async () => {
    createFiles(src, { "a.txt": "1", "b.txt": "2" });
    createFiles(tgt, { "a.txt": "1", "c.txt": "3" });
    await generateBoth();

    await runCompare(src, tgt, makeContext());

    expect(output.lines).toEqual(["+ b.txt", "- c.txt", "1 added, 1 removed, 0 changed, 1 unchanged"]);
  });

  it("compare prints the full diff as JSON", async () => {
    createFiles(src, { "a.txt": "9", "b.txt": "2" });
    createFiles(tgt, { "a.txt": "1", "c.txt": "3" });
    await generateBoth();

    await runCompare(src, tgt, makeContext({ format: "json" }));

    expect(JSON.parse(output.lines[0])).toEqual({
      added: ["b.txt"],
      removed: ["c.txt"],
      changed: ["a.txt"],
      unchanged: [],
    });
  });

  it("sync copies into an empty target, then reports it is in sync", async () => {
    createFiles(src, { "a.txt": "1", "b.txt": "2" });
    await runGenerate(src, {}, makeContext());
    output.lines.length = 0;

    await runSync(src, tgt, {}, makeContext());
    expect(output.lines).toEqual(["Copied 2 files (2 B), deleted 0 files."]);
    expect(readFiles(tgt)).toEqual({ "a.txt": "1", "b.txt": "2" });

    output.lines.length = 0;
    await runSync(src, tgt, {}, makeContext());
    expect(output.lines).toEqual(["Already in sync."]);
  });

  it("sync --refresh writes the rescanned source manifest back", async () => {
    createFiles(src, { "a.txt": "1" });
    await runGenerate(src, {}, makeContext());
    createFiles(src, { "b.txt": "2" });
    output.lines.length = 0;

    await runSync(src, tgt, { refresh: true }, makeContext());
    const reloaded = await makeContext().store.load(src);

    expect(output.lines).toEqual(["Copied 2 files (2 B), deleted 0 files."]);
    expect(reloaded.paths()).toEqual(["a.txt", "b.txt"]);
  });

  it("sync --dry-run prints the plan and changes nothing", async () => {
    createFiles(src, { "a.txt": "1", "b.txt": "2" });
    await runGenerate(src, {}, makeContext());
    output.lines.length = 0;

    await runSync(src, tgt, { dryRun: true }, makeContext());

    expect(output.lines).toEqual([
      "copy   a.txt",
      "copy   b.txt",
      "Dry run: 2 operations planned, nothing changed.",
    ]);
    expect(fs.readdirSync(tgt)).toEqual([]);
  });

  it("patch writes a unified diff, or the diff document with --diff-only", async () => {
    createFiles(src, { "a.txt": "nine\n", "b.txt": "two\n" });
    createFiles(tgt, { "a.txt": "one\n", "c.txt": "three\n" });
    await generateBoth();
    const patchFile = path.join(tmpDir, "changes.patch");
    const diffFile = path.join(tmpDir, "changes.json");

    const result = await runPatch(src, tgt, patchFile, {}, makeContext());
    await runPatch(src, tgt, diffFile, { diffOnly: true }, makeContext());

    const patchLines = fs.readFileSync(patchFile, "utf-8").split("\n");
    expect(patchLines).toContain("-one");
    expect(patchLines).toContain("+nine");
    expect(patchLines).toContain("+++ b/b.txt");
    expect(result.files.map((f) => f.path)).toEqual(["a.txt", "b.txt"]);
    expect(JSON.parse(fs.readFileSync(diffFile, "utf-8"))).toEqual({
      added: ["b.txt"],
      removed: ["c.txt"],
      changed: ["a.txt"],
    });
    expect(output.lines).toEqual([
      `Wrote patch to ${patchFile} (2 files)`,
      `Wrote diff document to ${diffFile}`,
    ]);
  });

  it("pzip and apply bring the target up to date", async () => {
    createFiles(src, { "a.txt": "9", "b.txt": "2" });
    createFiles(tgt, { "a.txt": "1", "c.txt": "3" });
    await generateBoth();
    const archive = path.join(tmpDir, "changes.zip");

    const built = await runPzip(src, tgt, archive, makeContext());
    const applied = await runApply(archive, tgt, makeContext());

    expect(built.files).toEqual(["a.txt", "b.txt"]);
    expect(applied).toEqual({ written: ["a.txt", "b.txt"], deleted: ["c.txt"] });
    expect(readFiles(tgt)).toEqual({ "a.txt": "9", "b.txt": "2" });
    expect(output.lines[1]).toBe(`Applied ${archive} (2 files written, 1 deleted)`);
  });
});

// ── output helpers ───────────────────────────────────────────────────────────

describe("output helpers", () => {
  it("prints each failed path of an aggregate failure", () => {
    const error = new SyncFailedError("/backup", [{ path: "a.txt", error: new PathNotFoundError("a.txt") }]);

    reportError(output, error);

    expect(output.errors).toEqual([
      "Error: Sync to /backup failed for 1 path: a.txt",
      "  - a.txt: Path not found: a.txt",
    ]);
  });

  it("formats counts and sizes", () => {
    expect(pluralize(1, "file")).toBe("1 file");
    expect(pluralize(0, "file")).toBe("0 files");
    expect(formatBytes(512)).toBe("512 B");
    expect(formatBytes(2048)).toBe("2.0 KiB");
    expect(formatBytes(3 * 1024 * 1024)).toBe("3.0 MiB");
  });
});

describe("createProgram", () => {
  it("registers every subcommand", () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual([
      "generate",
      "refresh",
      "changed",
      "compare",
      "sync",
      "patch",
      "pzip",
      "apply",
    ]);
  });
});
