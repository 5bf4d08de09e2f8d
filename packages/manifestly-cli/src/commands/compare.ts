/**
 * manifestly compare <source_manifest> <target_manifest>
 */

import { Command } from "commander";
import { diffManifests } from "@manifestly/core";
import type { DiffResult, Manifest } from "@manifestly/core";
import { createCliContext } from "../utils/context.js";
import type { CliContext, GlobalOptions } from "../utils/context.js";
import { consoleOutput, printDiff, reportError } from "../utils/output.js";

export interface ManifestPair {
  source: Manifest;
  target: Manifest;
  diff: DiffResult;
}

/** Load both manifests and diff them, source-relative */
export async function loadAndDiff(sourceLocation: string, targetLocation: string, ctx: CliContext): Promise<ManifestPair> {
  const [source, target] = await Promise.all([ctx.store.load(sourceLocation), ctx.store.load(targetLocation)]);
  return { source, target, diff: diffManifests(source, target) };
}

export async function runCompare(sourceLocation: string, targetLocation: string, ctx: CliContext): Promise<DiffResult> {
  const { diff } = await loadAndDiff(sourceLocation, targetLocation, ctx);
  printDiff(ctx.output, diff, ctx.format);
  return diff;
}

export function registerCompareCommand(program: Command): void {
  program
    .command("compare")
    .description("Compare two manifests (added = only in the source)")
    .argument("<source_manifest>", "Source manifest")
    .argument("<target_manifest>", "Target manifest")
    .action(async (sourceLocation: string, targetLocation: string, _options: object, command: Command) => {
      try {
        const ctx = createCliContext({ global: command.optsWithGlobals<GlobalOptions>() });
        await runCompare(sourceLocation, targetLocation, ctx);
      } catch (error) {
        reportError(consoleOutput, error);
        process.exit(1);
      }
    });
}
