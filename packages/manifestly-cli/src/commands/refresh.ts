/**
 * manifestly refresh <manifest>
 *
 * Re-scans the manifest's root and overwrites the manifest in place.
 */

import { Command } from "commander";
import chalk from "chalk";
import { Manifest, diffManifests, summarizeDiff } from "@manifestly/core";
import type { DiffResult } from "@manifestly/core";
import { createCliContext } from "../utils/context.js";
import type { CliContext, GlobalOptions } from "../utils/context.js";
import { consoleOutput, pluralize, printJson, reportError } from "../utils/output.js";

export interface RootOptions {
  /** Tree the manifest describes, when it is not the recorded root */
  root?: string;
}

export interface RefreshResult {
  manifest: Manifest;
  location: string;
  /** What the refresh changed, current tree as source */
  diff: DiffResult;
}

export async function runRefresh(manifestLocation: string, options: RootOptions, ctx: CliContext): Promise<RefreshResult> {
  const location = await ctx.store.resolveManifestLocation(manifestLocation);
  const manifest = await ctx.store.load(location, { root: options.root });
  const previous = Manifest.fromEntries(manifest.root, manifest.algorithm, manifest.entries.values());

  await manifest.refresh();
  await ctx.store.save(manifest, location);
  const diff = diffManifests(manifest, previous);

  if (ctx.format === "json") {
    printJson(ctx.output, { location, files: manifest.size, changes: summarizeDiff(diff) });
  } else {
    const summary = summarizeDiff(diff);
    ctx.output.log(
      chalk.green(`Refreshed ${location}`) +
        chalk.dim(
          ` (${pluralize(manifest.size, "file")}: ${summary.added} added, ${summary.removed} removed, ${summary.changed} changed)`,
        ),
    );
  }

  return { manifest, location, diff };
}

export function registerRefreshCommand(program: Command): void {
  program
    .command("refresh")
    .description("Re-scan the tree a manifest describes and update the manifest")
    .argument("<manifest>", "Manifest file, or the directory holding it")
    .option("-r, --root <directory>", "Tree to scan instead of the recorded root")
    .action(async (manifestLocation: string, options: RootOptions, command: Command) => {
      try {
        const ctx = createCliContext({ global: command.optsWithGlobals<GlobalOptions>() });
        await runRefresh(manifestLocation, options, ctx);
      } catch (error) {
        reportError(consoleOutput, error);
        process.exit(1);
      }
    });
}
