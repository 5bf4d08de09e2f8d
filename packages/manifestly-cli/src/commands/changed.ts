/**
 * manifestly changed <manifest>
 *
 * Lists what changed on disk since the manifest was taken. Nothing is
 * written.
 */

import { Command } from "commander";
import type { DiffResult } from "@manifestly/core";
import { createCliContext } from "../utils/context.js";
import type { CliContext, GlobalOptions } from "../utils/context.js";
import { consoleOutput, printDiff, reportError } from "../utils/output.js";
import type { RootOptions } from "./refresh.js";

export async function runChanged(manifestLocation: string, options: RootOptions, ctx: CliContext): Promise<DiffResult> {
  const manifest = await ctx.store.load(manifestLocation, { root: options.root });
  const diff = await manifest.changes();
  printDiff(ctx.output, diff, ctx.format);
  return diff;
}

export function registerChangedCommand(program: Command): void {
  program
    .command("changed")
    .description("Show files added, removed or changed since the manifest was taken")
    .argument("<manifest>", "Manifest file, or the directory holding it")
    .option("-r, --root <directory>", "Tree to scan instead of the recorded root")
    .action(async (manifestLocation: string, options: RootOptions, command: Command) => {
      try {
        const ctx = createCliContext({ global: command.optsWithGlobals<GlobalOptions>() });
        await runChanged(manifestLocation, options, ctx);
      } catch (error) {
        reportError(consoleOutput, error);
        process.exit(1);
      }
    });
}
