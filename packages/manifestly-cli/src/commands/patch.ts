/**
 * manifestly patch <source_manifest> <target_manifest> <output>
 *
 * Writes a unified diff of the files a sync would copy, or with
 * --diff-only the diff document itself.
 */

import { Command } from "commander";
import chalk from "chalk";
import { buildPatch, encodeDiffDocument, toDiffDocument } from "@manifestly/core";
import type { PatchFile } from "@manifestly/core";
import { createCliContext } from "../utils/context.js";
import type { CliContext, GlobalOptions } from "../utils/context.js";
import { consoleOutput, pluralize, printJson, reportError } from "../utils/output.js";
import { loadAndDiff } from "./compare.js";

export interface PatchCommandOptions {
  diffOnly?: boolean;
}

export interface PatchCommandResult {
  location: string;
  /** Files in the patch; empty for --diff-only */
  files: PatchFile[];
}

export async function runPatch(
  sourceLocation: string,
  targetLocation: string,
  output: string,
  options: PatchCommandOptions,
  ctx: CliContext,
): Promise<PatchCommandResult> {
  const { source, target, diff } = await loadAndDiff(sourceLocation, targetLocation, ctx);
  const destination = ctx.resolver.resolve(output);

  let files: PatchFile[] = [];
  if (options.diffOnly) {
    await destination.backend.write(destination.path, encodeDiffDocument(toDiffDocument(diff)));
  } else {
    const patch = await buildPatch(diff, source.root, target.root, {
      resolver: ctx.resolver,
      maxFileBytes: ctx.config.maxPatchFileBytes,
      logger: ctx.logger,
    });
    await destination.backend.write(destination.path, Buffer.from(patch.text, "utf-8"));
    files = patch.files;
  }

  if (ctx.format === "json") {
    printJson(ctx.output, { location: destination.uri, diffOnly: options.diffOnly === true, files });
  } else if (options.diffOnly) {
    ctx.output.log(chalk.green(`Wrote diff document to ${destination.uri}`));
  } else {
    const binary = files.filter((f) => f.kind !== "text").length;
    ctx.output.log(
      chalk.green(`Wrote patch to ${destination.uri}`) +
        chalk.dim(` (${pluralize(files.length, "file")}${binary > 0 ? `, ${binary} not rendered` : ""})`),
    );
  }

  return { location: destination.uri, files };
}

export function registerPatchCommand(program: Command): void {
  program
    .command("patch")
    .description("Write a unified diff of the files that differ between two manifests")
    .argument("<source_manifest>", "Source manifest")
    .argument("<target_manifest>", "Target manifest")
    .argument("<output>", "Patch file to write")
    .option("--diff-only", "Write the diff document instead of file contents")
    .action(
      async (
        sourceLocation: string,
        targetLocation: string,
        output: string,
        options: PatchCommandOptions,
        command: Command,
      ) => {
        try {
          const ctx = createCliContext({ global: command.optsWithGlobals<GlobalOptions>() });
          await runPatch(sourceLocation, targetLocation, output, options, ctx);
        } catch (error) {
          reportError(consoleOutput, error);
          process.exit(1);
        }
      },
    );
}
