/**
 * manifestly pzip <source_manifest> <target_manifest> <output_zip>
 */

import { Command } from "commander";
import chalk from "chalk";
import { buildArchive } from "@manifestly/core";
import type { ArchiveResult } from "@manifestly/core";
import { createCliContext } from "../utils/context.js";
import type { CliContext, GlobalOptions } from "../utils/context.js";
import { consoleOutput, formatBytes, pluralize, printJson, reportError } from "../utils/output.js";
import { loadAndDiff } from "./compare.js";

export async function runPzip(
  sourceLocation: string,
  targetLocation: string,
  outputZip: string,
  ctx: CliContext,
): Promise<ArchiveResult> {
  const { source, diff } = await loadAndDiff(sourceLocation, targetLocation, ctx);
  const result = await buildArchive(diff, source.root, outputZip, {
    resolver: ctx.resolver,
    logger: ctx.logger,
    chunkSize: ctx.config.chunkSize,
  });

  if (ctx.format === "json") {
    printJson(ctx.output, result);
  } else {
    ctx.output.log(
      chalk.green(`Wrote ${result.location}`) +
        chalk.dim(` (${pluralize(result.files.length, "file")}, ${formatBytes(result.bytesWritten)})`),
    );
  }
  return result;
}

export function registerPzipCommand(program: Command): void {
  program
    .command("pzip")
    .description("Zip the files a sync would copy, with the diff document")
    .argument("<source_manifest>", "Source manifest")
    .argument("<target_manifest>", "Target manifest")
    .argument("<output_zip>", "Archive to write")
    .action(
      async (sourceLocation: string, targetLocation: string, outputZip: string, _options: object, command: Command) => {
        try {
          const ctx = createCliContext({ global: command.optsWithGlobals<GlobalOptions>() });
          await runPzip(sourceLocation, targetLocation, outputZip, ctx);
        } catch (error) {
          reportError(consoleOutput, error);
          process.exit(1);
        }
      },
    );
}
