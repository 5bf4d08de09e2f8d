/**
 * manifestly apply <archive> <target_directory>
 *
 * Unpacks a pzip archive into a tree and deletes the files it lists as
 * removed.
 */

import { Command } from "commander";
import chalk from "chalk";
import { applyArchive } from "@manifestly/core";
import type { ApplyArchiveResult } from "@manifestly/core";
import { createCliContext } from "../utils/context.js";
import type { CliContext, GlobalOptions } from "../utils/context.js";
import { consoleOutput, pluralize, printJson, reportError } from "../utils/output.js";

export async function runApply(archive: string, targetDirectory: string, ctx: CliContext): Promise<ApplyArchiveResult> {
  const result = await applyArchive(archive, targetDirectory, { resolver: ctx.resolver, logger: ctx.logger });

  if (ctx.format === "json") {
    printJson(ctx.output, result);
  } else {
    ctx.output.log(
      chalk.green(`Applied ${archive}`) +
        chalk.dim(` (${pluralize(result.written.length, "file")} written, ${result.deleted.length} deleted)`),
    );
  }
  return result;
}

export function registerApplyCommand(program: Command): void {
  program
    .command("apply")
    .description("Apply a pzip archive to a directory")
    .argument("<archive>", "Archive written by pzip")
    .argument("<target_directory>", "Tree to update")
    .action(async (archive: string, targetDirectory: string, _options: object, command: Command) => {
      try {
        const ctx = createCliContext({ global: command.optsWithGlobals<GlobalOptions>() });
        await runApply(archive, targetDirectory, ctx);
      } catch (error) {
        reportError(consoleOutput, error);
        process.exit(1);
      }
    });
}
