/**
 * manifestly sync <source_manifest> <target_manifest>
 *
 * Makes the target tree match the source manifest and updates the target
 * manifest. Ctrl-C stops new transfers; finished ones are still recorded.
 */

import { Command } from "commander";
import chalk from "chalk";
import { SyncExecutor, SyncService } from "@manifestly/core";
import type { SyncResult } from "@manifestly/core";
import { createCliContext } from "../utils/context.js";
import type { CliContext, GlobalOptions } from "../utils/context.js";
import { consoleOutput, formatBytes, pluralize, printJson, reportError } from "../utils/output.js";

export interface SyncCommandOptions {
  sourceDirectory?: string;
  targetDirectory?: string;
  refresh?: boolean;
  dryRun?: boolean;
}

export async function runSync(
  sourceLocation: string,
  targetLocation: string,
  options: SyncCommandOptions,
  ctx: CliContext,
  signal?: AbortSignal,
): Promise<SyncResult> {
  const sourceManifest = await ctx.store.load(sourceLocation, { root: options.sourceDirectory });
  const service = new SyncService({
    store: ctx.store,
    executor: new SyncExecutor({ resolver: ctx.resolver, config: ctx.config, logger: ctx.logger }),
    logger: ctx.logger,
  });

  const result = await service.sync({
    sourceManifest,
    targetManifestLocation: targetLocation,
    targetRoot: options.targetDirectory,
    refresh: options.refresh,
    sourceManifestLocation: sourceLocation,
    dryRun: options.dryRun,
    signal,
  });

  const { report } = result;
  if (ctx.format === "json") {
    printJson(ctx.output, {
      dryRun: report.dryRun,
      copied: report.copied,
      deleted: report.deleted,
      bytesCopied: report.bytesCopied,
      durationMs: report.durationMs,
      operations: report.results.map((r) => ({ type: r.operation.type, path: r.operation.path, status: r.status })),
      targetManifest: result.targetManifestLocation ?? null,
    });
    return result;
  }

  if (report.dryRun) {
    for (const { operation } of report.results) {
      const verb = operation.type === "copy" ? chalk.green("copy  ") : chalk.red("delete");
      ctx.output.log(`${verb} ${operation.path}`);
    }
    ctx.output.log(chalk.dim(`Dry run: ${pluralize(report.results.length, "operation")} planned, nothing changed.`));
    return result;
  }

  if (report.results.length === 0) {
    ctx.output.log(chalk.green("Already in sync."));
  } else {
    ctx.output.log(
      chalk.green(`Copied ${pluralize(report.copied, "file")} (${formatBytes(report.bytesCopied)})`) +
        chalk.green(`, deleted ${pluralize(report.deleted, "file")}.`),
    );
  }
  return result;
}

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Copy and delete files so the target matches the source manifest")
    .argument("<source_manifest>", "Source manifest")
    .argument("<target_manifest>", "Target manifest file or directory (created if missing)")
    .option("--source-directory <directory>", "Source tree, when it is not the recorded root")
    .option("--target-directory <directory>", "Target tree, when it is not the recorded root")
    .option("--refresh", "Re-scan the source before syncing")
    .option("-n, --dry-run", "Show the plan without changing anything")
    .action(async (sourceLocation: string, targetLocation: string, options: SyncCommandOptions, command: Command) => {
      const controller = new AbortController();
      const onInterrupt = (): void => {
        consoleOutput.error(chalk.yellow("Interrupted, waiting for transfers in flight..."));
        controller.abort();
      };
      process.once("SIGINT", onInterrupt);

      try {
        const ctx = createCliContext({ global: command.optsWithGlobals<GlobalOptions>() });
        await runSync(sourceLocation, targetLocation, options, ctx, controller.signal);
      } catch (error) {
        reportError(consoleOutput, error);
        process.exit(1);
      } finally {
        process.removeListener("SIGINT", onInterrupt);
      }
    });
}
