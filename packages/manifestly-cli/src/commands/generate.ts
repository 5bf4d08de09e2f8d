/**
 * manifestly generate <directory>
 */

import { Command } from "commander";
import chalk from "chalk";
import { Manifest } from "@manifestly/core";
import type { ManifestConfigOverrides, ManifestContext } from "@manifestly/core";
import { createCliContext } from "../utils/context.js";
import type { CliContext, GlobalOptions } from "../utils/context.js";
import { consoleOutput, formatBytes, pluralize, printJson, reportError } from "../utils/output.js";
import { parsePositiveInteger } from "../utils/options.js";

export interface GenerateOptions {
  hashAlgorithm?: string;
  outputFile?: string;
  chunkSize?: number;
  include?: string[];
  exclude?: string[];
}

export interface GenerateResult {
  manifest: Manifest;
  location: string;
}

export function generateOverrides(options: GenerateOptions): ManifestConfigOverrides {
  const overrides: ManifestConfigOverrides = {};
  if (options.hashAlgorithm !== undefined) overrides.algorithm = options.hashAlgorithm;
  if (options.chunkSize !== undefined) overrides.chunkSize = options.chunkSize;
  if (options.include !== undefined) overrides.includePatterns = options.include;
  if (options.exclude !== undefined) overrides.excludePatterns = options.exclude;
  return overrides;
}

export async function runGenerate(directory: string, options: GenerateOptions, ctx: CliContext): Promise<GenerateResult> {
  let context: ManifestContext = ctx.manifestContext;

  // A manifest written under another name must not list itself on the next run
  if (options.outputFile !== undefined) {
    const { backend, path } = ctx.resolver.resolve(await ctx.store.resolveManifestLocation(options.outputFile));
    const fileName = backend.basename(path);
    if (fileName !== ctx.config.manifestName) {
      context = { ...context, outputManifestName: fileName };
    }
  }

  const manifest = await Manifest.generate(directory, context);
  const location = await ctx.store.save(manifest, options.outputFile);

  if (ctx.format === "json") {
    printJson(ctx.output, {
      location,
      root: manifest.root,
      algorithm: manifest.algorithm,
      files: manifest.size,
      bytes: manifest.totalBytes(),
    });
  } else {
    ctx.output.log(
      chalk.green(`Wrote ${location}`) +
        chalk.dim(` (${pluralize(manifest.size, "file")}, ${formatBytes(manifest.totalBytes())}, ${manifest.algorithm})`),
    );
  }

  return { manifest, location };
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate")
    .description("Scan a directory and write its manifest")
    .argument("<directory>", "Directory or s3:// prefix to scan")
    .option("-a, --hash-algorithm <name>", "Hash algorithm (e.g. sha256, md5, blake2b)")
    .option("-o, --output-file <location>", "Where to write the manifest (default: inside the directory)")
    .option("--chunk-size <bytes>", "Bytes read per digest update", parsePositiveInteger)
    .option("--include <patterns...>", "Patterns re-admitted after exclusion")
    .option("--exclude <patterns...>", "Patterns to leave out")
    .action(async (directory: string, options: GenerateOptions, command: Command) => {
      try {
        const ctx = createCliContext({
          global: command.optsWithGlobals<GlobalOptions>(),
          overrides: generateOverrides(options),
        });
        await runGenerate(directory, options, ctx);
      } catch (error) {
        reportError(consoleOutput, error);
        process.exit(1);
      }
    });
}
