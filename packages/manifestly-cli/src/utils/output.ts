/**
 * Terminal output helpers shared by every command.
 *
 * Results go to stdout (plain lines or one JSON document), diagnostics
 * to stderr. Commands write through a CliOutput so tests can capture it.
 */

import chalk from "chalk";
import { AggregateOperationError, summarizeDiff } from "@manifestly/core";
import type { DiffResult, OutputFormat } from "@manifestly/core";

export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

export const consoleOutput: CliOutput = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

export function pluralize(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GiB`;
}

export function printJson(output: CliOutput, value: unknown): void {
  output.log(JSON.stringify(value, null, 2));
}

/** One line per differing path, then a summary line */
export function formatDiff(diff: DiffResult): string[] {
  const lines = [
    ...diff.added.map((p) => chalk.green(`+ ${p}`)),
    ...diff.removed.map((p) => chalk.red(`- ${p}`)),
    ...diff.changed.map((p) => chalk.yellow(`~ ${p}`)),
  ];
  const summary = summarizeDiff(diff);
  lines.push(
    chalk.dim(
      `${summary.added} added, ${summary.removed} removed, ${summary.changed} changed, ${summary.unchanged} unchanged`,
    ),
  );
  return lines;
}

export function printDiff(output: CliOutput, diff: DiffResult, format: OutputFormat): void {
  if (format === "json") {
    printJson(output, diff);
    return;
  }
  for (const line of formatDiff(diff)) {
    output.log(line);
  }
}

/** Print an error, and for aggregate failures every failed path */
export function reportError(output: CliOutput, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  output.error(`${chalk.red("Error:")} ${message}`);

  if (error instanceof AggregateOperationError) {
    for (const failure of error.failures) {
      output.error(chalk.red(`  - ${failure.path}: ${failure.error.message}`));
    }
  }
}
