/**
 * manifestly - content-addressed manifests for directory trees
 */

import { Command, Option } from "commander";
import { createRequire } from "module";
import { LOG_LEVELS, OUTPUT_FORMATS } from "@manifestly/core";
import { registerGenerateCommand } from "./commands/generate.js";
import { registerRefreshCommand } from "./commands/refresh.js";
import { registerChangedCommand } from "./commands/changed.js";
import { registerCompareCommand } from "./commands/compare.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerPatchCommand } from "./commands/patch.js";
import { registerPzipCommand } from "./commands/pzip.js";
import { registerApplyCommand } from "./commands/apply.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export function createProgram(): Command {
  const program = new Command();

  program
    .name("manifestly")
    .description("Generate, compare and sync manifests of directory trees, locally or on S3")
    .version(pkg.version)
    .addOption(
      new Option("--log-level <level>", "Log level (default: warn, or MANIFESTLY_LOG_LEVEL)").choices(LOG_LEVELS),
    )
    .addOption(
      new Option("--format <format>", "Output format (default: text, or MANIFESTLY_OUTPUT_FORMAT)").choices(
        OUTPUT_FORMATS,
      ),
    );

  registerGenerateCommand(program);
  registerRefreshCommand(program);
  registerChangedCommand(program);
  registerCompareCommand(program);
  registerSyncCommand(program);
  registerPatchCommand(program);
  registerPzipCommand(program);
  registerApplyCommand(program);

  return program;
}
