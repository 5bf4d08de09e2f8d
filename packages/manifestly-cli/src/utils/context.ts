/**
 * Builds everything a command needs from the global options and the
 * environment: validated config, logger, storage resolver and store.
 */

import {
  ConfigError,
  LOG_LEVELS,
  ManifestStore,
  OUTPUT_FORMATS,
  StorageResolver,
  createLogger,
  isLogLevel,
  resolveManifestConfig,
} from "@manifestly/core";
import type {
  Environment,
  Logger,
  ManifestConfig,
  ManifestConfigOverrides,
  ManifestContext,
  OutputFormat,
} from "@manifestly/core";
import { consoleOutput } from "./output.js";
import type { CliOutput } from "./output.js";

/** Options defined on the root program */
export interface GlobalOptions {
  logLevel?: string;
  format?: string;
}

export interface CliContext {
  config: Readonly<ManifestConfig>;
  format: OutputFormat;
  logger: Logger;
  resolver: StorageResolver;
  manifestContext: ManifestContext;
  store: ManifestStore;
  output: CliOutput;
}

export interface CreateCliContextOptions {
  global?: GlobalOptions;
  /** Command-specific settings, e.g. --hash-algorithm */
  overrides?: ManifestConfigOverrides;
  env?: Environment;
  logger?: Logger;
  output?: CliOutput;
}

function globalOverrides(global: GlobalOptions): ManifestConfigOverrides {
  const overrides: ManifestConfigOverrides = {};
  const problems: string[] = [];

  if (global.logLevel !== undefined) {
    if (isLogLevel(global.logLevel)) {
      overrides.logLevel = global.logLevel;
    } else {
      problems.push(`--log-level must be one of: ${LOG_LEVELS.join(", ")}`);
    }
  }

  if (global.format !== undefined) {
    const format = OUTPUT_FORMATS.find((f) => f === global.format);
    if (format) {
      overrides.outputFormat = format;
    } else {
      problems.push(`--format must be one of: ${OUTPUT_FORMATS.join(", ")}`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return overrides;
}

/**
 * @throws ConfigError for invalid global options or settings
 * @throws UnsupportedAlgorithmError for an unknown hash algorithm
 */
export function createCliContext(options: CreateCliContextOptions = {}): CliContext {
  const overrides: ManifestConfigOverrides = { ...options.overrides, ...globalOverrides(options.global ?? {}) };
  const config = resolveManifestConfig(overrides, options.env ?? process.env);
  const logger = options.logger ?? createLogger({ level: config.logLevel, pretty: process.stderr.isTTY === true });
  const resolver = new StorageResolver({ config, logger });
  const manifestContext: ManifestContext = { resolver, config, logger };

  return {
    config,
    format: config.outputFormat,
    logger,
    resolver,
    manifestContext,
    store: new ManifestStore({ context: manifestContext }),
    output: options.output ?? consoleOutput,
  };
}
