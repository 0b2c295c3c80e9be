#!/usr/bin/env node
import { resolve } from "node:path";
import { Command, CommanderError, Option } from "commander";
import { applyOverrides, loadConfig, type ConfigResult } from "./config/loader.js";
import { createLogger, logger } from "./logger.js";
import { createContext } from "./pipeline/context.js";
import { PipelineOrchestrator } from "./pipeline/orchestrator.js";
import { formatSummary } from "./pipeline/summary.js";
import { errorMessage } from "./shared/errors.js";

export const VERSION = "0.1.0";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

interface CliOptions {
  name?: string;
  venv: boolean;
  config?: string;
  logLevel?: (typeof LOG_LEVELS)[number];
}

export function buildProgram(): Command {
  return new Command()
    .name("provision")
    .description("Provision a new project workspace: system packages, git repo, env vars, virtualenv and hooks")
    .version(VERSION)
    .option("-n, --name <path>", "Project directory (overrides project.path)")
    .option("--no-venv", "Do not create the runtime environment")
    .option("-c, --config <path>", "Configuration file (default: provision.config.yaml)")
    .addOption(new Option("--log-level <level>", "Log level").choices(LOG_LEVELS))
    .exitOverride();
}

/** Returns the process exit status: 0 once the pipeline ran, 1 when config could not be loaded. */
export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  let loaded: ConfigResult;
  try {
    loaded = loadConfig(options.config);
  } catch (err) {
    logger.fatal({ err }, "Could not load configuration");
    return 1;
  }

  const config = applyOverrides(loaded.config, { name: options.name, venv: options.venv });
  const runLogger = createLogger({
    level: options.logLevel ?? config.logging.level,
    file: config.logging.file ? resolve(config.logging.file) : null,
  });
  runLogger.info({ configPath: loaded.configPath }, "Configuration loaded");

  const ctx = createContext({ logger: runLogger, timeouts: config.timeouts });
  const result = await new PipelineOrchestrator(ctx).run(config);
  process.stdout.write(`${formatSummary(result)}\n`);
  return 0;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      // commander's exitOverride throws for --help / --version too
      const exitCode = err instanceof CommanderError ? err.exitCode : 1;
      if (exitCode !== 0) logger.fatal({ err: errorMessage(err) }, "Provisioning aborted");
      process.exitCode = exitCode;
    },
  );
}
