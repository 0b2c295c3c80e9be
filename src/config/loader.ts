// Config loader: reads provision.config.yaml, validates it with zod and fills defaults.
// Unlike a long-running service there is no first-run fallback: a missing or
// invalid file is fatal and surfaces as a ProvisionError before any side effect.
import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { ProvisionConfigSchema, type ProvisionConfig } from "./schema.js";
import { ProvisionError, ProvisionErrorCode, errorMessage } from "../shared/errors.js";

export const DEFAULT_CONFIG_FILE = "provision.config.yaml";

export interface ConfigResult {
  config: ProvisionConfig;
  configPath: string;
}

/** CLI-level overrides applied on top of the file. */
export interface ConfigOverrides {
  name?: string;
  /** `false` when `--no-venv` was passed. */
  venv?: boolean;
}

export function loadConfig(explicitPath?: string, cwd: string = process.cwd()): ConfigResult {
  const configPath = resolve(cwd, explicitPath ?? process.env.PROVISION_CONFIG ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(configPath)) {
    throw new ProvisionError(ProvisionErrorCode.CONFIG_NOT_FOUND, `Configuration file not found: ${configPath}`, { configPath });
  }

  let document: unknown;
  try {
    document = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ProvisionError(ProvisionErrorCode.CONFIG_INVALID, `Could not parse ${configPath}: ${errorMessage(err)}`, { configPath });
  }

  const parsed = ProvisionConfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ProvisionError(ProvisionErrorCode.CONFIG_INVALID, `Invalid configuration in ${configPath}:\n  ${issues.join("\n  ")}`, {
      configPath,
      issues,
    });
  }

  return { config: parsed.data, configPath };
}

export function applyOverrides(config: ProvisionConfig, overrides: ConfigOverrides): ProvisionConfig {
  return {
    ...config,
    project: overrides.name ? { ...config.project, path: overrides.name } : config.project,
    runtime: overrides.venv === false ? { ...config.runtime, enabled: false } : config.runtime,
  };
}
