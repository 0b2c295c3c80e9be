import { appendFileSync, existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { EnvironmentVariableSet } from "../types/project.js";
import type { StepResult } from "../types/result.js";
import type { ProvisionContext } from "../pipeline/context.js";
import { skipped, succeeded } from "../shared/results.js";

export const DEFAULT_ENV_FILE = ".env";

const ENV_KEY = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=/;

/** Keys already assigned in an env file's content. */
export function parseEnvKeys(content: string): Set<string> {
  const keys = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const match = ENV_KEY.exec(line);
    if (match?.[1]) keys.add(match[1]);
  }
  return keys;
}

export function formatEnvLine(key: string, value: string): string {
  const escaped = value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
  return `${key}="${escaped}"`;
}

/** `~/.zshrc` for zsh users, `~/.bashrc` for everyone else. */
export function shellProfilePath(shell: string | undefined, homeDir: string): string {
  const name = shell?.split(/[\\/]/).pop() ?? "";
  return join(homeDir, name.includes("zsh") ? ".zshrc" : ".bashrc");
}

/** Append `lines` to `file`, starting on a fresh line. */
function appendLines(file: string, existing: string, lines: readonly string[]): void {
  const separator = existing.length > 0 && !existing.endsWith("\n") ? "\n" : "";
  appendFileSync(file, `${separator}${lines.join("\n")}\n`);
}

/**
 * Writes project-scoped variables and shell-profile lines. Both targets are
 * append-only: existing keys and lines are left alone, so re-runs only add.
 */
export class EnvironmentConfigurer {
  constructor(private readonly ctx: ProvisionContext) {}

  configure(envVars: EnvironmentVariableSet, envFile: string = DEFAULT_ENV_FILE): StepResult[] {
    return [this.writeProjectFile(envVars.projectScoped, envFile), this.appendShellProfile(envVars.shellScoped)];
  }

  private writeProjectFile(variables: Readonly<Record<string, string>>, envFile: string): StepResult {
    const name = `env-file:${envFile}`;
    const entries = Object.entries(variables);
    if (entries.length === 0) return skipped(name, "no project-scoped variables declared");

    const existing = existsSync(envFile) ? readFileSync(envFile, "utf-8") : "";
    const present = parseEnvKeys(existing);
    const added = entries.filter(([key]) => !present.has(key));
    if (added.length === 0) {
      this.ctx.logger.info({ envFile }, "All project variables already present");
      return skipped(name, "all keys already present");
    }

    appendLines(envFile, existing, added.map(([key, value]) => formatEnvLine(key, value)));
    const keys = added.map(([key]) => key);
    this.ctx.logger.info({ envFile, keys }, "Added project variables");
    return succeeded(name, `added ${keys.join(", ")}`);
  }

  private appendShellProfile(lines: readonly string[]): StepResult {
    const { logger, platform, homeDir, env } = this.ctx;
    if (lines.length === 0) return skipped("shell-profile", "no shell lines declared");

    if (platform === "win32") {
      for (const line of lines) logger.warn({ line }, "Add this to your environment manually");
      return skipped("shell-profile", `manual setup required for ${lines.length} line(s) on Windows`);
    }

    const profile = shellProfilePath(env.SHELL, homeDir);
    const existing = existsSync(profile) ? readFileSync(profile, "utf-8") : "";
    const present = new Set(existing.split(/\r?\n/));
    const missing = [...new Set(lines)].filter((line) => !present.has(line));
    if (missing.length === 0) {
      logger.info({ profile }, "Shell profile already up to date");
      return skipped("shell-profile", `${profile} already contains every line`);
    }

    appendLines(profile, existing, missing);
    logger.info({ profile, count: missing.length }, "Appended lines to shell profile");
    return succeeded("shell-profile", `appended ${missing.length} line(s) to ${profile}`);
  }
}
