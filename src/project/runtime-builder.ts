import { existsSync } from "node:fs";
import { join } from "node:path";
import type { HostPlatform } from "../types/package-manager.js";
import type { RuntimeEnvironmentDescriptor, RuntimeTools } from "../types/project.js";
import type { StepResult } from "../types/result.js";
import type { ProvisionContext } from "../pipeline/context.js";
import { formatCommand } from "../execution/executor.js";
import { describeFailure } from "../package-manager/diagnostics.js";
import { failed, skipped, succeeded } from "../shared/results.js";

/** System-wide interpreter and installer names, used to create the env and as hook fallbacks. */
export function systemTools(platform: HostPlatform): { python: string; pip: string } {
  return platform === "win32" ? { python: "python", pip: "pip" } : { python: "python3", pip: "pip3" };
}

/** Interpreter and installer paths inside a runtime environment, relative to the project root. */
export function runtimeToolPaths(name: string, platform: HostPlatform): { python: string; pip: string } {
  return platform === "win32"
    ? { python: join(name, "Scripts", "python.exe"), pip: join(name, "Scripts", "pip.exe") }
    : { python: join(name, "bin", "python"), pip: join(name, "bin", "pip") };
}

export interface RuntimeBuildOutcome {
  tools: RuntimeTools;
  results: StepResult[];
}

/** Builds the project-local virtual environment inside the current (project) directory. */
export class RuntimeEnvironmentBuilder {
  constructor(private readonly ctx: ProvisionContext) {}

  async build(descriptor: RuntimeEnvironmentDescriptor, enabled: boolean): Promise<RuntimeBuildOutcome> {
    const { logger, platform } = this.ctx;
    const { name, packages } = descriptor;
    if (!enabled) {
      logger.info("Runtime environment disabled");
      return { tools: {}, results: [skipped("runtime", "disabled")] };
    }

    const results: StepResult[] = [];
    if (existsSync(name)) {
      logger.info({ name }, "Runtime environment already exists");
      results.push(skipped("runtime", `${name} already exists`));
    } else {
      const created = await this.create(name);
      results.push(created);
      if (created.status === "failed") return { tools: {}, results };
    }

    const paths = runtimeToolPaths(name, platform);
    const tools: RuntimeTools = {
      python: existsSync(paths.python) ? paths.python : undefined,
      pip: existsSync(paths.pip) ? paths.pip : undefined,
    };
    if (!tools.pip) {
      // hooks still fall back to the system installer
      logger.error({ expected: paths.pip }, "Runtime installer not found after creating the environment");
      results.push(failed("runtime:packages", `installer missing at ${paths.pip}`));
      return { tools, results };
    }

    results.push(packages.length > 0 ? await this.installPackages(tools.pip, packages) : skipped("runtime:packages", "no packages declared"));
    return { tools, results };
  }

  private async create(name: string): Promise<StepResult> {
    const { executor, logger, platform, timeouts } = this.ctx;
    const command = { argv: [systemTools(platform).python, "-m", "venv", name] };
    logger.info({ command: formatCommand(command) }, "Creating runtime environment");
    const result = await executor.execute(command, timeouts.slowMs);
    if (result.exitCode !== 0) {
      logger.error({ stderr: result.stderr.trim() }, "Could not create runtime environment");
      return failed("runtime", describeFailure(result));
    }
    return succeeded("runtime", `created ${name}`);
  }

  /** One batch install: the runtime installer resolves the whole set at once. */
  private async installPackages(pip: string, packages: readonly string[]): Promise<StepResult> {
    const { executor, logger, timeouts } = this.ctx;
    const command = { argv: [pip, "install", ...packages] };
    logger.info({ command: formatCommand(command) }, "Installing runtime packages");
    const result = await executor.execute(command, timeouts.slowMs);
    if (result.exitCode !== 0) {
      logger.error({ stderr: result.stderr.trim() }, "Runtime package install failed");
      return failed("runtime:packages", describeFailure(result));
    }
    return succeeded("runtime:packages", `installed ${packages.join(", ")}`);
  }
}
