import { existsSync } from "node:fs";
import type { HostPlatform } from "../types/package-manager.js";
import type { RuntimeTools } from "../types/project.js";
import type { StepResult } from "../types/result.js";
import type { ProvisionContext } from "../pipeline/context.js";
import { describeFailure } from "../package-manager/diagnostics.js";
import { skipped, failed, succeeded } from "../shared/results.js";
import { runtimeToolPaths, systemTools } from "./runtime-builder.js";

export const RUNTIME_PYTHON_TOKEN = "{{RUNTIME_PYTHON}}";
export const RUNTIME_PIP_TOKEN = "{{RUNTIME_PIP}}";

export interface ResolvedTools {
  python: string;
  pip: string;
}

/** Runtime tool paths where they exist, otherwise the system-wide tool names. */
export function resolveHookTools(
  runtimeName: string,
  platform: HostPlatform,
  exists: (path: string) => boolean = existsSync,
): ResolvedTools {
  const runtime = runtimeToolPaths(runtimeName, platform);
  const fallback = systemTools(platform);
  return {
    python: exists(runtime.python) ? runtime.python : fallback.python,
    pip: exists(runtime.pip) ? runtime.pip : fallback.pip,
  };
}

/** Literal token replacement; no other interpolation happens. */
export function substitutePlaceholders(template: string, tools: ResolvedTools): string {
  return template.replaceAll(RUNTIME_PYTHON_TOKEN, tools.python).replaceAll(RUNTIME_PIP_TOKEN, tools.pip);
}

/** Runs user hook commands in declared order; a failing hook does not stop the rest. */
export class HookExecutor {
  constructor(private readonly ctx: ProvisionContext) {}

  /** `built` holds the tools the runtime builder reported; missing ones are looked up on disk. */
  async run(runtimeName: string, templates: readonly string[], built: RuntimeTools = {}): Promise<StepResult[]> {
    const { executor, logger, platform, timeouts } = this.ctx;
    if (templates.length === 0) return [skipped("hooks", "no hooks declared")];

    const found = resolveHookTools(runtimeName, platform);
    const tools: ResolvedTools = { python: built.python ?? found.python, pip: built.pip ?? found.pip };
    logger.debug({ tools }, "Resolved hook tools");

    const results: StepResult[] = [];
    for (const [index, template] of templates.entries()) {
      const name = `hook:${index + 1}`;
      const line = substitutePlaceholders(template, tools);
      logger.info({ hook: line }, "Running hook");
      // shell: templates may use redirection and other operators
      const result = await executor.execute({ argv: [line], shell: true }, timeouts.slowMs);
      if (result.exitCode !== 0) {
        logger.error({ hook: line, exitCode: result.exitCode, stderr: result.stderr.trim() }, "Hook failed");
        results.push(failed(name, `${line}: ${describeFailure(result)}`));
        continue;
      }
      results.push(succeeded(name, line));
    }
    return results;
  }
}
