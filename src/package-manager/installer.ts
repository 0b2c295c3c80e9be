import type { PackageManagerId, PrivilegeContext, SupportedManagerId } from "../types/package-manager.js";
import type { StepResult } from "../types/result.js";
import type { ProvisionContext } from "../pipeline/context.js";
import { buildCommand, isInstalled } from "./templates.js";
import { describeFailure, diagnose } from "./diagnostics.js";
import { formatCommand } from "../execution/executor.js";
import { failed, skipped, succeeded } from "../shared/results.js";

/**
 * Installs system packages one at a time. Package managers hold global lock
 * files, so nothing here runs concurrently.
 */
export class PackageInstaller {
  constructor(private readonly ctx: ProvisionContext) {}

  async install(managerId: PackageManagerId, packages: readonly string[], privilege: PrivilegeContext): Promise<StepResult[]> {
    const { logger } = this.ctx;
    if (managerId === "none") {
      logger.warn("Skipping system packages: no supported package manager");
      return [skipped("packages", "no supported package manager found")];
    }
    if (packages.length === 0) {
      logger.info({ packageManager: managerId }, "No system packages declared");
      return [skipped("packages", `no packages declared for ${managerId}`)];
    }
    if (this.ctx.platform === "win32") {
      logger.warn("winget installs may need an elevated terminal; elevation is not handled automatically on Windows");
    }

    const results: StepResult[] = [];
    const update = await this.refreshIndex(managerId, privilege);
    if (update) results.push(update);

    for (const pkg of packages) {
      results.push(await this.installOne(managerId, pkg, privilege));
    }
    return results;
  }

  /** One index refresh per invocation. A failure is recorded but installs still proceed. */
  private async refreshIndex(managerId: SupportedManagerId, privilege: PrivilegeContext): Promise<StepResult | null> {
    const command = buildCommand(managerId, "update", { privilege, platform: this.ctx.platform });
    if (!command) return null;

    this.ctx.logger.info({ command: formatCommand(command) }, "Refreshing package index");
    const result = await this.ctx.executor.execute(command, this.ctx.timeouts.slowMs);
    if (result.exitCode !== 0) {
      this.ctx.logger.error({ exitCode: result.exitCode, stderr: result.stderr.trim() }, "Package index refresh failed; continuing with installs");
      return failed(`${managerId}:update`, describeFailure(result));
    }
    return succeeded(`${managerId}:update`, "package index refreshed");
  }

  private async installOne(managerId: SupportedManagerId, pkg: string, privilege: PrivilegeContext): Promise<StepResult> {
    const { executor, logger, platform, timeouts } = this.ctx;
    const name = `package:${pkg}`;

    const check = buildCommand(managerId, "check", { pkg, privilege, platform });
    if (check) {
      const checked = await executor.execute(check, timeouts.quickMs);
      if (isInstalled(managerId, pkg, checked)) {
        logger.info({ pkg }, "Already installed, skipping");
        return skipped(name, "already installed");
      }
    }

    const install = buildCommand(managerId, "install", { pkg, privilege, platform });
    if (!install) return failed(name, `${managerId} has no install command`);

    logger.info({ pkg, command: formatCommand(install) }, "Installing package");
    const result = await executor.execute(install, timeouts.slowMs);
    if (result.exitCode !== 0) {
      const diagnosis = diagnose(result.stderr);
      logger.error({ pkg, exitCode: result.exitCode, stderr: result.stderr.trim(), hint: diagnosis.hint }, "Package install failed");
      return failed(name, describeFailure(result));
    }
    logger.info({ pkg }, "Package installed");
    return succeeded(name, "installed");
  }
}
