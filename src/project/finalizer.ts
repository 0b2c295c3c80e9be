import { existsSync } from "node:fs";
import type { StepResult } from "../types/result.js";
import type { ProvisionContext } from "../pipeline/context.js";
import { commandExists } from "../execution/executor.js";
import { describeFailure } from "../package-manager/diagnostics.js";
import { failed, skipped, succeeded } from "../shared/results.js";

/** Stages and commits everything in the project root, unless there is nothing to commit. */
export class VersionControlFinalizer {
  constructor(private readonly ctx: ProvisionContext) {}

  async commit(message: string): Promise<StepResult> {
    const { executor, logger, platform, timeouts } = this.ctx;
    if (!(await commandExists(executor, "git", platform))) {
      logger.warn("git not found on PATH; skipping commit");
      return skipped("commit", "git not installed");
    }
    // without its own .git, git would commit into an enclosing repository
    if (!existsSync(".git")) {
      logger.warn("Project root is not a git repository; skipping commit");
      return skipped("commit", "project root is not a git repository");
    }

    const add = await executor.execute({ argv: ["git", "add", "-A"] }, timeouts.quickMs);
    if (add.exitCode !== 0) {
      logger.error({ stderr: add.stderr.trim() }, "git add failed");
      return failed("commit", describeFailure(add));
    }

    const status = await executor.execute({ argv: ["git", "status", "--porcelain"] }, timeouts.quickMs);
    if (status.exitCode !== 0) {
      logger.error({ stderr: status.stderr.trim() }, "git status failed");
      return failed("commit", describeFailure(status));
    }
    if (status.stdout.trim() === "") {
      logger.info("Working tree clean, nothing to commit");
      return skipped("commit", "nothing to commit");
    }

    const commit = await executor.execute({ argv: ["git", "commit", "-m", message] }, timeouts.quickMs);
    if (commit.exitCode !== 0) {
      logger.error({ stderr: commit.stderr.trim() }, "git commit failed");
      return failed("commit", describeFailure(commit));
    }

    const head = await executor.execute({ argv: ["git", "rev-parse", "--short", "HEAD"] }, timeouts.quickMs);
    const hash = head.exitCode === 0 ? head.stdout.trim() : "";
    logger.info({ hash, message }, "Committed project files");
    return succeeded("commit", hash ? `${hash} ${message}` : message);
  }
}
