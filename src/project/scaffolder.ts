import { copyFileSync, existsSync, mkdirSync, statSync, writeFileSync } from "node:fs";
import { dirname, join, normalize, resolve } from "node:path";
import type { ProjectStructureNode } from "../types/project.js";
import type { StepResult } from "../types/result.js";
import type { ProvisionContext } from "../pipeline/context.js";
import { commandExists, formatCommand } from "../execution/executor.js";
import { describeFailure } from "../package-manager/diagnostics.js";
import { ProvisionError, ProvisionErrorCode, errorMessage } from "../shared/errors.js";
import { isSafeRelativePath } from "../shared/paths.js";
import { failed, skipped, succeeded } from "../shared/results.js";

/** Keeps otherwise-empty directories in version control. */
export const PLACEHOLDER_FILE = ".gitkeep";
/** When a file of this name sits in the invocation directory, it is copied instead of the declared content. */
export const IGNORE_FILE = ".gitignore";

export interface ScaffoldOutcome {
  /** Absolute project root; the process is inside it when scaffold() returns. */
  root: string;
  results: StepResult[];
}

/** Flatten the configured directories and files into structure nodes. */
export function toStructure(directories: readonly string[], files: Readonly<Record<string, string>>): ProjectStructureNode[] {
  return [
    ...directories.map((path): ProjectStructureNode => ({ kind: "directory", path })),
    ...Object.entries(files).map(([path, content]): ProjectStructureNode => ({ kind: "file", path, content })),
  ];
}

export class ProjectScaffolder {
  constructor(private readonly ctx: ProvisionContext) {}

  /**
   * Create (or reuse) the project root, enter it, initialise git once and
   * materialise the declared tree. Never overwrites an existing file.
   * Throws only while the root itself is unusable; once inside it, every
   * failure is recorded against its own entry.
   */
  async scaffold(rootPath: string, structure: readonly ProjectStructureNode[]): Promise<ScaffoldOutcome> {
    const { logger, workdir } = this.ctx;
    const root = resolve(workdir.origin, rootPath);
    const results: StepResult[] = [];

    if (existsSync(root)) {
      if (!statSync(root).isDirectory()) {
        throw new ProvisionError(ProvisionErrorCode.PROJECT_ROOT_UNAVAILABLE, `Project path exists and is not a directory: ${root}`, { root });
      }
      logger.warn({ root }, "Project directory already exists, reusing it");
      results.push(skipped("project-root", `reusing existing ${root}`));
    } else {
      mkdirSync(root, { recursive: true });
      logger.info({ root }, "Created project directory");
      results.push(succeeded("project-root", `created ${root}`));
    }

    workdir.enter(root);

    results.push(await this.initRepository());
    for (const node of structure) {
      results.push(this.materialize(node));
    }
    return { root, results };
  }

  private async initRepository(): Promise<StepResult> {
    try {
      return await this.runGitInit();
    } catch (err) {
      this.ctx.logger.error({ err }, "git init failed");
      return failed("git-init", errorMessage(err));
    }
  }

  private async runGitInit(): Promise<StepResult> {
    const { executor, logger, platform, timeouts } = this.ctx;
    if (existsSync(".git")) {
      logger.info("Git repository already initialised");
      return skipped("git-init", "repository already initialised");
    }
    if (!(await commandExists(executor, "git", platform))) {
      logger.warn("git not found on PATH; skipping repository initialisation");
      return skipped("git-init", "git not installed");
    }
    const command = { argv: ["git", "init"] };
    const result = await executor.execute(command, timeouts.quickMs);
    if (result.exitCode !== 0) {
      logger.error({ command: formatCommand(command), stderr: result.stderr.trim() }, "git init failed");
      return failed("git-init", describeFailure(result));
    }
    logger.info("Initialised git repository");
    return succeeded("git-init", "initialised repository");
  }

  private materialize(node: ProjectStructureNode): StepResult {
    const name = `${node.kind}:${node.path}`;
    if (!isSafeRelativePath(node.path)) {
      this.ctx.logger.error({ path: node.path }, "Refusing structure path outside the project root");
      return failed(name, "path must be relative and stay inside the project root");
    }
    try {
      return node.kind === "directory" ? this.createDirectory(name, node.path) : this.createFile(name, node.path, node.content);
    } catch (err) {
      this.ctx.logger.error({ path: node.path, err }, "Could not create structure entry");
      return failed(name, errorMessage(err));
    }
  }

  private createDirectory(name: string, path: string): StepResult {
    const existed = existsSync(path);
    mkdirSync(path, { recursive: true });
    const placeholder = join(path, PLACEHOLDER_FILE);
    const placeholderExisted = existsSync(placeholder);
    if (!placeholderExisted) writeFileSync(placeholder, "");

    if (existed && placeholderExisted) return skipped(name, "already exists");
    this.ctx.logger.info({ path }, "Created directory");
    return succeeded(name, existed ? `added ${PLACEHOLDER_FILE}` : "created");
  }

  private createFile(name: string, path: string, content: string): StepResult {
    if (existsSync(path)) {
      this.ctx.logger.info({ path }, "File exists, leaving it untouched");
      return skipped(name, "already exists");
    }
    mkdirSync(dirname(path), { recursive: true });

    const template = join(this.ctx.workdir.origin, IGNORE_FILE);
    if (normalize(path) === IGNORE_FILE && existsSync(template)) {
      copyFileSync(template, path);
      this.ctx.logger.info({ path, template }, "Copied ignore file from invocation directory");
      return succeeded(name, `copied from ${template}`);
    }

    writeFileSync(path, content);
    this.ctx.logger.info({ path }, "Created file");
    return succeeded(name, "created");
  }
}
