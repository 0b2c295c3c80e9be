// Pipeline orchestrator: runs every stage in order, once, and always reaches "done".
// Each stage's exceptions are converted into a failed StepResult here, so nothing
// escapes run(). The starting directory is recorded when run() begins and
// restored in a finally block whatever a stage did to it.
import { resolve } from "node:path";
import type { PackageManagerId, PrivilegeContext } from "../types/package-manager.js";
import type { PipelineResult, PipelineState, StepResult } from "../types/result.js";
import type { RuntimeTools } from "../types/project.js";
import type { ProvisionConfig } from "../config/schema.js";
import type { ProvisionContext } from "./context.js";
import { PackageManagerResolver, detectPrivilege } from "../package-manager/resolver.js";
import { PackageInstaller } from "../package-manager/installer.js";
import { ProjectScaffolder, toStructure } from "../project/scaffolder.js";
import { EnvironmentConfigurer } from "../project/env-configurer.js";
import { RuntimeEnvironmentBuilder } from "../project/runtime-builder.js";
import { HookExecutor } from "../project/hooks.js";
import { VersionControlFinalizer } from "../project/finalizer.js";
import { errorMessage } from "../shared/errors.js";
import { failed, skipped, succeeded } from "../shared/results.js";

export interface PipelineComponents {
  resolver: Pick<PackageManagerResolver, "resolve">;
  installer: Pick<PackageInstaller, "install">;
  scaffolder: Pick<ProjectScaffolder, "scaffold">;
  environment: Pick<EnvironmentConfigurer, "configure">;
  runtime: Pick<RuntimeEnvironmentBuilder, "build">;
  hooks: Pick<HookExecutor, "run">;
  finalizer: Pick<VersionControlFinalizer, "commit">;
}

export interface RunOptions {
  /** Defaults to the privileges of the current process. */
  privilege?: PrivilegeContext;
}

export function createComponents(ctx: ProvisionContext): PipelineComponents {
  return {
    resolver: new PackageManagerResolver(ctx.executor, ctx.logger),
    installer: new PackageInstaller(ctx),
    scaffolder: new ProjectScaffolder(ctx),
    environment: new EnvironmentConfigurer(ctx),
    runtime: new RuntimeEnvironmentBuilder(ctx),
    hooks: new HookExecutor(ctx),
    finalizer: new VersionControlFinalizer(ctx),
  };
}

/** Mutable facts gathered while the stages run. */
interface RunSession {
  packageManager: PackageManagerId;
  /** Absolute target root, fixed before scaffolding starts. */
  projectRoot: string;
  runtimeTools: RuntimeTools;
}

export class PipelineOrchestrator {
  private readonly components: PipelineComponents;
  private currentState: PipelineState = "idle";

  constructor(
    private readonly ctx: ProvisionContext,
    overrides: Partial<PipelineComponents> = {},
  ) {
    this.components = { ...createComponents(ctx), ...overrides };
  }

  get state(): PipelineState {
    return this.currentState;
  }

  async run(config: ProvisionConfig, options: RunOptions = {}): Promise<PipelineResult> {
    const { logger, workdir, platform } = this.ctx;
    const startedAt = new Date().toISOString();
    const privilege = options.privilege ?? detectPrivilege(platform);
    const steps: StepResult[] = [];
    const origin = workdir.begin();
    const session: RunSession = {
      packageManager: "none",
      projectRoot: resolve(origin, config.project.path),
      runtimeTools: {},
    };
    const c = this.components;

    logger.info({ origin, project: session.projectRoot }, "Provisioning started");
    try {
      await this.stage("resolving", steps, async () => {
        session.packageManager = await c.resolver.resolve(platform);
        return [
          session.packageManager === "none"
            ? skipped("package-manager", `no supported package manager on ${platform}`)
            : succeeded("package-manager", `using ${session.packageManager}`),
        ];
      });

      // system-wide, from the caller's directory
      await this.stage("installing", steps, () => {
        const packages = session.packageManager === "none" ? [] : config.packages[session.packageManager];
        return c.installer.install(session.packageManager, packages, privilege);
      });

      await this.stage("scaffolding", steps, async () => {
        const structure = toStructure(config.project.directories, config.project.files);
        const outcome = await c.scaffolder.scaffold(session.projectRoot, structure);
        return outcome.results;
      });

      await this.projectStage("configuring", steps, session, () =>
        c.environment.configure(
          { projectScoped: config.environment.project, shellScoped: config.environment.shell },
          config.environment.file,
        ),
      );

      await this.projectStage("building-runtime", steps, session, async () => {
        const outcome = await c.runtime.build({ name: config.runtime.name, packages: config.runtime.packages }, config.runtime.enabled);
        session.runtimeTools = outcome.tools;
        return outcome.results;
      });

      await this.projectStage("running-hooks", steps, session, () => c.hooks.run(config.runtime.name, config.hooks, session.runtimeTools));

      await this.projectStage("committing", steps, session, async () => [await c.finalizer.commit(config.project.commitMessage)]);
    } finally {
      workdir.restore();
      this.transition("done");
    }

    const result: PipelineResult = {
      steps,
      state: this.currentState,
      packageManager: session.packageManager,
      projectRoot: session.projectRoot,
      startedAt,
      finishedAt: new Date().toISOString(),
    };
    logger.info({ cwd: workdir.current }, "Provisioning finished");
    return result;
  }

  private transition(next: PipelineState): void {
    this.ctx.logger.debug({ from: this.currentState, to: next }, "Pipeline state change");
    this.currentState = next;
  }

  private async stage(state: PipelineState, steps: StepResult[], body: () => Promise<StepResult[]> | StepResult[]): Promise<void> {
    this.transition(state);
    try {
      steps.push(...(await body()));
    } catch (err) {
      this.ctx.logger.error({ state, err, cwd: this.ctx.workdir.current }, "Stage failed");
      steps.push(failed(state, errorMessage(err)));
    }
  }

  /**
   * Stages that write into the project root run only while the process is
   * inside it, however the scaffolding stage ended.
   */
  private async projectStage(
    state: PipelineState,
    steps: StepResult[],
    session: RunSession,
    body: () => Promise<StepResult[]> | StepResult[],
  ): Promise<void> {
    if (!this.ctx.workdir.isInside(session.projectRoot)) {
      this.transition(state);
      this.ctx.logger.warn({ state }, "Project root unavailable, skipping stage");
      steps.push(skipped(state, "project root unavailable"));
      return;
    }
    await this.stage(state, steps, body);
  }
}
