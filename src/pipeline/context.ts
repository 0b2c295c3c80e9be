import { homedir } from "node:os";
import type { HostPlatform } from "../types/package-manager.js";
import type { Timeouts } from "../config/schema.js";
import type { Logger } from "../logger.js";
import { LocalExecutor, type Executor } from "../execution/executor.js";
import { WorkingDirectory } from "./workdir.js";

/**
 * Shared run context, the glue between all components.
 * Created once per run, passed to every component.
 */
export interface ProvisionContext {
  readonly executor: Executor;
  readonly logger: Logger;
  readonly platform: HostPlatform;
  readonly workdir: WorkingDirectory;
  readonly timeouts: Timeouts;
  /** Where the shell profile lives. */
  readonly homeDir: string;
  readonly env: NodeJS.ProcessEnv;
}

export interface ContextOptions {
  logger: Logger;
  timeouts: Timeouts;
  executor?: Executor;
  platform?: HostPlatform;
  workdir?: WorkingDirectory;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export function createContext(options: ContextOptions): ProvisionContext {
  return {
    executor: options.executor ?? new LocalExecutor(),
    logger: options.logger,
    platform: options.platform ?? process.platform,
    workdir: options.workdir ?? new WorkingDirectory(),
    timeouts: options.timeouts,
    homeDir: options.homeDir ?? homedir(),
    env: options.env ?? process.env,
  };
}
