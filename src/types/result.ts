import type { PackageManagerId } from "./package-manager.js";

export type StepStatus = "success" | "skipped" | "failed";

export interface StepResult {
  readonly name: string;
  readonly status: StepStatus;
  readonly detail: string;
}

/** Pipeline states in the order they are visited. */
export const PIPELINE_STATES = [
  "idle",
  "resolving",
  "installing",
  "scaffolding",
  "configuring",
  "building-runtime",
  "running-hooks",
  "committing",
  "done",
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

export interface PipelineResult {
  readonly steps: StepResult[];
  readonly state: PipelineState;
  readonly packageManager: PackageManagerId;
  /** Absolute project root the run targeted. */
  readonly projectRoot: string;
  readonly startedAt: string;
  readonly finishedAt: string;
}
