import type { PipelineResult, StepStatus } from "../types/result.js";

const STATUS_LABEL: Record<StepStatus, string> = {
  success: "OK",
  skipped: "SKIP",
  failed: "FAIL",
};

export function summarize(result: PipelineResult): Record<StepStatus, number> {
  const counts: Record<StepStatus, number> = { success: 0, skipped: 0, failed: 0 };
  for (const step of result.steps) counts[step.status] += 1;
  return counts;
}

/** Plain-text report printed at the end of a run. */
export function formatSummary(result: PipelineResult): string {
  const counts = summarize(result);
  const width = Math.max(0, ...result.steps.map((s) => s.name.length));
  const lines = result.steps.map((s) => `  ${STATUS_LABEL[s.status].padEnd(4)}  ${s.name.padEnd(width)}  ${s.detail}`);
  return [
    `Provisioning finished: ${counts.success} succeeded, ${counts.skipped} skipped, ${counts.failed} failed`,
    ...lines,
  ].join("\n");
}
