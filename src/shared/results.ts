import type { StepResult } from "../types/result.js";

export function succeeded(name: string, detail: string): StepResult {
  return { name, status: "success", detail };
}

export function skipped(name: string, detail: string): StepResult {
  return { name, status: "skipped", detail };
}

export function failed(name: string, detail: string): StepResult {
  return { name, status: "failed", detail };
}
