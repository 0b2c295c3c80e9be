import type { ExecResult } from "../execution/executor.js";

export interface FailureDiagnosis {
  code: string;
  hint: string;
}

interface FailurePattern extends FailureDiagnosis {
  test: (stderr: string) => boolean;
}

const FAILURE_PATTERNS: FailurePattern[] = [
  { test: (s) => s.includes("permission denied") || s.includes("sudo:") || s.includes("operation not permitted") || s.includes("are you root"),
    code: "PERMISSION_DENIED", hint: "Run from an account that can use sudo, or as root" },
  { test: (s) => s.includes("unable to locate package") || s.includes("no match for argument") || s.includes("target not found")
      || s.includes("no available formula") || s.includes("no package found matching"),
    code: "PACKAGE_NOT_FOUND", hint: "Check the package name for this package manager" },
  { test: (s) => s.includes("could not get lock") || s.includes("dpkg frontend lock") || s.includes("rpm.lock") || s.includes("unable to lock database"),
    code: "RESOURCE_LOCKED", hint: "Another package manager process is running; wait for it and re-run" },
  { test: (s) => s.includes("could not resolve") || s.includes("failed to fetch") || s.includes("connection timed out") || s.includes("network is unreachable"),
    code: "NETWORK_ERROR", hint: "Check network connectivity and re-run" },
];

export function diagnose(stderr: string): FailureDiagnosis {
  const lower = stderr.toLowerCase();
  for (const p of FAILURE_PATTERNS) {
    if (p.test(lower)) return { code: p.code, hint: p.hint };
  }
  return { code: "COMMAND_FAILED", hint: "Review the captured output above" };
}

/** One-line step detail for a failed command: exit code, category and captured output. */
export function describeFailure(result: ExecResult): string {
  const output = result.stderr.trim() || result.stdout.trim() || "no output";
  return `exit ${result.exitCode} [${diagnose(result.stderr).code}]: ${output}`;
}
