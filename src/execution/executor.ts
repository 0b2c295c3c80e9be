// Command execution layer: every external command passes through this module.
// LocalExecutor.execute() is the boundary between provisioning code and the OS.
// A non-zero exit is data (ExecResult.exitCode), never an exception; callers
// decide whether a failure skips an item or fails a step.
import execa from "execa";
import type { Command } from "../types/command.js";
import type { HostPlatform } from "../types/package-manager.js";
import { ProvisionError, ProvisionErrorCode, errorMessage } from "../shared/errors.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

/** Executor interface, so tests can swap in an in-process fake. */
export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

/** Exit code reported when the executable could not be started at all. */
export const EXIT_NOT_FOUND = 127;
/** Exit code reported when the command was killed by its timeout. */
export const EXIT_TIMED_OUT = 124;
/** Exit code reported when the command was terminated by a signal. */
export const EXIT_TERMINATED = 128;

const PROBE_TIMEOUT_MS = 5_000;

export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const [file, ...args] = command.argv;
    if (file === undefined) {
      throw new ProvisionError(ProvisionErrorCode.COMMAND_SPAWN_FAILED, "Refusing to execute an empty command");
    }

    const start = performance.now();
    try {
      const result = await execa(file, args, {
        reject: false,
        shell: command.shell ?? false,
        timeout: timeoutMs,
        env: command.env,
        // sudo may need to prompt for a password
        stdin: "inherit",
        maxBuffer: 10 * 1024 * 1024,
      });
      const durationMs = Math.round(performance.now() - start);

      if (result.timedOut) {
        return { stdout: result.stdout, stderr: `${result.stderr}\nTimed out after ${timeoutMs}ms`.trim(), exitCode: EXIT_TIMED_OUT, durationMs };
      }
      if (result.signal !== undefined) {
        return { stdout: result.stdout, stderr: `${result.stderr}\nTerminated by ${result.signal}`.trim(), exitCode: EXIT_TERMINATED, durationMs };
      }
      // execa reports no numeric exit code when the process never started
      if (typeof result.exitCode !== "number") {
        return { stdout: "", stderr: result.stderr || `${file}: command not found`, exitCode: EXIT_NOT_FOUND, durationMs };
      }
      return { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode, durationMs };
    } catch (err) {
      throw new ProvisionError(ProvisionErrorCode.COMMAND_SPAWN_FAILED, `Command failed to spawn: ${file}: ${errorMessage(err)}`, { file }, { cause: err });
    }
  }
}

/** Check whether an executable is on the search path. */
export async function commandExists(executor: Executor, name: string, platform: HostPlatform): Promise<boolean> {
  if (!/^[\w.+-]+$/.test(name)) return false;
  const probe: Command = platform === "win32"
    ? { argv: ["where", name] }
    : { argv: ["sh", "-c", `command -v ${name}`] };
  const result = await executor.execute(probe, PROBE_TIMEOUT_MS);
  return result.exitCode === 0;
}

/** Render a command for logs and step details. */
export function formatCommand(command: Command): string {
  return command.argv.join(" ");
}
