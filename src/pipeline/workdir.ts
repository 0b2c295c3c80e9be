// The process working directory is the one piece of process-wide mutable state
// in a run. WorkingDirectory owns it: enter() pushes and changes directory,
// restore() returns to the origin recorded by begin(). The orchestrator calls
// begin() when a run starts and restore() from a finally block.
import { realpathSync } from "node:fs";
import { isAbsolute, relative, resolve } from "node:path";

/** The two process calls WorkingDirectory needs; swapped out in tests. */
export interface DirectoryProcess {
  cwd(): string;
  chdir(directory: string): void;
}

export class WorkingDirectory {
  private originDir: string;
  private readonly stack: string[] = [];

  constructor(private readonly proc: DirectoryProcess = process) {
    this.originDir = proc.cwd();
  }

  /** Directory the current run started from. */
  get origin(): string {
    return this.originDir;
  }

  /** Start a run from the present directory: it becomes the origin and the stack is cleared. */
  begin(): string {
    this.stack.length = 0;
    this.originDir = this.proc.cwd();
    return this.originDir;
  }

  get current(): string {
    return this.proc.cwd();
  }

  /** Number of enter() calls not yet undone. */
  get depth(): number {
    return this.stack.length;
  }

  /** Change into `directory` (resolved against the current directory). */
  enter(directory: string): string {
    const target = resolve(this.current, directory);
    this.stack.push(this.current);
    this.proc.chdir(target);
    return target;
  }

  /** Return to the origin, discarding the whole stack. Safe to call repeatedly. */
  restore(): void {
    this.stack.length = 0;
    if (this.proc.cwd() !== this.origin) this.proc.chdir(this.origin);
  }

  /** True when the current directory is `directory` or below it. */
  isInside(directory: string): boolean {
    const rel = relative(canonical(directory), canonical(this.current));
    return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
  }
}

function canonical(p: string): string {
  try {
    return realpathSync(p);
  } catch {
    return resolve(p);
  }
}
