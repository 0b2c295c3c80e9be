import type { HostPlatform, PackageManagerId, PrivilegeContext, SupportedManagerId } from "../types/package-manager.js";
import { commandExists, type Executor } from "../execution/executor.js";
import type { Logger } from "../logger.js";

interface Candidate {
  readonly id: SupportedManagerId;
  readonly executable: string;
}

/** Probe order per platform; the first executable found wins. */
export const MANAGER_CANDIDATES: Readonly<Partial<Record<HostPlatform, readonly Candidate[]>>> = {
  linux: [
    { id: "apt", executable: "apt-get" },
    { id: "dnf", executable: "dnf" },
    { id: "yum", executable: "yum" },
    { id: "pacman", executable: "pacman" },
  ],
  darwin: [{ id: "brew", executable: "brew" }],
  win32: [{ id: "winget", executable: "winget" }],
};

export class PackageManagerResolver {
  constructor(
    private readonly executor: Executor,
    private readonly logger: Logger,
  ) {}

  /** Detect the host's package manager. `none` is a valid outcome, not an error. */
  async resolve(platform: HostPlatform): Promise<PackageManagerId> {
    const candidates = MANAGER_CANDIDATES[platform] ?? [];
    for (const candidate of candidates) {
      if (await commandExists(this.executor, candidate.executable, platform)) {
        this.logger.info({ packageManager: candidate.id, platform }, "Package manager detected");
        return candidate.id;
      }
    }
    this.logger.warn({ platform, probed: candidates.map((c) => c.executable) }, "No supported package manager found");
    return "none";
  }
}

/** Elevation is tracked on POSIX only; Windows elevation is left to the user. */
export function detectPrivilege(platform: HostPlatform, uid: number | undefined = process.geteuid?.()): PrivilegeContext {
  if (platform === "win32") return { isElevated: false };
  return { isElevated: uid === 0 };
}
