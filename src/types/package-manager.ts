/** Package managers the provisioner knows how to drive, in no particular order. */
export const SUPPORTED_MANAGERS = ["apt", "dnf", "yum", "pacman", "brew", "winget"] as const;

export type SupportedManagerId = (typeof SUPPORTED_MANAGERS)[number];

/** Resolved once per run; `none` means no supported manager was found. */
export type PackageManagerId = SupportedManagerId | "none";

/** Host platform as reported by `process.platform`. */
export type HostPlatform = NodeJS.Platform;

export interface PrivilegeContext {
  readonly isElevated: boolean;
}

/**
 * How a `check` result is interpreted.
 * `exit-code`: exit 0 means installed.
 * `output-contains`: the captured stdout must contain the package token.
 */
export type CheckMode = "exit-code" | "output-contains";

export type CommandKind = "update" | "install" | "check";

/** Argument-list templates for one package manager. */
export interface CommandTemplate {
  /** May be empty, meaning the manager has no index refresh step. */
  readonly update: readonly string[];
  readonly install: readonly string[];
  readonly check: readonly string[];
  readonly checkMode: CheckMode;
  /** Whether update/install may be wrapped with the elevation command. */
  readonly elevate: boolean;
  readonly env?: Readonly<Record<string, string>>;
}
