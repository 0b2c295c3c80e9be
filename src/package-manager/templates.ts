// Command templates for every supported package manager.
// Manager quirks live here as data: adding a manager means adding a row to
// COMMAND_TEMPLATES (and a probe in resolver.ts), not new control flow.
import type { Command } from "../types/command.js";
import type { CommandKind, CommandTemplate, HostPlatform, PrivilegeContext, SupportedManagerId } from "../types/package-manager.js";

/** Replaced with the package identifier when a template is rendered. */
export const PACKAGE_TOKEN = "{{PACKAGE}}";

/** Prefix applied to update/install when the process is not privileged. */
export const ELEVATION_WRAPPER: readonly string[] = ["sudo"];

export const COMMAND_TEMPLATES: Readonly<Record<SupportedManagerId, CommandTemplate>> = {
  apt: {
    update: ["apt-get", "update"],
    install: ["apt-get", "install", "-y", PACKAGE_TOKEN],
    check: ["dpkg", "-s", PACKAGE_TOKEN],
    checkMode: "exit-code",
    elevate: true,
    env: { DEBIAN_FRONTEND: "noninteractive" },
  },
  dnf: {
    update: ["dnf", "makecache"],
    install: ["dnf", "install", "-y", PACKAGE_TOKEN],
    check: ["rpm", "-q", PACKAGE_TOKEN],
    checkMode: "exit-code",
    elevate: true,
  },
  yum: {
    update: ["yum", "makecache"],
    install: ["yum", "install", "-y", PACKAGE_TOKEN],
    check: ["rpm", "-q", PACKAGE_TOKEN],
    checkMode: "exit-code",
    elevate: true,
  },
  pacman: {
    update: ["pacman", "-Sy"],
    install: ["pacman", "-S", "--noconfirm", "--needed", PACKAGE_TOKEN],
    check: ["pacman", "-Qi", PACKAGE_TOKEN],
    checkMode: "exit-code",
    elevate: true,
  },
  // `brew list <pkg>` exits 0 for some absent names, so list everything and search the output.
  // Homebrew refuses to run as root, hence no elevation.
  brew: {
    update: ["brew", "update"],
    install: ["brew", "install", PACKAGE_TOKEN],
    check: ["brew", "list"],
    checkMode: "output-contains",
    elevate: false,
  },
  winget: {
    update: [],
    install: ["winget", "install", "--id", PACKAGE_TOKEN, "-e", "--accept-source-agreements", "--accept-package-agreements"],
    check: ["winget", "list", "--id", PACKAGE_TOKEN, "-e"],
    checkMode: "exit-code",
    elevate: false,
  },
};

export interface BuildOptions {
  pkg?: string;
  privilege: PrivilegeContext;
  platform: HostPlatform;
}

export function needsElevation(managerId: SupportedManagerId, kind: CommandKind, privilege: PrivilegeContext, platform: HostPlatform): boolean {
  if (kind === "check" || platform === "win32") return false;
  return COMMAND_TEMPLATES[managerId].elevate && !privilege.isElevated;
}

/**
 * Render one template into a Command. Returns null for an empty template
 * (managers without an index refresh).
 */
export function buildCommand(managerId: SupportedManagerId, kind: CommandKind, options: BuildOptions): Command | null {
  const template = COMMAND_TEMPLATES[managerId];
  const shape = template[kind];
  if (shape.length === 0) return null;

  const argv = shape.map((arg) => (arg === PACKAGE_TOKEN ? options.pkg ?? "" : arg));
  if (needsElevation(managerId, kind, options.privilege, options.platform)) {
    argv.unshift(...ELEVATION_WRAPPER);
  }
  return template.env ? { argv, env: { ...template.env } } : { argv };
}

/** Interpret a `check` result according to the manager's check mode. */
export function isInstalled(managerId: SupportedManagerId, pkg: string, result: { exitCode: number; stdout: string }): boolean {
  switch (COMMAND_TEMPLATES[managerId].checkMode) {
    case "exit-code":
      return result.exitCode === 0;
    case "output-contains":
      // Substring match: "git" is also found inside "git-lfs".
      return result.stdout.includes(pkg);
  }
}
