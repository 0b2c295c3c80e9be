import { posix, win32 } from "node:path";

/**
 * True when `p` is a non-empty relative path with no `..` segment, on either
 * path flavour. Used for every declared structure entry and the runtime name.
 */
export function isSafeRelativePath(p: string): boolean {
  if (p.trim().length === 0) return false;
  if (posix.isAbsolute(p) || win32.isAbsolute(p)) return false;
  return !p.split(/[\\/]+/).some((segment) => segment === "..");
}
