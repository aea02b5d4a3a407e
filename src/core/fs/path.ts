/**
 * Root-relative path helpers. The virtual root is "".
 */

import path from "path";

/**
 * Normalize to a slash-separated, root-relative path.
 * "/a//b/./c/" -> "a/b/c"; ".." never climbs above the root.
 */
export function normalizePath(p: string): string {
  const normalized = path.posix.normalize("/" + p);
  return normalized.replace(/^\/+/, "").replace(/\/+$/, "");
}

export function splitPath(p: string): string[] {
  const normalized = normalizePath(p);
  return normalized === "" ? [] : normalized.split("/");
}

export function joinPath(...parts: string[]): string {
  return normalizePath(parts.filter((part) => part !== "").join("/"));
}

export function parentPath(p: string): string {
  const segments = splitPath(p);
  return segments.slice(0, -1).join("/");
}

export function baseName(p: string): string {
  const segments = splitPath(p);
  return segments[segments.length - 1] ?? "";
}

export function isRootPath(p: string): boolean {
  return normalizePath(p) === "";
}

/** True when `p` equals `prefix` or lies below it. */
export function isWithin(p: string, prefix: string): boolean {
  if (prefix === "") return true;
  return p === prefix || p.startsWith(prefix + "/");
}
