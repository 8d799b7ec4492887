/**
 * Shared utilities for real-filesystem-backed stores.
 *
 * Path validation shared by every store that touches the host filesystem.
 */

import * as fs from "node:fs";
import * as nodePath from "node:path";
import { fsError } from "./errors.js";

/**
 * Normalize a virtual path: resolve `.` and `..`, ensure it starts with `/`,
 * strip trailing slashes. `..` at the top stays at `/`. Pure function, no I/O.
 */
export function normalizePath(path: string): string {
  if (!path || path === "/") return "/";

  let normalized =
    path.endsWith("/") && path !== "/" ? path.slice(0, -1) : path;

  if (!normalized.startsWith("/")) {
    normalized = `/${normalized}`;
  }

  const parts = normalized.split("/").filter((p) => p && p !== ".");
  const resolved: string[] = [];

  for (const part of parts) {
    if (part === "..") {
      resolved.pop();
    } else {
      resolved.push(part);
    }
  }

  return `/${resolved.join("/")}`;
}

/**
 * The `code` of a Node.js system error, if `e` is one.
 */
export function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}

/**
 * Join a normalized directory and a child name.
 */
export function joinPath(dir: string, name: string): string {
  return dir === "/" ? `/${name}` : `${dir}/${name}`;
}

/**
 * Parent of a normalized virtual path.
 */
export function dirname(path: string): string {
  const normalized = normalizePath(path);
  if (normalized === "/") return "/";
  const lastSlash = normalized.lastIndexOf("/");
  return lastSlash === 0 ? "/" : normalized.slice(0, lastSlash);
}

/**
 * Check whether `resolved` is equal to, or a child of, `canonicalRoot`.
 * Uses a boundary-safe prefix check (appends `/`) so that `/data` does not
 * match `/datastore`.
 */
export function isPathWithinRoot(
  resolved: string,
  canonicalRoot: string,
): boolean {
  return resolved === canonicalRoot || resolved.startsWith(`${canonicalRoot}/`);
}

/**
 * Resolve a real filesystem path to its canonical form and verify it stays
 * within the sandbox root. Returns the canonical path on success, or `null`
 * if the path escapes the root (fail-closed on unexpected errors).
 *
 * The canonical path is what callers use for subsequent I/O, so the
 * unresolved path cannot be swapped between validation and use.
 */
export function resolveCanonicalPath(
  realPath: string,
  canonicalRoot: string,
): string | null {
  try {
    const resolved = fs.realpathSync(realPath);
    return isPathWithinRoot(resolved, canonicalRoot) ? resolved : null;
  } catch (e) {
    if (errnoCode(e) === "ENOENT") {
      const parent = nodePath.dirname(realPath);
      if (parent === realPath) return null;
      const parentCanon = resolveCanonicalPath(parent, canonicalRoot);
      if (parentCanon === null) return null;

      // The leaf may be a broken symlink (realpath followed it and failed).
      // Its target has to stay inside the root as well.
      try {
        const leafStat = fs.lstatSync(realPath);
        if (leafStat.isSymbolicLink()) {
          const target = fs.readlinkSync(realPath);
          const resolvedTarget = nodePath.isAbsolute(target)
            ? target
            : nodePath.resolve(nodePath.dirname(realPath), target);
          if (resolveCanonicalPath(resolvedTarget, canonicalRoot) === null) {
            return null;
          }
        }
      } catch {
        // lstat ENOENT: the leaf truly doesn't exist, walk-up result stands.
      }

      return nodePath.join(parentCanon, nodePath.basename(realPath));
    }
    return null;
  }
}

/**
 * Like `resolveCanonicalPath`, but also reject the path if any symlink was
 * traversed on the way, or if the leaf itself is a symlink.
 *
 * Detection: compare the relative path from `root` (unresolved) with the
 * relative path from `canonicalRoot` (resolved). A mismatch means a symlink
 * was followed somewhere in the path.
 */
export function resolveCanonicalPathNoSymlinks(
  realPath: string,
  root: string,
  canonicalRoot: string,
): string | null {
  const canonical = resolveCanonicalPath(realPath, canonicalRoot);
  if (canonical === null) return null;

  const resolvedReal = nodePath.resolve(realPath);
  const relFromRoot = resolvedReal.slice(root.length);
  const relFromCanonical = canonical.slice(canonicalRoot.length);

  if (relFromRoot !== relFromCanonical) {
    return null;
  }

  // Broken symlinks at the leaf are masked by the ENOENT walk-up above.
  try {
    const stat = fs.lstatSync(resolvedReal);
    if (stat.isSymbolicLink()) {
      return null;
    }
  } catch {
    // ENOENT: nothing at the leaf yet; a create lands inside the root.
  }

  return canonical;
}

/**
 * Validate that a root directory exists and is actually a directory.
 * Does NOT include the real root path in the error message.
 */
export function validateRootDirectory(root: string, fsName: string): void {
  if (!fs.existsSync(root)) {
    throw new Error(`${fsName} root does not exist`);
  }
  const stat = fs.statSync(root);
  if (!stat.isDirectory()) {
    throw new Error(`${fsName} root is not a directory`);
  }
}

/**
 * Reject paths containing null bytes, which can truncate filenames or slip
 * past filters.
 */
export function validatePath(path: string, operation: string): void {
  if (path.includes("\0")) {
    throw fsError("ENOENT", operation, path);
  }
}
