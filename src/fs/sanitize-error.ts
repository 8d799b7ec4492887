/**
 * Scrubbing of host paths from error messages shown outside the process.
 *
 * The stores already report virtual paths only. What can still leak is a
 * configured host directory (in a constructor error, or a message from a
 * library) and stack frames.
 */

import * as nodePath from "node:path";

/** Configured host directories by label; unset entries are skipped. */
export type HostRoots = Readonly<Record<string, string | undefined>>;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build a sanitizer that replaces every configured root (as an absolute
 * path) with `<label>` and drops stack frames. A root only matches as a whole path prefix, so
 * `/srv/data` does not touch `/srv/database`. Nested roots keep their own
 * label: longer roots are replaced first.
 */
export function createErrorSanitizer(
  roots: HostRoots,
): (message: string) => string {
  const patterns: Array<{ pattern: RegExp; label: string; length: number }> =
    [];
  for (const [label, root] of Object.entries(roots)) {
    if (root === undefined) continue;
    const resolved = nodePath.resolve(root);
    if (resolved === nodePath.sep) continue;
    patterns.push({
      pattern: new RegExp(`${escapeRegExp(resolved)}(?![\\w.-])`, "g"),
      label: `<${label}>`,
      length: resolved.length,
    });
  }
  patterns.sort((a, b) => b.length - a.length);

  return (message) => {
    let sanitized = message.replace(/\n\s+at\s.*/g, "");
    for (const { pattern, label } of patterns) {
      sanitized = sanitized.replace(pattern, () => label);
    }
    return sanitized;
  };
}
