/**
 * Path canonicalization for jailed sessions.
 *
 * Jail paths are home-relative and always start with `/` (the jail's own
 * root as the client sees it). Resolution is an explicit walk over segments:
 * a `..` that would climb above home is an escape and yields `null` instead
 * of being silently clamped, so callers can reject it.
 */

/**
 * Resolve `path` against `cwd` (both jail paths) with `.`/`..` semantics.
 * Absolute paths start from home. Returns the canonical jail path, or
 * `null` if resolution would leave the jail.
 */
export function resolveJailPath(cwd: string, path: string): string | null {
  const stack = path.startsWith("/") ? [] : splitSegments(cwd);

  for (const segment of path.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      if (stack.length === 0) {
        return null;
      }
      stack.pop();
    } else {
      stack.push(segment);
    }
  }

  return `/${stack.join("/")}`;
}

/**
 * Map a canonical jail path onto the store path below `home`.
 */
export function toStorePath(home: string, jailPath: string): string {
  return jailPath === "/" ? home : `${home}${jailPath}`;
}

/**
 * True when `jailPath` is canonical: rooted, no empty, `.` or `..`
 * segments, no trailing slash (except for `/` itself).
 */
export function isCanonicalJailPath(jailPath: string): boolean {
  if (jailPath === "/") return true;
  if (!jailPath.startsWith("/") || jailPath.endsWith("/")) return false;
  return jailPath
    .slice(1)
    .split("/")
    .every((segment) => segment !== "" && segment !== "." && segment !== "..");
}

/**
 * A protocol name becomes a single directory under the jail root, so it has
 * to be exactly one ordinary path segment.
 */
export function isValidProtocolName(name: string): boolean {
  return (
    name.length > 0 &&
    name !== "." &&
    name !== ".." &&
    !name.includes("/") &&
    !name.includes("\0")
  );
}

function splitSegments(jailPath: string): string[] {
  return jailPath.split("/").filter((segment) => segment !== "");
}
