/**
 * Logger interface for jail and upload logging.
 * Implement this interface to receive logs; nothing is logged without one.
 */
export interface JailLogger {
  /** Log informational messages (jail creation, escapes, completed uploads) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (directory changes, mirror counts, opened uploads) */
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * POSIX-style metadata for a jail entry, as exposed to protocol clients.
 * Owner and group are fixed placeholders and never host identities.
 */
export interface JailStat {
  /** Full `st_mode`: file type bits plus permission bits. */
  mode: number;
  nlink: number;
  size: number;
  mtime: Date;
  owner: "owner";
  group: "group";
}
