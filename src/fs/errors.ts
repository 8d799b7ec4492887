/**
 * Filesystem error taxonomy.
 *
 * Every backing store and the jail layer throw these instead of bare
 * `Error`s so callers can branch on `code` without parsing messages. The
 * message keeps the familiar Node.js shape:
 *
 *   ENOENT: no such file or directory, stat '/pub/missing.txt'
 *
 * Paths in messages are always virtual (store- or jail-relative), never host
 * paths.
 */

export type FsErrorCode =
  | "EACCES"
  | "EBADF"
  | "EEXIST"
  | "EFBIG"
  | "EINVAL"
  | "EIO"
  | "EISDIR"
  | "ELOOP"
  | "ENOENT"
  | "ENOSYS"
  | "ENOTDIR"
  | "ENOTEMPTY"
  | "EPERM";

const DESCRIPTIONS: Record<FsErrorCode, string> = {
  EACCES: "permission denied",
  EBADF: "bad file descriptor",
  EEXIST: "file already exists",
  EFBIG: "file too large",
  EINVAL: "invalid argument",
  EIO: "i/o error",
  EISDIR: "illegal operation on a directory",
  ELOOP: "too many levels of symbolic links",
  ENOENT: "no such file or directory",
  ENOSYS: "function not implemented",
  ENOTDIR: "not a directory",
  ENOTEMPTY: "directory not empty",
  EPERM: "operation not permitted",
};

export class FsError extends Error {
  readonly code: FsErrorCode;
  readonly syscall: string;
  readonly path: string;

  constructor(code: FsErrorCode, syscall: string, path: string) {
    super(`${code}: ${DESCRIPTIONS[code]}, ${syscall} '${path}'`);
    this.name = "FsError";
    this.code = code;
    this.syscall = syscall;
    this.path = path;
  }
}

/** Exclusive create collided with an existing subtree or upload. */
export class AlreadyExistsError extends FsError {
  constructor(syscall: string, path: string) {
    super("EEXIST", syscall, path);
    this.name = "AlreadyExistsError";
  }
}

export class NotFoundError extends FsError {
  constructor(syscall: string, path: string) {
    super("ENOENT", syscall, path);
    this.name = "NotFoundError";
  }
}

/** Also raised for chdir attempts that would leave the jail. */
export class NotADirectoryError extends FsError {
  constructor(syscall: string, path: string) {
    super("ENOTDIR", syscall, path);
    this.name = "NotADirectoryError";
  }
}

export class NotASymlinkError extends FsError {
  constructor(path: string) {
    super("EINVAL", "readlink", path);
    this.name = "NotASymlinkError";
  }
}

export class NotImplementedError extends FsError {
  constructor(syscall: string, path: string) {
    super("ENOSYS", syscall, path);
    this.name = "NotImplementedError";
  }
}

/**
 * Build the most specific error class for a code.
 */
export function fsError(
  code: FsErrorCode,
  syscall: string,
  path: string,
): FsError {
  switch (code) {
    case "EEXIST":
      return new AlreadyExistsError(syscall, path);
    case "ENOENT":
      return new NotFoundError(syscall, path);
    case "ENOTDIR":
      return new NotADirectoryError(syscall, path);
    case "ENOSYS":
      return new NotImplementedError(syscall, path);
    case "EINVAL":
      return syscall === "readlink"
        ? new NotASymlinkError(path)
        : new FsError(code, syscall, path);
    default:
      return new FsError(code, syscall, path);
  }
}

export function isFsError(e: unknown, code?: FsErrorCode): e is FsError {
  return e instanceof FsError && (code === undefined || e.code === code);
}
