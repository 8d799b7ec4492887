import type { FileContent } from "./encoding.js";

export type { FileContent };

/**
 * POSIX file type bits, as found in the upper part of `st_mode`.
 */
export const S_IFMT = 0o170000;
export const S_IFSOCK = 0o140000;
export const S_IFLNK = 0o120000;
export const S_IFREG = 0o100000;
export const S_IFBLK = 0o060000;
export const S_IFDIR = 0o040000;
export const S_IFCHR = 0o020000;
export const S_IFIFO = 0o010000;

/**
 * File system entry types
 */
export interface FileEntry {
  type: "file";
  content: Uint8Array;
  /** Permission bits only; type bits are derived from `type`. */
  mode: number;
  mtime: Date;
}

export interface DirectoryEntry {
  type: "directory";
  mode: number;
  mtime: Date;
}

export interface SymlinkEntry {
  type: "symlink";
  target: string; // stored verbatim, never rewritten
  mode: number;
  mtime: Date;
}

export type FsEntry = FileEntry | DirectoryEntry | SymlinkEntry;

/**
 * Directory entry with type information (similar to Node's Dirent).
 * The flags describe the entry itself; a symlink is never followed.
 */
export interface DirentEntry {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
  isSymbolicLink: boolean;
}

/**
 * Stat result from the filesystem
 */
export interface FsStat {
  isFile: boolean;
  isDirectory: boolean;
  isSymbolicLink: boolean;
  /** Full `st_mode`: file type bits plus permission bits. */
  mode: number;
  nlink: number;
  size: number;
  mtime: Date;
}

export interface MkdirOptions {
  recursive?: boolean;
}

export interface RmOptions {
  recursive?: boolean;
  force?: boolean;
}

/**
 * Write-only handle returned by an exclusive create.
 */
export interface WriteHandle {
  /**
   * Append bytes at the current end of the file.
   * @returns number of bytes accepted
   */
  write(data: Uint8Array): Promise<number>;
  /** Push written bytes to durable storage. */
  flush(): Promise<void>;
  /** Release the handle. Further writes fail with EBADF. */
  close(): Promise<void>;
}

/**
 * Backing store interface shared by the jail root, mirror sources and the
 * persistent upload store. Implementations:
 * - InMemoryFs (ephemeral, default jail root)
 * - ReadWriteFs (a real directory via node:fs)
 *
 * Paths are virtual and absolute within the store. Errors are FsError
 * instances carrying the virtual path.
 */
export interface IFileSystem {
  // Note: Sync methods are not part of the contract.
  /**
   * Read the contents of a file as a Uint8Array (binary)
   * @throws FsError if file doesn't exist or is a directory
   */
  readFileBuffer(path: string): Promise<Uint8Array>;

  /**
   * Write content to a file, creating it (and missing parents) if needed
   */
  writeFile(path: string, content: FileContent): Promise<void>;

  /**
   * Check if a path exists
   */
  exists(path: string): Promise<boolean>;

  /**
   * Get file/directory information, following symlinks
   * @throws FsError if path doesn't exist
   */
  stat(path: string): Promise<FsStat>;

  /**
   * Get file/directory information without following a final symlink
   * @throws FsError if path doesn't exist
   */
  lstat(path: string): Promise<FsStat>;

  /**
   * Create a directory. Without `recursive` this is an atomic exclusive
   * create: exactly one of several concurrent callers succeeds.
   * @throws FsError EEXIST if the path exists, ENOENT if the parent is missing
   */
  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  /**
   * Remove a file, symlink or directory. A symlink is removed itself, never
   * its target.
   * @throws FsError ENOENT if missing (unless `force`), ENOTEMPTY for a
   *   non-empty directory without `recursive`
   */
  rm(path: string, options?: RmOptions): Promise<void>;

  /**
   * Read directory contents
   * @returns entry names sorted by code unit order
   */
  readdir(path: string): Promise<string[]>;

  /**
   * Read directory contents with file type information
   * @returns entries sorted by name
   */
  readdirWithFileTypes(path: string): Promise<DirentEntry[]>;

  /**
   * Change file/directory permission bits
   */
  chmod(path: string, mode: number): Promise<void>;

  /**
   * Create a symbolic link whose target is stored verbatim
   * @throws FsError EEXIST if linkPath already exists
   */
  symlink(target: string, linkPath: string): Promise<void>;

  /**
   * Read the target of a symbolic link
   * @throws FsError ENOENT if missing, EINVAL if not a symlink
   */
  readlink(path: string): Promise<string>;

  /**
   * Set access and modification times
   */
  utimes(path: string, atime: Date, mtime: Date): Promise<void>;

  /**
   * Set times on a symlink itself (optional)
   */
  lutimes?(path: string, atime: Date, mtime: Date): Promise<void>;

  /**
   * Create a new file for writing, failing if anything exists at `path`.
   * @throws FsError EEXIST on collision
   */
  openExclusive(path: string): Promise<WriteHandle>;
}
