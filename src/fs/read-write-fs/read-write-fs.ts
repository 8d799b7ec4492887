/**
 * ReadWriteFs - Direct wrapper around the real filesystem
 *
 * All operations go directly to the underlying Node.js filesystem.
 * Paths are relative to the configured root directory.
 *
 * Used for mirror sources, the persistent upload store and an on-disk jail
 * root.
 *
 * Security: Symlinks are blocked by default (allowSymlinks: false).
 * All real-FS access goes through resolveAndValidate() / validateParent()
 * gates which detect symlink traversal via path comparison. When symlinks
 * are allowed they are created and read back verbatim, but only followed
 * while the resolved location stays within root.
 * New methods must use these gates; never access the real FS directly.
 */

import * as fs from "node:fs";
import * as nodePath from "node:path";
import { type FileContent, toBuffer } from "../encoding.js";
import { FsError, type FsErrorCode, fsError } from "../errors.js";
import type {
  DirentEntry,
  FsStat,
  IFileSystem,
  MkdirOptions,
  RmOptions,
  WriteHandle,
} from "../interface.js";
import {
  errnoCode,
  normalizePath,
  resolveCanonicalPath,
  resolveCanonicalPathNoSymlinks,
  validatePath,
  validateRootDirectory,
} from "../real-fs-utils.js";

export interface ReadWriteFsOptions {
  /**
   * The root directory on the real filesystem.
   * All paths are relative to this root.
   */
  root: string;

  /**
   * Maximum file size in bytes that can be read.
   * Files larger than this will throw an EFBIG error.
   * Defaults to 10MB (10485760). 0 disables the check.
   */
  maxFileReadSize?: number;

  /**
   * Whether to allow following and creating symlinks.
   * When false (default), any path traversing a symlink is rejected
   * and symlink() throws EPERM.
   */
  allowSymlinks?: boolean;
}

const PASSTHROUGH_CODES: readonly FsErrorCode[] = [
  "EACCES",
  "EBADF",
  "EEXIST",
  "EFBIG",
  "EINVAL",
  "EISDIR",
  "ELOOP",
  "ENOENT",
  "ENOTDIR",
  "ENOTEMPTY",
  "EPERM",
];

function isPassthroughCode(code: string | undefined): code is FsErrorCode {
  return PASSTHROUGH_CODES.some((known) => known === code);
}

function toFsStat(stat: fs.Stats): FsStat {
  return {
    isFile: stat.isFile(),
    isDirectory: stat.isDirectory(),
    isSymbolicLink: stat.isSymbolicLink(),
    mode: stat.mode,
    nlink: stat.nlink,
    size: stat.size,
    mtime: stat.mtime,
  };
}

export class ReadWriteFs implements IFileSystem {
  private readonly root: string;
  private readonly canonicalRoot: string;
  private readonly maxFileReadSize: number;
  private readonly allowSymlinks: boolean;

  constructor(options: ReadWriteFsOptions) {
    this.root = nodePath.resolve(options.root);
    this.maxFileReadSize = options.maxFileReadSize ?? 10485760;
    this.allowSymlinks = options.allowSymlinks ?? false;

    validateRootDirectory(this.root, "ReadWriteFs");

    // Resolves symlinks like /var -> /private/var on macOS
    this.canonicalRoot = fs.realpathSync(this.root);
  }

  /**
   * Validate that a resolved real path stays within the sandbox root and
   * return the canonical (symlink-resolved) path for subsequent I/O.
   * Throws EACCES if the path escapes the root.
   */
  private resolveAndValidate(
    realPath: string,
    virtualPath: string,
    syscall: string,
  ): string {
    const canonical = this.allowSymlinks
      ? resolveCanonicalPath(realPath, this.canonicalRoot)
      : resolveCanonicalPathNoSymlinks(realPath, this.root, this.canonicalRoot);
    if (canonical === null) {
      throw fsError("EACCES", syscall, virtualPath);
    }
    return canonical;
  }

  /**
   * Validate the parent directory of a path, for operations (lstat,
   * readlink, symlink) that must not follow the final component.
   */
  private validateParent(
    realPath: string,
    virtualPath: string,
    syscall: string,
  ): string {
    if (realPath === this.root) {
      return this.canonicalRoot;
    }
    const parent = nodePath.dirname(realPath);
    const canonicalParent = this.resolveAndValidate(
      parent,
      virtualPath,
      syscall,
    );
    return nodePath.join(canonicalParent, nodePath.basename(realPath));
  }

  private toRealPath(virtualPath: string): string {
    const normalized = normalizePath(virtualPath);
    return nodePath.resolve(nodePath.join(this.root, normalized));
  }

  /**
   * Re-throw a host error with only the virtual path in it. Node's
   * ErrnoException carries the real path in `.path` and in its message.
   */
  private sanitizeError(
    e: unknown,
    virtualPath: string,
    syscall: string,
  ): never {
    if (e instanceof FsError) {
      throw e;
    }
    const code = errnoCode(e);
    if (isPassthroughCode(code)) {
      throw fsError(code, syscall, virtualPath);
    }
    throw fsError("EIO", syscall, virtualPath);
  }

  async readFileBuffer(path: string): Promise<Uint8Array> {
    validatePath(path, "open");
    const canonical = this.resolveAndValidate(
      this.toRealPath(path),
      path,
      "open",
    );

    try {
      if (this.maxFileReadSize > 0) {
        // stat (not lstat): the limit applies to the link target's size
        const stat = await fs.promises.stat(canonical);
        if (stat.size > this.maxFileReadSize) {
          throw fsError("EFBIG", "read", path);
        }
      }
      const content = await fs.promises.readFile(canonical);
      return new Uint8Array(content);
    } catch (e) {
      this.sanitizeError(e, path, "open");
    }
  }

  async writeFile(path: string, content: FileContent): Promise<void> {
    validatePath(path, "write");
    const canonical = this.resolveAndValidate(
      this.toRealPath(path),
      path,
      "write",
    );

    try {
      await fs.promises.mkdir(nodePath.dirname(canonical), { recursive: true });
      await fs.promises.writeFile(canonical, toBuffer(content));
    } catch (e) {
      this.sanitizeError(e, path, "write");
    }
  }

  async exists(path: string): Promise<boolean> {
    if (path.includes("\0")) return false;
    try {
      const canonical = this.resolveAndValidate(
        this.toRealPath(path),
        path,
        "access",
      );
      await fs.promises.access(canonical);
      return true;
    } catch {
      return false;
    }
  }

  async stat(path: string): Promise<FsStat> {
    validatePath(path, "stat");
    const canonical = this.resolveAndValidate(
      this.toRealPath(path),
      path,
      "stat",
    );

    try {
      return toFsStat(await fs.promises.stat(canonical));
    } catch (e) {
      this.sanitizeError(e, path, "stat");
    }
  }

  async lstat(path: string): Promise<FsStat> {
    validatePath(path, "lstat");
    const canonical = this.validateParent(this.toRealPath(path), path, "lstat");

    try {
      return toFsStat(await fs.promises.lstat(canonical));
    } catch (e) {
      this.sanitizeError(e, path, "lstat");
    }
  }

  async mkdir(path: string, options?: MkdirOptions): Promise<void> {
    validatePath(path, "mkdir");
    const canonical = this.resolveAndValidate(
      this.toRealPath(path),
      path,
      "mkdir",
    );

    try {
      // Non-recursive mkdir(2) is the atomic exclusive-create primitive
      await fs.promises.mkdir(canonical, { recursive: options?.recursive });
    } catch (e) {
      this.sanitizeError(e, path, "mkdir");
    }
  }

  /**
   * Remove an entry. Only the parent is validated, so a symlink is removed
   * itself and its target is never touched.
   */
  async rm(path: string, options?: RmOptions): Promise<void> {
    validatePath(path, "rm");
    const realPath = this.toRealPath(path);
    if (realPath === this.root) {
      throw fsError("EPERM", "rm", path);
    }
    const canonical = this.validateParent(realPath, path, "rm");

    try {
      await fs.promises.rm(canonical, {
        recursive: options?.recursive ?? false,
        force: options?.force ?? false,
      });
    } catch (e) {
      this.sanitizeError(e, path, "rm");
    }
  }

  async readdir(path: string): Promise<string[]> {
    const entries = await this.readdirWithFileTypes(path);
    return entries.map((e) => e.name);
  }

  async readdirWithFileTypes(path: string): Promise<DirentEntry[]> {
    validatePath(path, "scandir");
    const canonical = this.resolveAndValidate(
      this.toRealPath(path),
      path,
      "scandir",
    );

    try {
      const entries = await fs.promises.readdir(canonical, {
        withFileTypes: true,
      });
      return entries
        .map((dirent) => ({
          name: dirent.name,
          isFile: dirent.isFile(),
          isDirectory: dirent.isDirectory(),
          isSymbolicLink: dirent.isSymbolicLink(),
        }))
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    } catch (e) {
      this.sanitizeError(e, path, "scandir");
    }
  }

  async chmod(path: string, mode: number): Promise<void> {
    validatePath(path, "chmod");
    const canonical = this.resolveAndValidate(
      this.toRealPath(path),
      path,
      "chmod",
    );

    try {
      await fs.promises.chmod(canonical, mode & 0o7777);
    } catch (e) {
      this.sanitizeError(e, path, "chmod");
    }
  }

  /**
   * Create a symlink holding `target` exactly as given. The target is data
   * here: reads through the link are still confined to root by the gates.
   */
  async symlink(target: string, linkPath: string): Promise<void> {
    if (!this.allowSymlinks) {
      throw fsError("EPERM", "symlink", linkPath);
    }
    validatePath(linkPath, "symlink");
    validatePath(target, "symlink");
    const canonicalLinkPath = this.validateParent(
      this.toRealPath(linkPath),
      linkPath,
      "symlink",
    );

    try {
      await fs.promises.symlink(target, canonicalLinkPath);
    } catch (e) {
      this.sanitizeError(e, linkPath, "symlink");
    }
  }

  async readlink(path: string): Promise<string> {
    validatePath(path, "readlink");
    const canonical = this.validateParent(
      this.toRealPath(path),
      path,
      "readlink",
    );

    try {
      return await fs.promises.readlink(canonical);
    } catch (e) {
      this.sanitizeError(e, path, "readlink");
    }
  }

  async utimes(path: string, atime: Date, mtime: Date): Promise<void> {
    validatePath(path, "utimes");
    const canonical = this.resolveAndValidate(
      this.toRealPath(path),
      path,
      "utimes",
    );

    try {
      await fs.promises.utimes(canonical, atime, mtime);
    } catch (e) {
      this.sanitizeError(e, path, "utimes");
    }
  }

  /**
   * Set the mtime of a symlink itself rather than its target.
   */
  async lutimes(path: string, atime: Date, mtime: Date): Promise<void> {
    validatePath(path, "utimes");
    const canonical = this.validateParent(
      this.toRealPath(path),
      path,
      "utimes",
    );

    try {
      await fs.promises.lutimes(canonical, atime, mtime);
    } catch (e) {
      this.sanitizeError(e, path, "utimes");
    }
  }

  async openExclusive(path: string): Promise<WriteHandle> {
    validatePath(path, "open");
    const canonical = this.resolveAndValidate(
      this.toRealPath(path),
      path,
      "open",
    );

    let handle: fs.promises.FileHandle;
    try {
      // "wx" = O_CREAT | O_EXCL | O_WRONLY
      handle = await fs.promises.open(canonical, "wx");
    } catch (e) {
      this.sanitizeError(e, path, "open");
    }

    let closed = false;
    return {
      write: async (data: Uint8Array): Promise<number> => {
        if (closed) {
          throw fsError("EBADF", "write", path);
        }
        try {
          let offset = 0;
          while (offset < data.length) {
            const { bytesWritten } = await handle.write(
              data,
              offset,
              data.length - offset,
            );
            offset += bytesWritten;
          }
          return offset;
        } catch (e) {
          this.sanitizeError(e, path, "write");
        }
      },
      flush: async (): Promise<void> => {
        if (closed) {
          throw fsError("EBADF", "fsync", path);
        }
        try {
          await handle.sync();
        } catch (e) {
          this.sanitizeError(e, path, "fsync");
        }
      },
      close: async (): Promise<void> => {
        if (closed) return;
        closed = true;
        try {
          await handle.close();
        } catch (e) {
          this.sanitizeError(e, path, "close");
        }
      },
    };
  }
}
