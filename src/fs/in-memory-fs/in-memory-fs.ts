import { concatBuffers, type FileContent, toBuffer } from "../encoding.js";
import { fsError } from "../errors.js";
import {
  type DirectoryEntry,
  type DirentEntry,
  type FileEntry,
  type FsEntry,
  type FsStat,
  type IFileSystem,
  type MkdirOptions,
  type RmOptions,
  S_IFDIR,
  S_IFLNK,
  S_IFREG,
  type SymlinkEntry,
  type WriteHandle,
} from "../interface.js";
import {
  dirname,
  joinPath,
  normalizePath,
  validatePath,
} from "../real-fs-utils.js";

export type { DirectoryEntry, FileEntry, FsEntry, SymlinkEntry };

/**
 * Extended file initialization options with optional metadata
 */
export interface FileInit {
  content: FileContent;
  mode?: number;
  mtime?: Date;
}

/**
 * Initial files can be simple content or extended options with metadata
 */
export type InitialFiles = Record<string, FileContent | FileInit>;

const MAX_SYMLINK_HOPS = 40;

function isFileInit(value: FileContent | FileInit): value is FileInit {
  return (
    typeof value === "object" &&
    value !== null &&
    !(value instanceof Uint8Array) &&
    "content" in value
  );
}

function typeBits(entry: FsEntry): number {
  switch (entry.type) {
    case "file":
      return S_IFREG;
    case "directory":
      return S_IFDIR;
    case "symlink":
      return S_IFLNK;
  }
}

const textEncoder = new TextEncoder();

/**
 * Ephemeral store held entirely in a Map. Every check-then-set runs without
 * an intervening await, so exclusive operations are atomic with respect to
 * other callers on the event loop.
 */
export class InMemoryFs implements IFileSystem {
  private data: Map<string, FsEntry> = new Map();

  constructor(initialFiles?: InitialFiles) {
    this.data.set("/", { type: "directory", mode: 0o755, mtime: new Date() });

    if (initialFiles) {
      for (const [path, value] of Object.entries(initialFiles)) {
        if (isFileInit(value)) {
          this.writeFileSync(path, value.content, {
            mode: value.mode,
            mtime: value.mtime,
          });
        } else {
          this.writeFileSync(path, value);
        }
      }
    }
  }

  private ensureParentDirs(path: string): void {
    const dir = dirname(path);
    if (dir === "/") return;

    const existing = this.data.get(dir);
    if (!existing) {
      this.ensureParentDirs(dir);
      this.data.set(dir, { type: "directory", mode: 0o755, mtime: new Date() });
    } else if (existing.type !== "directory") {
      throw fsError("ENOTDIR", "open", dir);
    }
  }

  writeFileSync(
    path: string,
    content: FileContent,
    metadata?: { mode?: number; mtime?: Date },
  ): void {
    validatePath(path, "write");
    const normalized = normalizePath(path);
    const existing = this.data.get(normalized);
    if (existing?.type === "directory") {
      throw fsError("EISDIR", "write", path);
    }
    this.ensureParentDirs(normalized);

    this.data.set(normalized, {
      type: "file",
      // copied so the caller's buffer is never shared with the store
      content: new Uint8Array(toBuffer(content)),
      mode: metadata?.mode ?? existing?.mode ?? 0o644,
      mtime: metadata?.mtime ?? new Date(),
    });
  }

  async readFileBuffer(path: string): Promise<Uint8Array> {
    validatePath(path, "open");
    const resolvedPath = this.resolvePathWithSymlinks(path, "open");
    const entry = this.data.get(resolvedPath);

    if (!entry) {
      throw fsError("ENOENT", "open", path);
    }
    if (entry.type !== "file") {
      throw fsError("EISDIR", "read", path);
    }
    return new Uint8Array(entry.content);
  }

  async writeFile(path: string, content: FileContent): Promise<void> {
    this.writeFileSync(path, content);
  }

  async exists(path: string): Promise<boolean> {
    if (path.includes("\0")) {
      return false;
    }
    try {
      return this.data.has(this.resolvePathWithSymlinks(path, "access"));
    } catch {
      // Broken or looping symlink in the path
      return false;
    }
  }

  async stat(path: string): Promise<FsStat> {
    validatePath(path, "stat");
    const resolvedPath = this.resolvePathWithSymlinks(path, "stat");
    const entry = this.data.get(resolvedPath);

    if (!entry) {
      throw fsError("ENOENT", "stat", path);
    }
    return this.toStat(resolvedPath, entry);
  }

  async lstat(path: string): Promise<FsStat> {
    validatePath(path, "lstat");
    const resolvedPath = this.resolveIntermediateSymlinks(path);
    const entry = this.data.get(resolvedPath);

    if (!entry) {
      throw fsError("ENOENT", "lstat", path);
    }
    return this.toStat(resolvedPath, entry);
  }

  private toStat(path: string, entry: FsEntry): FsStat {
    let size = 0;
    if (entry.type === "file") {
      size = entry.content.length;
    } else if (entry.type === "symlink") {
      size = textEncoder.encode(entry.target).length;
    }

    return {
      isFile: entry.type === "file",
      isDirectory: entry.type === "directory",
      isSymbolicLink: entry.type === "symlink",
      mode: typeBits(entry) | (entry.mode & 0o7777),
      nlink: entry.type === "directory" ? 2 + this.countSubdirs(path) : 1,
      size,
      mtime: entry.mtime,
    };
  }

  private countSubdirs(dir: string): number {
    let count = 0;
    for (const [p, entry] of this.data.entries()) {
      if (entry.type === "directory" && p !== "/" && dirname(p) === dir) {
        count++;
      }
    }
    return count;
  }

  private resolveSymlink(symlinkPath: string, target: string): string {
    if (target.startsWith("/")) {
      return normalizePath(target);
    }
    const dir = dirname(symlinkPath);
    return normalizePath(joinPath(dir, target));
  }

  /**
   * Follow symlinks at `path` until a non-link (or nothing) is reached.
   */
  private followLinks(
    path: string,
    syscall: string,
    original: string,
  ): string {
    let resolved = path;
    let entry = this.data.get(resolved);
    let hops = 0;
    while (entry && entry.type === "symlink") {
      if (++hops > MAX_SYMLINK_HOPS) {
        throw fsError("ELOOP", syscall, original);
      }
      resolved = this.resolveSymlink(resolved, entry.target);
      entry = this.data.get(resolved);
    }
    return resolved;
  }

  /**
   * Resolve symlinks in intermediate path components only (not the final
   * component). Used by lstat and readlink.
   */
  private resolveIntermediateSymlinks(path: string): string {
    const normalized = normalizePath(path);
    if (normalized === "/") return "/";

    const parts = normalized.slice(1).split("/");
    let resolvedPath = "";
    for (let i = 0; i < parts.length - 1; i++) {
      resolvedPath = this.followLinks(
        joinPath(resolvedPath || "/", parts[i]),
        "lstat",
        path,
      );
    }
    return joinPath(resolvedPath || "/", parts[parts.length - 1]);
  }

  /**
   * Resolve all symlinks in a path, including intermediate components.
   */
  private resolvePathWithSymlinks(path: string, syscall: string): string {
    const normalized = normalizePath(path);
    if (normalized === "/") return "/";

    let resolvedPath = "/";
    for (const part of normalized.slice(1).split("/")) {
      resolvedPath = this.followLinks(
        joinPath(resolvedPath, part),
        syscall,
        path,
      );
    }
    return resolvedPath;
  }

  async mkdir(path: string, options?: MkdirOptions): Promise<void> {
    this.mkdirSync(path, options);
  }

  mkdirSync(path: string, options?: MkdirOptions): void {
    validatePath(path, "mkdir");
    const normalized = normalizePath(path);
    const existing = this.data.get(normalized);

    if (existing) {
      if (existing.type !== "directory" || !options?.recursive) {
        throw fsError("EEXIST", "mkdir", path);
      }
      return;
    }

    const parent = dirname(normalized);
    const parentEntry = this.data.get(parent);
    if (!parentEntry) {
      if (!options?.recursive) {
        throw fsError("ENOENT", "mkdir", path);
      }
      this.mkdirSync(parent, { recursive: true });
    } else if (parentEntry.type !== "directory") {
      throw fsError("ENOTDIR", "mkdir", path);
    }

    this.data.set(normalized, {
      type: "directory",
      mode: 0o755,
      mtime: new Date(),
    });
  }

  async rm(path: string, options?: RmOptions): Promise<void> {
    validatePath(path, "rm");
    const normalized = this.resolveIntermediateSymlinks(path);
    const entry = this.data.get(normalized);

    if (!entry) {
      if (options?.force) return;
      throw fsError("ENOENT", "rm", path);
    }
    if (normalized === "/") {
      throw fsError("EPERM", "rm", path);
    }

    if (entry.type === "directory") {
      const prefix = `${normalized}/`;
      const descendants = [...this.data.keys()].filter((p) =>
        p.startsWith(prefix),
      );
      if (descendants.length > 0 && !options?.recursive) {
        throw fsError("ENOTEMPTY", "rm", path);
      }
      for (const descendant of descendants) {
        this.data.delete(descendant);
      }
    }

    this.data.delete(normalized);
  }

  async readdir(path: string): Promise<string[]> {
    const entries = await this.readdirWithFileTypes(path);
    return entries.map((e) => e.name);
  }

  async readdirWithFileTypes(path: string): Promise<DirentEntry[]> {
    validatePath(path, "scandir");
    const normalized = this.resolvePathWithSymlinks(path, "scandir");
    const entry = this.data.get(normalized);

    if (!entry) {
      throw fsError("ENOENT", "scandir", path);
    }
    if (entry.type !== "directory") {
      throw fsError("ENOTDIR", "scandir", path);
    }

    const entries: DirentEntry[] = [];
    for (const [p, fsEntry] of this.data.entries()) {
      if (p === "/" || dirname(p) !== normalized) continue;
      entries.push({
        name: p.slice(p.lastIndexOf("/") + 1),
        isFile: fsEntry.type === "file",
        isDirectory: fsEntry.type === "directory",
        isSymbolicLink: fsEntry.type === "symlink",
      });
    }

    return entries.sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
  }

  async chmod(path: string, mode: number): Promise<void> {
    validatePath(path, "chmod");
    const resolved = this.resolvePathWithSymlinks(path, "chmod");
    const entry = this.data.get(resolved);

    if (!entry) {
      throw fsError("ENOENT", "chmod", path);
    }
    entry.mode = mode & 0o7777;
  }

  async symlink(target: string, linkPath: string): Promise<void> {
    validatePath(linkPath, "symlink");
    const normalized = normalizePath(linkPath);

    if (this.data.has(normalized)) {
      throw fsError("EEXIST", "symlink", linkPath);
    }

    this.ensureParentDirs(normalized);
    this.data.set(normalized, {
      type: "symlink",
      target,
      mode: 0o777,
      mtime: new Date(),
    });
  }

  async readlink(path: string): Promise<string> {
    validatePath(path, "readlink");
    const entry = this.data.get(this.resolveIntermediateSymlinks(path));

    if (!entry) {
      throw fsError("ENOENT", "readlink", path);
    }
    if (entry.type !== "symlink") {
      throw fsError("EINVAL", "readlink", path);
    }
    return entry.target;
  }

  /**
   * @param _atime - Access time (not tracked)
   */
  async utimes(path: string, _atime: Date, mtime: Date): Promise<void> {
    validatePath(path, "utimes");
    const resolved = this.resolvePathWithSymlinks(path, "utimes");
    const entry = this.data.get(resolved);

    if (!entry) {
      throw fsError("ENOENT", "utimes", path);
    }
    entry.mtime = mtime;
  }

  async lutimes(path: string, _atime: Date, mtime: Date): Promise<void> {
    validatePath(path, "utimes");
    const entry = this.data.get(this.resolveIntermediateSymlinks(path));

    if (!entry) {
      throw fsError("ENOENT", "utimes", path);
    }
    entry.mtime = mtime;
  }

  async openExclusive(path: string): Promise<WriteHandle> {
    validatePath(path, "open");
    const normalized = normalizePath(path);

    if (this.data.has(normalized)) {
      throw fsError("EEXIST", "open", path);
    }
    const parent = this.data.get(dirname(normalized));
    if (!parent) {
      throw fsError("ENOENT", "open", path);
    }
    if (parent.type !== "directory") {
      throw fsError("ENOTDIR", "open", path);
    }

    const entry: FileEntry = {
      type: "file",
      content: new Uint8Array(0),
      mode: 0o644,
      mtime: new Date(),
    };
    this.data.set(normalized, entry);

    let closed = false;
    return {
      write: async (data: Uint8Array): Promise<number> => {
        if (closed) {
          throw fsError("EBADF", "write", path);
        }
        // stored content never aliases the caller's buffer
        entry.content = concatBuffers(entry.content, data);
        entry.mtime = new Date();
        return data.length;
      },
      flush: async (): Promise<void> => {
        if (closed) {
          throw fsError("EBADF", "fsync", path);
        }
      },
      close: async (): Promise<void> => {
        closed = true;
      },
    };
  }
}
