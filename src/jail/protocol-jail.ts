import { fsError, isFsError } from "../fs/errors.js";
import type { FsStat, IFileSystem } from "../fs/interface.js";
import { type MirrorResult, mirror } from "../fs/mirror.js";
import { ReadWriteFs } from "../fs/read-write-fs/read-write-fs.js";
import {
  type FormatListOptions,
  formatList,
  type ListingSource,
} from "../listing/format-list.js";
import type { JailLogger, JailStat } from "../types.js";
import { isValidProtocolName, resolveJailPath, toStorePath } from "./path.js";

const MAX_LINK_HOPS = 40;

function segmentsOf(jailPath: string): string[] {
  return jailPath.split("/").filter((segment) => segment !== "");
}

export interface ProtocolJailOptions {
  logger?: JailLogger;
  /**
   * Largest source file mirrored when `source` is a directory path.
   * 0 (default) means unlimited.
   */
  maxMirrorFileSize?: number;
}

/**
 * A chroot-style view onto one protocol's subtree of the jail root.
 *
 * Three paths are in play:
 * - root: `/` of the shared store
 * - home: `/<protocol>` in that store, which the client sees as `/`
 * - cwd: home-relative, always at or below home
 *
 * Every client-supplied path is canonicalized with `resolveJailPath` before
 * it reaches the store; nothing is built by string concatenation alone.
 * Symlinks are resolved here, against home, never by the store: an absolute
 * target starts at home and a target that climbs above home is rejected.
 * One instance belongs to one session and is not shared between them.
 */
export class ProtocolJail implements ListingSource {
  readonly protocol: string;
  private readonly store: IFileSystem;
  private readonly logger?: JailLogger;
  private readonly homePath: string;
  private cwdPath = "/";

  private constructor(
    store: IFileSystem,
    protocol: string,
    logger?: JailLogger,
  ) {
    this.store = store;
    this.protocol = protocol;
    this.logger = logger;
    this.homePath = `/${protocol}`;
  }

  /**
   * Exclusively create `/<protocolName>` in `store` and mirror `source`
   * into it. Fails with AlreadyExistsError if the subtree exists, so two
   * sessions never share one jail by accident. If mirroring fails the
   * partial subtree is removed again before the error is rethrown.
   *
   * @param source - a host directory path, or any store (mirrored from `/`)
   */
  static async create(
    store: IFileSystem,
    protocolName: string,
    source: string | IFileSystem,
    options: ProtocolJailOptions = {},
  ): Promise<ProtocolJail> {
    if (!isValidProtocolName(protocolName)) {
      throw fsError("EINVAL", "mkdir", protocolName);
    }
    const jail = new ProtocolJail(store, protocolName, options.logger);
    const sourceFs =
      typeof source === "string"
        ? new ReadWriteFs({
            root: source,
            allowSymlinks: true,
            maxFileReadSize: options.maxMirrorFileSize ?? 0,
          })
        : source;

    await store.mkdir(jail.homePath);
    let result: MirrorResult;
    try {
      result = await mirror(sourceFs, "/", store, jail.homePath);
    } catch (e) {
      try {
        await store.rm(jail.homePath, { recursive: true, force: true });
      } catch (cleanupError) {
        throw new AggregateError(
          [e, cleanupError],
          `mirroring into ${jail.homePath} failed and cleanup failed`,
        );
      }
      throw e;
    }
    options.logger?.debug("mirrored source tree", {
      protocol: protocolName,
      ...result,
    });
    return jail;
  }

  /** The shared root as seen from outside the jail. */
  get root(): string {
    return "/";
  }

  /** Store path of the jail's home directory. */
  get home(): string {
    return this.homePath;
  }

  get cwd(): string {
    return this.cwdPath;
  }

  getcwd(): string {
    return this.cwdPath;
  }

  /**
   * Map a client path (relative to cwd, or absolute from home) to its store
   * path, or `null` if it points outside the jail. Purely lexical.
   */
  toStorePath(path: string): string | null {
    const resolved = resolveJailPath(this.cwdPath, path);
    return resolved === null ? null : toStorePath(this.homePath, resolved);
  }

  /**
   * Change the working directory, following symlinks inside the jail. The
   * new cwd is the resolved directory, not the path as typed. Escapes above
   * home, missing entries and non-directories fail with ENOTDIR.
   */
  async chdir(path: string): Promise<void> {
    if (path === "") {
      throw fsError("ENOTDIR", "chdir", path);
    }

    let target: string;
    try {
      target = await this.onStore(
        path,
        "chdir",
        true,
        async (storePath, jailPath) => {
          const stat = await this.store.lstat(storePath);
          if (!stat.isDirectory) {
            throw fsError("ENOTDIR", "chdir", storePath);
          }
          return jailPath;
        },
      );
    } catch (e) {
      if (isFsError(e, "ENOENT")) {
        throw fsError("ENOTDIR", "chdir", path);
      }
      throw e;
    }

    this.logger?.debug("chdir", { protocol: this.protocol, cwd: target });
    this.cwdPath = target;
  }

  /**
   * Stat without following a final symlink. Owner and group are always
   * the "owner"/"group" placeholders.
   */
  async stat(path: string): Promise<JailStat> {
    const stat = await this.onStore(path, "stat", false, (storePath) =>
      this.store.lstat(storePath),
    );
    return {
      mode: stat.mode,
      nlink: stat.nlink,
      size: stat.size,
      mtime: stat.mtime,
      owner: "owner",
      group: "group",
    };
  }

  /**
   * The stored link target, verbatim. Not resolved any further.
   */
  async readlink(path: string): Promise<string> {
    return this.onStore(path, "readlink", false, (storePath) =>
      this.store.readlink(storePath),
    );
  }

  /**
   * File content, following symlinks inside the jail.
   */
  async readFile(path: string): Promise<Uint8Array> {
    return this.onStore(path, "open", true, async (storePath) => {
      const stat = await this.store.lstat(storePath);
      if (stat.isDirectory) {
        throw fsError("EISDIR", "read", storePath);
      }
      return this.store.readFileBuffer(storePath);
    });
  }

  /**
   * Entry names of a directory, sorted by code unit order. A symlink to a
   * directory inside the jail is listed through.
   */
  async listdir(path = "."): Promise<string[]> {
    return this.onStore(path, "scandir", true, async (storePath) => {
      const stat = await this.store.lstat(storePath);
      if (!stat.isDirectory) {
        throw fsError("ENOTDIR", "scandir", storePath);
      }
      return this.store.readdir(storePath);
    });
  }

  /** True for any entry, including a dangling symlink. */
  async exists(path: string): Promise<boolean> {
    return this.isType(path, false, () => true);
  }

  async isdir(path: string): Promise<boolean> {
    return this.isType(path, true, (stat) => stat.isDirectory);
  }

  async isfile(path: string): Promise<boolean> {
    return this.isType(path, true, (stat) => stat.isFile);
  }

  /**
   * Create one directory. The parent must exist.
   */
  async mkdir(path: string): Promise<void> {
    const created = await this.onStore(
      path,
      "mkdir",
      false,
      async (storePath, jailPath) => {
        await this.store.mkdir(storePath);
        return jailPath;
      },
    );
    this.logger?.info("directory created", {
      protocol: this.protocol,
      path: created,
    });
  }

  /**
   * Remove a file or symlink. Directories fail with EISDIR.
   */
  async remove(path: string): Promise<void> {
    const removed = await this.onStore(
      path,
      "unlink",
      false,
      async (storePath, jailPath) => {
        const stat = await this.store.lstat(storePath);
        if (stat.isDirectory) {
          throw fsError("EISDIR", "unlink", storePath);
        }
        await this.store.rm(storePath);
        return jailPath;
      },
    );
    this.logger?.info("entry removed", {
      protocol: this.protocol,
      path: removed,
    });
  }

  /**
   * Remove an empty directory. Home itself cannot be removed.
   */
  async rmdir(path: string): Promise<void> {
    const removed = await this.onStore(
      path,
      "rmdir",
      false,
      async (storePath, jailPath) => {
        if (jailPath === "/") {
          throw fsError("EPERM", "rmdir", storePath);
        }
        const stat = await this.store.lstat(storePath);
        if (!stat.isDirectory) {
          throw fsError("ENOTDIR", "rmdir", storePath);
        }
        if ((await this.store.readdir(storePath)).length > 0) {
          throw fsError("ENOTEMPTY", "rmdir", storePath);
        }
        await this.store.rm(storePath, { recursive: true });
        return jailPath;
      },
    );
    this.logger?.info("directory removed", {
      protocol: this.protocol,
      path: removed,
    });
  }

  /**
   * Modification time in (fractional) seconds since the epoch.
   */
  async getmtime(path: string): Promise<number> {
    const stat = await this.stat(path);
    return stat.mtime.getTime() / 1000;
  }

  /**
   * Set the modification time (and access time) of an entry. On a symlink
   * this touches the link itself, never its target.
   */
  async utime(path: string, mtime: Date): Promise<void> {
    await this.onStore(path, "utimes", false, async (storePath) => {
      const stat = await this.store.lstat(storePath);
      if (!stat.isSymbolicLink) {
        await this.store.utimes(storePath, mtime, mtime);
      } else if (this.store.lutimes) {
        await this.store.lutimes(storePath, mtime, mtime);
      } else {
        throw fsError("EPERM", "utimes", storePath);
      }
    });
  }

  /**
   * Render `ls -lA` lines for `names` inside `basedir`.
   */
  formatList(
    basedir: string,
    names: Iterable<string>,
    options?: FormatListOptions,
  ): AsyncGenerator<string, void, undefined> {
    return formatList(this, basedir, names, options);
  }

  // Permissions are not emulated; these always throw ENOSYS.

  async chmod(path: string, _mode: number): Promise<never> {
    throw fsError("ENOSYS", "chmod", path);
  }

  async getPermissions(path: string): Promise<never> {
    throw fsError("ENOSYS", "getperm", path);
  }

  async setPermissions(path: string, _mode: number): Promise<never> {
    throw fsError("ENOSYS", "setperm", path);
  }

  /**
   * Canonicalize `path`, then walk it one component at a time, replacing
   * each symlink by its target resolved inside the jail. Every directory
   * component of the result is a real directory; so is the final one when
   * `followFinal` is set and it exists.
   * @returns the resolved jail path
   */
  private async resolveInJail(
    path: string,
    syscall: string,
    followFinal: boolean,
  ): Promise<string> {
    const resolved = resolveJailPath(this.cwdPath, path);
    if (resolved === null) {
      this.logEscape(path);
      throw fsError("ENOENT", syscall, path);
    }

    const pending = segmentsOf(resolved);
    let current = "/";
    let hops = 0;
    for (
      let segment = pending.shift();
      segment !== undefined;
      segment = pending.shift()
    ) {
      const candidate = current === "/" ? `/${segment}` : `${current}/${segment}`;
      const isFinal = pending.length === 0;
      if (isFinal && !followFinal) {
        return candidate;
      }

      const storePath = toStorePath(this.homePath, candidate);
      const stat = await this.store.lstat(storePath);
      if (stat.isSymbolicLink) {
        if (++hops > MAX_LINK_HOPS) {
          throw fsError("ELOOP", syscall, path);
        }
        const target = resolveJailPath(
          current,
          await this.store.readlink(storePath),
        );
        if (target === null) {
          this.logEscape(path);
          throw fsError("ENOENT", syscall, path);
        }
        pending.unshift(...segmentsOf(target));
        current = "/";
      } else if (isFinal) {
        return candidate;
      } else if (!stat.isDirectory) {
        throw fsError("ENOENT", syscall, path);
      } else {
        current = candidate;
      }
    }
    return current;
  }

  /**
   * Run a store operation on the resolved path, reporting failures against
   * the client's path so store paths never reach the client.
   */
  private async onStore<T>(
    path: string,
    syscall: string,
    followFinal: boolean,
    operation: (storePath: string, jailPath: string) => Promise<T>,
  ): Promise<T> {
    try {
      const jailPath = await this.resolveInJail(path, syscall, followFinal);
      return await operation(toStorePath(this.homePath, jailPath), jailPath);
    } catch (e) {
      if (isFsError(e)) {
        const reported =
          e.syscall === "lstat" || e.syscall === "readlink"
            ? syscall
            : e.syscall;
        throw fsError(e.code, reported, path);
      }
      throw e;
    }
  }

  private async isType(
    path: string,
    followFinal: boolean,
    predicate: (stat: FsStat) => boolean,
  ): Promise<boolean> {
    if (resolveJailPath(this.cwdPath, path) === null) return false;
    try {
      const stat = await this.onStore(path, "stat", followFinal, (storePath) =>
        this.store.lstat(storePath),
      );
      return predicate(stat);
    } catch (e) {
      if (
        isFsError(e, "ENOENT") ||
        isFsError(e, "ENOTDIR") ||
        isFsError(e, "ELOOP")
      ) {
        return false;
      }
      throw e;
    }
  }

  private logEscape(path: string): void {
    this.logger?.info("rejected path outside jail", {
      protocol: this.protocol,
      cwd: this.cwdPath,
      path,
    });
  }
}
