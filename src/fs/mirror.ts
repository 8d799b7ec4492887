/**
 * One-shot recursive copy of a source tree into a destination directory,
 * possibly across different stores (disk → memory is the usual case).
 */

import type { IFileSystem } from "./interface.js";
import { joinPath, normalizePath } from "./real-fs-utils.js";

export interface MirrorResult {
  files: number;
  directories: number;
  symlinks: number;
  bytes: number;
}

export interface MirrorOptions {
  /**
   * Copy permission bits and modification times as well as content.
   * Default: true
   */
  preserveMetadata?: boolean;
}

/**
 * Copy every file, directory and symlink below `srcDir` in `src` into
 * `dstDir` in `dst`. `dstDir` must already exist. File bytes and symlink
 * targets are copied verbatim; symlinks are never followed. The source is
 * only read.
 */
export async function mirror(
  src: IFileSystem,
  srcDir: string,
  dst: IFileSystem,
  dstDir: string,
  options: MirrorOptions = {},
): Promise<MirrorResult> {
  const result: MirrorResult = {
    files: 0,
    directories: 0,
    symlinks: 0,
    bytes: 0,
  };
  await copyDir(
    src,
    normalizePath(srcDir),
    dst,
    normalizePath(dstDir),
    options.preserveMetadata ?? true,
    result,
  );
  return result;
}

async function copyDir(
  src: IFileSystem,
  srcDir: string,
  dst: IFileSystem,
  dstDir: string,
  preserveMetadata: boolean,
  result: MirrorResult,
): Promise<void> {
  for (const entry of await src.readdirWithFileTypes(srcDir)) {
    const from = joinPath(srcDir, entry.name);
    const to = joinPath(dstDir, entry.name);

    if (entry.isSymbolicLink) {
      await dst.symlink(await src.readlink(from), to);
      result.symlinks++;
    } else if (entry.isDirectory) {
      await dst.mkdir(to);
      await copyDir(src, from, dst, to, preserveMetadata, result);
      result.directories++;
    } else if (entry.isFile) {
      const content = await src.readFileBuffer(from);
      await dst.writeFile(to, content);
      result.files++;
      result.bytes += content.length;
    } else {
      // sockets, fifos and devices have no portable copy
      continue;
    }

    if (!preserveMetadata) continue;

    // Directory metadata is applied after its children are copied, so the
    // copy itself doesn't bump the mtime.
    if (entry.isSymbolicLink) {
      if (dst.lutimes) {
        const stat = await src.lstat(from);
        await dst.lutimes(to, stat.mtime, stat.mtime);
      }
    } else {
      const stat = await src.stat(from);
      await dst.chmod(to, stat.mode);
      await dst.utimes(to, stat.mtime, stat.mtime);
    }
  }
}
