/**
 * `/bin/ls -lA` emulation for directory listings sent to protocol clients.
 *
 * Output follows the classic layout byte for byte:
 *
 *   -rw-r--r--   1 owner    group     7045120 Sep 02  2022 music.mp3
 *   drwxr-xr-x   2 owner    group        4096 Aug 31 18:50 e-books
 *   lrwxrwxrwx   1 owner    group           9 Aug 31 18:50 latest -> music.mp3
 *
 * Lines end in CRLF. Times are rendered in UTC.
 */

import { sprintf } from "sprintf-js";
import {
  S_IFBLK,
  S_IFCHR,
  S_IFDIR,
  S_IFIFO,
  S_IFLNK,
  S_IFMT,
  S_IFSOCK,
} from "../fs/interface.js";
import type { JailStat } from "../types.js";
import { MONTHS } from "./months.js";

const SIX_MONTHS_MS = 180 * 24 * 60 * 60 * 1000;

/**
 * What the formatter needs from a jail: lstat-like stat and readlink.
 */
export interface ListingSource {
  stat(path: string): Promise<JailStat>;
  readlink(path: string): Promise<string>;
}

export interface FormatListOptions {
  /** Reference time for the recent/old timestamp split. Default: now */
  now?: Date;
}

function typeChar(mode: number): string {
  switch (mode & S_IFMT) {
    case S_IFDIR:
      return "d";
    case S_IFLNK:
      return "l";
    case S_IFCHR:
      return "c";
    case S_IFBLK:
      return "b";
    case S_IFIFO:
      return "p";
    case S_IFSOCK:
      return "s";
    default:
      return "-";
  }
}

function execChar(
  mode: number,
  execBit: number,
  specialBit: number,
  special: string,
): string {
  if (mode & specialBit) {
    return mode & execBit ? special : special.toUpperCase();
  }
  return mode & execBit ? "x" : "-";
}

/**
 * Render mode bits as the 10-character `ls` permission string, including
 * setuid/setgid (`s`/`S`) and sticky (`t`/`T`) bits.
 */
export function formatMode(mode: number): string {
  return [
    typeChar(mode),
    mode & 0o400 ? "r" : "-",
    mode & 0o200 ? "w" : "-",
    execChar(mode, 0o100, 0o4000, "s"),
    mode & 0o040 ? "r" : "-",
    mode & 0o020 ? "w" : "-",
    execChar(mode, 0o010, 0o2000, "s"),
    mode & 0o004 ? "r" : "-",
    mode & 0o002 ? "w" : "-",
    execChar(mode, 0o001, 0o1000, "t"),
  ].join("");
}

/**
 * Format a modification time for `ls -l`: "Sep 02 03:47" for anything up
 * to 180 days old, "Sep 02  2022" beyond that.
 */
export function formatListTime(mtime: Date, now: Date): string {
  const month = MONTHS[mtime.getUTCMonth()];
  const day = String(mtime.getUTCDate()).padStart(2, "0");

  if (now.getTime() - mtime.getTime() > SIX_MONTHS_MS) {
    return `${month} ${day}  ${mtime.getUTCFullYear()}`;
  }
  const hours = String(mtime.getUTCHours()).padStart(2, "0");
  const mins = String(mtime.getUTCMinutes()).padStart(2, "0");
  return `${month} ${day} ${hours}:${mins}`;
}

/**
 * Render one listing line. `name` already carries any ` -> target` suffix.
 */
export function formatListLine(
  stat: JailStat,
  name: string,
  now: Date,
): string {
  return sprintf(
    "%s %3s %-8s %-8s %8s %s %s\r\n",
    formatMode(stat.mode),
    String(stat.nlink),
    stat.owner,
    stat.group,
    String(stat.size),
    formatListTime(stat.mtime, now),
    name,
  );
}

// An empty basedir is the cwd, as it is everywhere else.
function entryPath(basedir: string, name: string): string {
  if (basedir === "") return name;
  return basedir.endsWith("/") ? `${basedir}${name}` : `${basedir}/${name}`;
}

/**
 * Lazily yield one formatted line per name, in the order given. No entries
 * are filtered or sorted here. A failed stat or readlink rejects the
 * iteration at that entry.
 */
export async function* formatList(
  source: ListingSource,
  basedir: string,
  names: Iterable<string>,
  options: FormatListOptions = {},
): AsyncGenerator<string, void, undefined> {
  const now = options.now ?? new Date();

  for (const name of names) {
    const path = entryPath(basedir, name);
    const stat = await source.stat(path);
    let displayName = name;
    if ((stat.mode & S_IFMT) === S_IFLNK) {
      displayName = `${name} -> ${await source.readlink(path)}`;
    }
    yield formatListLine(stat, displayName, now);
  }
}
