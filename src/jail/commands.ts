/**
 * Protocol command names mapped onto the jail's operation set.
 *
 * Protocol adapters look a client verb up here and call the matching
 * ProtocolJail (or upload) operation; there is no fallback to arbitrary
 * methods.
 */

import { fsError } from "../fs/errors.js";

export type JailOperation =
  | "chdir"
  | "getcwd"
  | "listdir"
  | "formatList"
  | "stat"
  | "readlink"
  | "readFile"
  | "mkdir"
  | "remove"
  | "rmdir"
  | "getmtime"
  | "utime"
  | "chmod"
  | "upload";

export const COMMAND_ALIASES: Readonly<Record<string, JailOperation>> = {
  CWD: "chdir",
  XCWD: "chdir",
  CDUP: "chdir",
  XCUP: "chdir",
  PWD: "getcwd",
  XPWD: "getcwd",
  LIST: "formatList",
  NLST: "listdir",
  MLSD: "listdir",
  STAT: "stat",
  SIZE: "stat",
  MDTM: "getmtime",
  MFMT: "utime",
  "SITE CHMOD": "chmod",
  RETR: "readFile",
  MKD: "mkdir",
  XMKD: "mkdir",
  DELE: "remove",
  RMD: "rmdir",
  XRMD: "rmdir",
  STOR: "upload",
  STOU: "upload",
  APPE: "upload",
};

/**
 * Look up the jail operation for a protocol command (case-insensitive,
 * surrounding whitespace and repeated inner spaces ignored).
 * @throws NotImplementedError for unknown commands
 */
export function resolveCommand(command: string): JailOperation {
  const key = command.trim().replace(/\s+/g, " ").toUpperCase();
  if (Object.hasOwn(COMMAND_ALIASES, key)) {
    return COMMAND_ALIASES[key];
  }
  throw fsError("ENOSYS", "command", command);
}
