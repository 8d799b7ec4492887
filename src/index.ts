export type { JailFsConfig, JailFsConfigInput } from "./config.js";
export {
  jailFsConfigSchema,
  parseConfig,
  requireSetting,
} from "./config.js";
export type { FileContent } from "./fs/encoding.js";
export type { FsErrorCode } from "./fs/errors.js";
export {
  AlreadyExistsError,
  FsError,
  fsError,
  isFsError,
  NotADirectoryError,
  NotASymlinkError,
  NotFoundError,
  NotImplementedError,
} from "./fs/errors.js";
export type {
  FileInit,
  InitialFiles,
} from "./fs/in-memory-fs/in-memory-fs.js";
export { InMemoryFs } from "./fs/in-memory-fs/in-memory-fs.js";
export type {
  DirentEntry,
  FsStat,
  IFileSystem,
  MkdirOptions,
  RmOptions,
  WriteHandle,
} from "./fs/interface.js";
export {
  S_IFBLK,
  S_IFCHR,
  S_IFDIR,
  S_IFIFO,
  S_IFLNK,
  S_IFMT,
  S_IFREG,
  S_IFSOCK,
} from "./fs/interface.js";
export type { MirrorOptions, MirrorResult } from "./fs/mirror.js";
export { mirror } from "./fs/mirror.js";
export {
  ReadWriteFs,
  type ReadWriteFsOptions,
} from "./fs/read-write-fs/read-write-fs.js";
export {
  createErrorSanitizer,
  type HostRoots,
} from "./fs/sanitize-error.js";
export type { JailOperation } from "./jail/commands.js";
export { COMMAND_ALIASES, resolveCommand } from "./jail/commands.js";
export { JailRoot, type JailRootOptions } from "./jail/jail-root.js";
export { isCanonicalJailPath, resolveJailPath } from "./jail/path.js";
export {
  ProtocolJail,
  type ProtocolJailOptions,
} from "./jail/protocol-jail.js";
export type {
  FormatListOptions,
  ListingSource,
} from "./listing/format-list.js";
export {
  formatList,
  formatListLine,
  formatListTime,
  formatMode,
} from "./listing/format-list.js";
export {
  configuredRoots,
  createJailRoot,
  openJail,
  openUploadStore,
} from "./setup.js";
export type { JailLogger, JailStat } from "./types.js";
export { sanitizeFileName } from "./upload/sanitize.js";
export {
  type CaptureOptions,
  captureUpload,
  type UploadRecord,
  UploadWriter,
  type UploadWriterOptions,
  withUploadWriter,
} from "./upload/upload-writer.js";
