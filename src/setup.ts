import {
  type JailFsConfig,
  type JailFsConfigInput,
  requireSetting,
} from "./config.js";
import type { IFileSystem } from "./fs/interface.js";
import { ReadWriteFs } from "./fs/read-write-fs/read-write-fs.js";
import type { HostRoots } from "./fs/sanitize-error.js";
import { JailRoot } from "./jail/jail-root.js";
import type { ProtocolJail } from "./jail/protocol-jail.js";
import type { JailLogger } from "./types.js";

/**
 * Jail root for a parsed configuration: on disk under `jailRootDir` when
 * set, in memory otherwise.
 */
export function createJailRoot(
  config: JailFsConfig,
  logger?: JailLogger,
): JailRoot {
  return new JailRoot({
    directory: config.jailRootDir,
    logger,
    maxMirrorFileSize: config.maxMirrorFileSize,
  });
}

/**
 * Create the configured protocol's jail, mirrored from `sourceDir`.
 */
export async function openJail(
  config: JailFsConfig,
  logger?: JailLogger,
): Promise<ProtocolJail> {
  const sourceDir = requireSetting(config, "sourceDir");
  return createJailRoot(config, logger).addProtocol(config.protocol, sourceDir);
}

/**
 * The persistent upload store rooted at `dataDir`, with `uploadDirectory`
 * created inside it.
 */
export async function openUploadStore(
  config: JailFsConfig,
): Promise<IFileSystem> {
  const store = new ReadWriteFs({ root: requireSetting(config, "dataDir") });
  await store.mkdir(config.uploadDirectory, { recursive: true });
  return store;
}

/**
 * Host directories named by a configuration, for error scrubbing. Takes the
 * raw input so messages from a failed parse can be scrubbed too.
 */
export function configuredRoots(
  config: Pick<JailFsConfigInput, "sourceDir" | "dataDir" | "jailRootDir">,
): HostRoots {
  return {
    source: config.sourceDir,
    data: config.dataDir,
    "jail-root": config.jailRootDir,
  };
}
