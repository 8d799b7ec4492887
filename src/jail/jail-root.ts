import type { IFileSystem } from "../fs/interface.js";
import { InMemoryFs } from "../fs/in-memory-fs/in-memory-fs.js";
import { ReadWriteFs } from "../fs/read-write-fs/read-write-fs.js";
import type { JailLogger } from "../types.js";
import { ProtocolJail } from "./protocol-jail.js";

export interface JailRootOptions {
  /**
   * Store backing the shared root. Takes precedence over `directory`.
   */
  store?: IFileSystem;
  /**
   * Host directory to hold the jails. When neither this nor `store` is set,
   * jails live in memory and vanish with the process.
   */
  directory?: string;
  logger?: JailLogger;
  /** Forwarded to every jail created from a host directory. */
  maxMirrorFileSize?: number;
}

/**
 * The shared virtual root: one store plus the protocol jails created in it.
 *
 * Jail creation goes through the store's exclusive mkdir, so two sessions
 * asking for the same protocol name cannot both succeed, and nothing here
 * checks the registry first. Not persisted; build a fresh one per run.
 */
export class JailRoot {
  readonly store: IFileSystem;
  private readonly logger?: JailLogger;
  private readonly maxMirrorFileSize?: number;
  private readonly jails = new Map<string, ProtocolJail>();

  constructor(options: JailRootOptions = {}) {
    this.store =
      options.store ??
      (options.directory !== undefined
        ? new ReadWriteFs({ root: options.directory, allowSymlinks: true })
        : new InMemoryFs());
    this.logger = options.logger;
    this.maxMirrorFileSize = options.maxMirrorFileSize;
  }

  /**
   * Create the jail for `protocolName`, seeded from `source`.
   * @throws AlreadyExistsError if that protocol already has a jail
   */
  async addProtocol(
    protocolName: string,
    source: string | IFileSystem,
  ): Promise<ProtocolJail> {
    const jail = await ProtocolJail.create(this.store, protocolName, source, {
      logger: this.logger,
      maxMirrorFileSize: this.maxMirrorFileSize,
    });
    this.jails.set(protocolName, jail);
    this.logger?.info("jail created", {
      protocol: protocolName,
      home: jail.home,
    });
    return jail;
  }

  get(protocolName: string): ProtocolJail | undefined {
    return this.jails.get(protocolName);
  }

  protocols(): string[] {
    return [...this.jails.keys()].sort();
  }
}
