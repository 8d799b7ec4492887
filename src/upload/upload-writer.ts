import { fsError } from "../fs/errors.js";
import type { IFileSystem, WriteHandle } from "../fs/interface.js";
import { joinPath, normalizePath } from "../fs/real-fs-utils.js";
import type { JailLogger } from "../types.js";
import { sanitizeFileName } from "./sanitize.js";

export interface UploadWriterOptions {
  /** Directory in the store that receives uploads. Default: "/" */
  directory?: string;
}

export interface CaptureOptions extends UploadWriterOptions {
  logger?: JailLogger;
  /** Clock used for the stored name. Default: now */
  now?: Date;
}

/**
 * A captured upload once its writer is closed.
 */
export interface UploadRecord {
  name: string;
  size: number;
}

function isSingleSegment(name: string): boolean {
  return (
    name.length > 0 &&
    name !== "." &&
    name !== ".." &&
    !name.includes("/") &&
    !name.includes("\0")
  );
}

/**
 * Write-only, append-only capture of one upload into the persistent store.
 *
 * Created with exclusive-create semantics: an existing file is never
 * truncated or appended to. Prefer `withUploadWriter`, which guarantees the
 * writer is flushed and closed however the transfer ends.
 */
export class UploadWriter {
  readonly name: string;
  readonly path: string;
  private readonly handle: WriteHandle;
  private written = 0;
  private closed = false;

  private constructor(name: string, path: string, handle: WriteHandle) {
    this.name = name;
    this.path = path;
    this.handle = handle;
  }

  /**
   * @param sanitizedName - a single path segment, usually from sanitizeFileName
   * @throws AlreadyExistsError if the name is taken
   */
  static async open(
    store: IFileSystem,
    sanitizedName: string,
    options: UploadWriterOptions = {},
  ): Promise<UploadWriter> {
    if (!isSingleSegment(sanitizedName)) {
      throw fsError("EINVAL", "open", sanitizedName);
    }
    const directory = normalizePath(options.directory ?? "/");
    const path = joinPath(directory, sanitizedName);
    const handle = await store.openExclusive(path);
    return new UploadWriter(sanitizedName, path, handle);
  }

  get bytesWritten(): number {
    return this.written;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Append a chunk.
   * @returns number of bytes accepted
   */
  async writeChunk(data: Uint8Array): Promise<number> {
    if (this.closed) {
      throw fsError("EBADF", "write", this.path);
    }
    const accepted = await this.handle.write(data);
    this.written += accepted;
    return accepted;
  }

  /**
   * Flush and release the handle. Safe to call more than once; only the
   * first call does anything. A failed flush still closes the handle; if
   * both fail they are thrown together in an AggregateError.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    let flushError: unknown;
    let flushFailed = false;
    try {
      await this.handle.flush();
    } catch (e) {
      flushError = e;
      flushFailed = true;
    }
    try {
      await this.handle.close();
    } catch (closeError) {
      if (flushFailed) {
        throw new AggregateError(
          [flushError, closeError],
          `upload '${this.name}' could not be flushed or closed`,
        );
      }
      throw closeError;
    }
    if (flushFailed) {
      throw flushError;
    }
  }
}

/**
 * Open a writer, hand it to `fn`, and close it on every exit path.
 *
 * If `fn` fails and closing fails too, both errors are thrown together in
 * an AggregateError (the `fn` error first).
 */
export async function withUploadWriter<T>(
  store: IFileSystem,
  sanitizedName: string,
  fn: (writer: UploadWriter) => Promise<T>,
  options: UploadWriterOptions = {},
): Promise<T> {
  const writer = await UploadWriter.open(store, sanitizedName, options);

  let result: T;
  try {
    result = await fn(writer);
  } catch (e) {
    try {
      await writer.close();
    } catch (closeError) {
      throw new AggregateError(
        [e, closeError],
        `upload '${sanitizedName}' failed and could not be closed`,
      );
    }
    throw e;
  }

  await writer.close();
  return result;
}

/**
 * Store a complete upload: sanitize `originalName`, then stream `chunks`
 * into a new file in `store`.
 */
export async function captureUpload(
  store: IFileSystem,
  originalName: string,
  chunks: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
  options: CaptureOptions = {},
): Promise<UploadRecord> {
  const name = sanitizeFileName(originalName, options.now);
  options.logger?.debug("upload opened", { originalName, name });

  const size = await withUploadWriter(
    store,
    name,
    async (writer) => {
      for await (const chunk of chunks) {
        await writer.writeChunk(chunk);
      }
      return writer.bytesWritten;
    },
    { directory: options.directory },
  );

  options.logger?.info("upload stored", { name, size });
  return { name, size };
}
