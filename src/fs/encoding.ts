/**
 * Shared content helpers for filesystem implementations
 */

export type FileContent = string | Uint8Array;

const textEncoder = new TextEncoder();

/**
 * Convert content to bytes; strings are encoded as UTF-8.
 */
export function toBuffer(content: FileContent): Uint8Array {
  if (content instanceof Uint8Array) {
    return content;
  }
  return textEncoder.encode(content);
}

/**
 * Concatenate two byte arrays into a fresh one.
 */
export function concatBuffers(a: Uint8Array, b: Uint8Array): Uint8Array {
  const combined = new Uint8Array(a.length + b.length);
  combined.set(a);
  combined.set(b, a.length);
  return combined;
}
