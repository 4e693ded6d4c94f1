/**
 * Text extraction for regular files.
 *
 * Classifies a file from its first bytes (empty, binary, text) and reads the
 * text with the first encoding that decodes the sample. Every failure is
 * reported as a placeholder string, never thrown.
 *
 * @module ingestion/file-content
 */

import { open } from "node:fs/promises";

/**
 * Bytes read to classify a file
 */
export const SAMPLE_CHUNK_BYTES = 1024;

/**
 * Chunk size for full reads
 */
export const READ_CHUNK_BYTES = 1024 * 1024;

/**
 * Files larger than this are reduced to a preview
 */
export const LARGE_FILE_THRESHOLD_BYTES = 10 * 1024 * 1024;

/**
 * Bytes kept from a large file
 */
export const PREVIEW_BYTES = 100 * 1024;

/**
 * Encodings probed in order against the sample chunk
 */
export const PREFERRED_ENCODINGS = ["utf-8", "utf-16le", "latin1"] as const;

export type PreferredEncoding = (typeof PREFERRED_ENCODINGS)[number];

/**
 * Placeholder contents
 */
export const CONTENT_PLACEHOLDERS = {
  EMPTY: "[Empty file]",
  BINARY: "[Binary file]",
  READ_ERROR: "Error reading file",
  UNDECODABLE: "Error: Unable to decode file with available encodings",
} as const;

/**
 * Read up to `length` bytes from the start of a file.
 *
 * @returns The bytes read, or null when the file cannot be opened or read
 */
export async function readChunk(
  path: string,
  length: number = SAMPLE_CHUNK_BYTES
): Promise<Uint8Array | null> {
  try {
    const handle = await open(path, "r");
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, 0);
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  } catch {
    return null;
  }
}

/**
 * Check whether a byte sample decodes under an encoding.
 *
 * A multi-byte sequence cut off at the end of the sample is not a failure.
 */
export function decodes(bytes: Uint8Array, encoding: PreferredEncoding): boolean {
  try {
    new TextDecoder(encoding, { fatal: true }).decode(bytes, { stream: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Decode a file incrementally, stopping after `limit` bytes when given.
 */
async function decodeFile(
  path: string,
  encoding: PreferredEncoding,
  limit?: number
): Promise<string> {
  const decoder = new TextDecoder(encoding, { fatal: true });
  const handle = await open(path, "r");
  const parts: string[] = [];

  try {
    const buffer = Buffer.alloc(READ_CHUNK_BYTES);
    let position = 0;

    for (;;) {
      const remaining = limit === undefined ? READ_CHUNK_BYTES : limit - position;
      if (remaining <= 0) break;

      const { bytesRead } = await handle.read(
        buffer,
        0,
        Math.min(READ_CHUNK_BYTES, remaining),
        position
      );
      if (bytesRead === 0) break;

      parts.push(decoder.decode(buffer.subarray(0, bytesRead), { stream: true }));
      position += bytesRead;
    }

    // A preview may end inside a multi-byte sequence; only a full read is flushed
    if (limit === undefined) {
      parts.push(decoder.decode());
    }
  } finally {
    await handle.close();
  }

  return parts.join("");
}

/**
 * Resolve the text content of a regular file.
 *
 * @param path - Absolute path of the file
 * @param size - File size in bytes as recorded at traversal time
 * @returns File text, a placeholder, or an error description
 */
export async function readTextContent(path: string, size: number): Promise<string> {
  const chunk = await readChunk(path);

  if (chunk === null) {
    return CONTENT_PLACEHOLDERS.READ_ERROR;
  }

  if (chunk.length === 0) {
    return CONTENT_PLACEHOLDERS.EMPTY;
  }

  if (!decodes(chunk, "utf-8")) {
    return CONTENT_PLACEHOLDERS.BINARY;
  }

  const encoding = PREFERRED_ENCODINGS.find((enc) => decodes(chunk, enc));
  if (encoding === undefined) {
    return CONTENT_PLACEHOLDERS.UNDECODABLE;
  }

  try {
    if (size > LARGE_FILE_THRESHOLD_BYTES) {
      const preview = await decodeFile(path, encoding, PREVIEW_BYTES);
      const totalMb = (size / (1024 * 1024)).toFixed(1);
      return `${preview}\n\n[... File truncated (total size: ${totalMb} MB) ...]`;
    }

    return await decodeFile(path, encoding);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return `Error reading file with '${encoding}': ${message}`;
  }
}
