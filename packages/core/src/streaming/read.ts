import { open, stat, type FileHandle } from "node:fs/promises";
import type { Logger } from "pino";
import { NotFoundError } from "../errors/catalog.js";
import { fromFsError } from "../errors/fs.js";
import { guessMimeType } from "../files/entry.js";
import type { PathResolver } from "../sandbox/resolver.js";
import { parseRangeHeader, rangeLength, type ByteRange } from "./range.js";

const CHUNK_SIZE = 64 * 1024;

export interface ReadHandle {
  relPath: string;
  name: string;
  contentType: string;
  /** Size of the whole file. */
  size: number;
  modifiedTime: number;
  /** Set when a single satisfiable range was requested. */
  range: ByteRange | null;
  /** Bytes the stream will produce. */
  length: number;
  stream: ReadableStream<Uint8Array>;
}

export interface OpenForReadOptions {
  /** Raw `Range` header value. */
  range?: string | null;
  logger?: Logger;
}

/**
 * Positional reads over an open handle, `length` bytes from `start`.
 * Each stream owns its handle, so concurrent readers of one file never
 * share a cursor. Cancelling the stream closes the handle.
 */
export function createFileStream(
  handle: FileHandle,
  start: number,
  length: number,
  logger?: Logger,
): ReadableStream<Uint8Array> {
  let position = start;
  let remaining = length;
  let closed = false;

  const close = async (): Promise<void> => {
    if (!closed) {
      closed = true;
      await handle.close();
    }
  };

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      if (remaining <= 0) {
        await close();
        controller.close();
        return;
      }
      const buffer = new Uint8Array(Math.min(CHUNK_SIZE, remaining));
      try {
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
        if (bytesRead === 0) {
          // File shrank under us; end early rather than pad.
          await close();
          controller.close();
          return;
        }
        position += bytesRead;
        remaining -= bytesRead;
        controller.enqueue(buffer.subarray(0, bytesRead));
      } catch (err) {
        logger?.error({ err }, "Read failed mid-stream");
        await close();
        controller.error(err);
      }
    },
    async cancel() {
      logger?.debug({ position, remaining }, "Read stream cancelled");
      await close();
    },
  });
}

/**
 * Opens a file for a (possibly ranged) read. Fails with NotFoundError when
 * the path is missing or names a directory.
 */
export async function openForRead(
  resolver: PathResolver,
  rawPath: string | undefined,
  options: OpenForReadOptions = {},
): Promise<ReadHandle> {
  const resolved = await resolver.resolve(rawPath);
  const { relPath, absolutePath } = resolved;

  let size: number;
  let modifiedTime: number;
  try {
    const stats = await stat(absolutePath);
    if (!stats.isFile()) {
      throw new NotFoundError("Path is not a file", { path: relPath });
    }
    size = stats.size;
    modifiedTime = Math.floor(stats.mtimeMs);
  } catch (err) {
    throw fromFsError(err, { operation: "stat file", relPath });
  }

  const range = parseRangeHeader(options.range, size);
  const start = range?.start ?? 0;
  const length = range ? rangeLength(range) : size;

  let handle: FileHandle;
  try {
    handle = await open(absolutePath, "r");
  } catch (err) {
    options.logger?.error({ err, path: relPath }, "Failed to open file");
    throw fromFsError(err, { operation: "open file", relPath });
  }

  const name = relPath.slice(relPath.lastIndexOf("/") + 1);
  return {
    relPath,
    name,
    contentType: guessMimeType(name),
    size,
    modifiedTime,
    range,
    length,
    stream: createFileStream(handle, start, length, options.logger),
  };
}
