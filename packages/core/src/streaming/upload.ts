import { createHash, randomUUID } from "node:crypto";
import { createReadStream } from "node:fs";
import { mkdir, open, rename, stat, unlink, type FileHandle } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import {
  ConflictError,
  InvalidRequestError,
  NotFoundError,
  SizeLimitExceededError,
} from "../errors/catalog.js";
import { errnoCode, fromFsError } from "../errors/fs.js";
import { UPLOAD_TEMP_PREFIX, validateEntryName } from "../sandbox/names.js";
import type { PathResolver, ResolvedPath } from "../sandbox/resolver.js";

export interface UploadRequest {
  /** Root-relative destination directory. */
  location: string | undefined;
  filename: string | undefined;
  body: AsyncIterable<Uint8Array>;
  /** Client-declared SHA-512 (hex) of the body. */
  sha512?: string;
}

export interface UploadOptions {
  maxBytes: number;
  createMissingDirectories: boolean;
  logger?: Logger;
}

export interface UploadResult {
  relPath: string;
  filename: string;
  location: string;
  size: number;
  sha512: string;
  /** True when an identical file was already in place and nothing was written. */
  skipped: boolean;
}

export async function sha512OfFile(absolutePath: string): Promise<string> {
  const hash = createHash("sha512");
  for await (const chunk of createReadStream(absolutePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

async function prepareDirectory(
  resolver: PathResolver,
  location: string | undefined,
  createMissing: boolean,
): Promise<ResolvedPath> {
  const dir = await resolver.resolve(location);
  try {
    const stats = await stat(dir.absolutePath);
    if (!stats.isDirectory()) {
      throw new NotFoundError("Upload location is not a directory", { path: dir.relPath });
    }
  } catch (err) {
    if (errnoCode(err) !== "ENOENT" || !createMissing) {
      throw fromFsError(err, { operation: "stat upload location", relPath: dir.relPath });
    }
    try {
      await mkdir(dir.absolutePath, { recursive: true });
    } catch (mkdirErr) {
      throw fromFsError(mkdirErr, { operation: "create upload location", relPath: dir.relPath });
    }
    // mkdir may have followed a symlink created concurrently
    await resolver.resolve(dir.relPath);
  }
  return dir;
}

async function existingFileSize(absolutePath: string): Promise<number | null> {
  try {
    const stats = await stat(absolutePath);
    if (stats.isDirectory()) {
      throw new ConflictError("A directory with that name already exists");
    }
    return stats.size;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return null;
    }
    throw err;
  }
}

/**
 * Streams an upload into `<location>/.filedock-upload-<uuid>.part` and
 * renames it over the destination once the body is complete. The temp
 * file is removed on every failure path, so the destination either keeps
 * its previous content or holds the whole new body.
 */
export async function ingestUpload(
  resolver: PathResolver,
  request: UploadRequest,
  options: UploadOptions,
): Promise<UploadResult> {
  const { logger } = options;
  const filename = validateEntryName(request.filename);
  const declared = request.sha512?.trim().toLowerCase() || undefined;

  const dir = await prepareDirectory(resolver, request.location, options.createMissingDirectories);
  const target = await resolver.resolveChild(dir, filename);

  const existingSize = await existingFileSize(target.absolutePath).catch((err: unknown) => {
    throw fromFsError(err, { operation: "stat upload target", relPath: target.relPath });
  });
  if (existingSize !== null && declared !== undefined) {
    const existingHash = await sha512OfFile(target.absolutePath);
    if (existingHash === declared) {
      logger?.info({ path: target.relPath }, "Upload skipped, identical file exists");
      return {
        relPath: target.relPath,
        filename,
        location: dir.relPath,
        size: existingSize,
        sha512: existingHash,
        skipped: true,
      };
    }
  }

  const tempPath = join(dir.absolutePath, `${UPLOAD_TEMP_PREFIX}${randomUUID()}.part`);
  let handle: FileHandle | undefined;
  let size = 0;
  const hash = createHash("sha512");

  try {
    handle = await open(tempPath, "wx");
    for await (const chunk of request.body) {
      size += chunk.byteLength;
      if (size > options.maxBytes) {
        throw new SizeLimitExceededError(options.maxBytes);
      }
      hash.update(chunk);
      await handle.write(chunk);
    }
    await handle.close();
    handle = undefined;

    const digest = hash.digest("hex");
    if (declared !== undefined && declared !== digest) {
      throw new InvalidRequestError("Uploaded content does not match sha512", {
        expected: declared,
      });
    }

    await rename(tempPath, target.absolutePath);
    logger?.info({ path: target.relPath, size }, "Upload stored");
    return {
      relPath: target.relPath,
      filename,
      location: dir.relPath,
      size,
      sha512: digest,
      skipped: false,
    };
  } catch (err) {
    if (handle !== undefined) {
      await handle.close().catch((closeErr: unknown) => {
        logger?.warn({ err: closeErr }, "Failed to close upload temp file");
      });
    }
    await unlink(tempPath).catch((unlinkErr: unknown) => {
      if (errnoCode(unlinkErr) !== "ENOENT") {
        logger?.error({ err: unlinkErr, path: dir.relPath }, "Failed to remove upload temp file");
      }
    });
    logger?.warn({ err, path: target.relPath, received: size }, "Upload aborted");
    throw fromFsError(err, { operation: "store upload", relPath: target.relPath });
  }
}
