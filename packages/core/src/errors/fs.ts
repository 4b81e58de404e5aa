import {
  ConflictError,
  CrossDeviceMoveError,
  FileServiceError,
  InvalidPathError,
  NotFoundError,
  StorageIOError,
} from "./catalog.js";

export interface FsErrorContext {
  /** Short verb phrase such as "list directory" or "rename". */
  operation: string;
  /** Root-relative path the operation was about; never an absolute path. */
  relPath?: string;
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export function errnoCode(err: unknown): string | undefined {
  return isErrnoException(err) ? err.code : undefined;
}

/**
 * Translates a Node filesystem error into the catalog. Errors that already
 * belong to the catalog pass through untouched.
 */
export function fromFsError(
  err: unknown,
  context: FsErrorContext,
): FileServiceError {
  if (err instanceof FileServiceError) {
    return err;
  }

  const details =
    context.relPath !== undefined ? { path: context.relPath } : undefined;

  switch (errnoCode(err)) {
    case "ENOENT":
    case "ENOTDIR":
      return new NotFoundError("Path not found", details);
    case "EEXIST":
    case "ENOTEMPTY":
      return new ConflictError("Destination already exists", details);
    case "EXDEV":
      return new CrossDeviceMoveError(details);
    case "ELOOP":
      return new InvalidPathError("Path resolves through a symlink loop", details);
    case "EACCES":
    case "EPERM":
      return new StorageIOError(`Permission denied during ${context.operation}`, details);
    case "ENOSPC":
      return new StorageIOError(`No space left during ${context.operation}`, details);
    default:
      return new StorageIOError(`Failed to ${context.operation}`, details);
  }
}
