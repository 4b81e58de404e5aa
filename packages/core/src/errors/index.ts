export {
  FileServiceError,
  InvalidPathError,
  InvalidNameError,
  InvalidRequestError,
  NotFoundError,
  ConflictError,
  CrossDeviceMoveError,
  SizeLimitExceededError,
  RangeNotSatisfiableError,
  GenerationFailedError,
  StorageIOError,
} from "./catalog.js";
export {
  fromFsError,
  isErrnoException,
  errnoCode,
  type FsErrorContext,
} from "./fs.js";
