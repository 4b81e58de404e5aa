export {
  parseRangeHeader,
  rangeLength,
  contentRange,
  type ByteRange,
} from "./range.js";
export {
  openForRead,
  createFileStream,
  type ReadHandle,
  type OpenForReadOptions,
} from "./read.js";
export {
  ingestUpload,
  sha512OfFile,
  type UploadRequest,
  type UploadOptions,
  type UploadResult,
} from "./upload.js";
