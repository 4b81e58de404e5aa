/** Point-in-time snapshot of one filesystem object. Never persisted. */
export interface FileEntry {
  name: string;
  /** Absolute path on the server. */
  fullName: string;
  /** Root-relative identifier exposed to clients. */
  relPath: string;
  /** Bytes; 0 for directories. */
  size: number;
  isDirectory: boolean;
  /** Epoch milliseconds. */
  createdTime: number;
  /** Epoch milliseconds. */
  modifiedTime: number;
  /** MIME type guessed from the extension; null for directories. */
  fileType: string | null;
  owner: string | null;
  /** Root-relative path of the containing directory; null for the root. */
  parentDir: string | null;
}

export type SortKey =
  | "name"
  | "size"
  | "modified_time"
  | "created_time"
  | "file_type";

export type SortOrder = "asc" | "desc";

export interface PageOptions {
  skip: number;
  limit: number;
  sortBy?: SortKey;
  order?: SortOrder;
}

/** "unreadable": a subdirectory below the start could not be read. */
export type BoundReason = "depth" | "entries" | "time" | "unreadable";

export interface ListingResult {
  /** Matching entries before pagination. */
  totalFiles: number;
  files: FileEntry[];
  skip: number;
  limit: number;
  /** Set when a recursive walk stopped at a bound or skipped a subtree. */
  truncated?: BoundReason;
}
