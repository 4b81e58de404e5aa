import type { FileEntry, ListingResult } from "@filedock/core/files";

export interface WireEntry {
  name: string;
  full_name: string;
  rel_path: string;
  size: number;
  is_directory: boolean;
  created_time: number;
  modified_time: number;
  file_type: string | null;
  owner: string | null;
  parent_dir: string | null;
}

export interface WireListing {
  total_files: number;
  files: WireEntry[];
  skip: number;
  limit: number;
  truncated: boolean;
  truncated_reason: string | null;
}

/**
 * `full_name` carries the root-relative path, never the absolute server
 * location.
 */
export function toWireEntry(entry: FileEntry): WireEntry {
  return {
    name: entry.name,
    full_name: entry.relPath,
    rel_path: entry.relPath,
    size: entry.size,
    is_directory: entry.isDirectory,
    created_time: entry.createdTime,
    modified_time: entry.modifiedTime,
    file_type: entry.fileType,
    owner: entry.owner,
    parent_dir: entry.parentDir,
  };
}

export function toWireListing(result: ListingResult): WireListing {
  return {
    total_files: result.totalFiles,
    files: result.files.map(toWireEntry),
    skip: result.skip,
    limit: result.limit,
    truncated: result.truncated !== undefined,
    truncated_reason: result.truncated ?? null,
  };
}
