import { describe, it, expect } from "vitest";
import type { FileEntry } from "@filedock/core/files";
import { toWireEntry, toWireListing } from "./serializers.js";

const entry: FileEntry = {
  name: "clip.mp4",
  fullName: "/srv/media/clip.mp4",
  relPath: "media/clip.mp4",
  size: 1000,
  isDirectory: false,
  createdTime: 1_700_000_000_000,
  modifiedTime: 1_700_000_500_000,
  fileType: "video/mp4",
  owner: "1000",
  parentDir: "media",
};

describe("toWireEntry", () => {
  it("renders snake_case fields without the absolute path", () => {
    expect(toWireEntry(entry)).toEqual({
      name: "clip.mp4",
      full_name: "media/clip.mp4",
      rel_path: "media/clip.mp4",
      size: 1000,
      is_directory: false,
      created_time: 1_700_000_000_000,
      modified_time: 1_700_000_500_000,
      file_type: "video/mp4",
      owner: "1000",
      parent_dir: "media",
    });
  });
});

describe("toWireListing", () => {
  it("flags bounded walks", () => {
    const wire = toWireListing({ totalFiles: 7, files: [entry], skip: 0, limit: 1, truncated: "time" });
    expect(wire.total_files).toBe(7);
    expect(wire.files).toHaveLength(1);
    expect(wire.truncated).toBe(true);
    expect(wire.truncated_reason).toBe("time");
  });

  it("reports complete listings as not truncated", () => {
    const wire = toWireListing({ totalFiles: 0, files: [], skip: 5, limit: 25 });
    expect(wire).toEqual({
      total_files: 0,
      files: [],
      skip: 5,
      limit: 25,
      truncated: false,
      truncated_reason: null,
    });
  });
});
