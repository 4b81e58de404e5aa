import { describe, it, expect } from "vitest";
import {
  ConflictError,
  CrossDeviceMoveError,
  InvalidPathError,
  NotFoundError,
  StorageIOError,
} from "./catalog.js";
import { errnoCode, fromFsError } from "./fs.js";

function errno(code: string, message = `${code}: /srv/files/secret`): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

describe("fromFsError", () => {
  it.each([
    ["ENOENT", NotFoundError],
    ["ENOTDIR", NotFoundError],
    ["EEXIST", ConflictError],
    ["ENOTEMPTY", ConflictError],
    ["EXDEV", CrossDeviceMoveError],
    ["ELOOP", InvalidPathError],
    ["EACCES", StorageIOError],
    ["EIO", StorageIOError],
  ])("maps %s", (code, expected) => {
    expect(fromFsError(errno(code), { operation: "rename" })).toBeInstanceOf(expected);
  });

  it("never exposes the raw error text", () => {
    const mapped = fromFsError(errno("EACCES"), { operation: "list directory", relPath: "docs" });
    expect(mapped.message).toBe("Permission denied during list directory");
    expect(mapped.details).toEqual({ path: "docs" });
    expect(JSON.stringify(mapped.toJSON())).not.toContain("/srv/files");
  });

  it("names the operation for disk-full and unknown errors", () => {
    expect(fromFsError(errno("ENOSPC"), { operation: "store upload" }).message).toBe(
      "No space left during store upload",
    );
    expect(fromFsError(new Error("weird"), { operation: "move" }).message).toBe("Failed to move");
  });

  it("passes catalog errors through", () => {
    const original = new InvalidPathError("Path traversal is not allowed");
    expect(fromFsError(original, { operation: "resolve" })).toBe(original);
  });
});

describe("errnoCode", () => {
  it("reads the code of errno errors only", () => {
    expect(errnoCode(errno("ENOENT"))).toBe("ENOENT");
    expect(errnoCode(new Error("plain"))).toBeUndefined();
    expect(errnoCode("ENOENT")).toBeUndefined();
  });
});
