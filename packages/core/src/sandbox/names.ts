import { InvalidNameError } from "../errors/catalog.js";

/** Prefix reserved for in-flight upload temp files. */
export const UPLOAD_TEMP_PREFIX = ".filedock-upload-";

const MAX_NAME_BYTES = 255;

export function isReservedName(name: string): boolean {
  return name.startsWith(UPLOAD_TEMP_PREFIX);
}

export function isHiddenName(name: string): boolean {
  return name.startsWith(".");
}

/**
 * Validates a single path component supplied for a new file or folder.
 * Returns the name unchanged when it is acceptable.
 */
export function validateEntryName(name: string | undefined): string {
  if (name === undefined || name.length === 0 || name.trim().length === 0) {
    throw new InvalidNameError("Name must not be empty");
  }
  if (name === "." || name === "..") {
    throw new InvalidNameError("Name must not be a traversal segment", {
      name,
    });
  }
  if (/[/\\\0]/.test(name)) {
    throw new InvalidNameError("Name must not contain path separators", {
      name,
    });
  }
  if (Buffer.byteLength(name, "utf8") > MAX_NAME_BYTES) {
    throw new InvalidNameError(`Name exceeds ${MAX_NAME_BYTES} bytes`);
  }
  if (isReservedName(name)) {
    throw new InvalidNameError("Name uses a reserved prefix", { name });
  }
  return name;
}
