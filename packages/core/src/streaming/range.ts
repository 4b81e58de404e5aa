import { RangeNotSatisfiableError } from "../errors/catalog.js";

/** Inclusive byte interval. */
export interface ByteRange {
  start: number;
  end: number;
}

/**
 * Parses a `Range` header against a file of `size` bytes.
 *
 * Returns null when the header is absent, not a `bytes` range, malformed
 * or lists several ranges; the caller then serves the whole file. Throws
 * RangeNotSatisfiableError when the single range starts past the end.
 */
export function parseRangeHeader(
  header: string | undefined | null,
  size: number,
): ByteRange | null {
  if (!header) {
    return null;
  }
  const match = /^\s*bytes\s*=\s*(.+)$/i.exec(header);
  if (!match) {
    return null;
  }
  const ranges = match[1].trim();
  if (ranges.includes(",")) {
    return null;
  }

  const parts = /^(\d*)\s*-\s*(\d*)$/.exec(ranges);
  if (!parts || (parts[1] === "" && parts[2] === "")) {
    return null;
  }

  // bytes=-N: the last N bytes
  if (parts[1] === "") {
    const suffix = Number(parts[2]);
    if (suffix === 0 || size === 0) {
      throw new RangeNotSatisfiableError(size);
    }
    return { start: Math.max(0, size - suffix), end: size - 1 };
  }

  const start = Number(parts[1]);
  const end = parts[2] === "" ? size - 1 : Math.min(Number(parts[2]), size - 1);
  if (parts[2] !== "" && Number(parts[2]) < start) {
    return null;
  }
  if (start >= size) {
    throw new RangeNotSatisfiableError(size);
  }
  return { start, end };
}

export function rangeLength(range: ByteRange): number {
  return range.end - range.start + 1;
}

export function contentRange(range: ByteRange, size: number): string {
  return `bytes ${range.start}-${range.end}/${size}`;
}
