import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createHash } from "node:crypto";
import { mkdtemp, readFile, readdir, realpath, rm, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  ConflictError,
  InvalidNameError,
  InvalidPathError,
  InvalidRequestError,
  NotFoundError,
  SizeLimitExceededError,
} from "../errors/catalog.js";
import { createPathResolver, type PathResolver } from "../sandbox/resolver.js";
import { ingestUpload, type UploadOptions } from "./upload.js";

async function* chunks(...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) {
    yield Buffer.from(part);
  }
}

async function* failingAfter(part: string): AsyncGenerator<Uint8Array> {
  yield Buffer.from(part);
  throw new Error("client disconnected");
}

function sha512(text: string): string {
  return createHash("sha512").update(text).digest("hex");
}

describe("ingestUpload", () => {
  let root: string;
  let resolver: PathResolver;
  const options: UploadOptions = { maxBytes: 1024, createMissingDirectories: true };

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), "upload-test-")));
    await mkdir(join(root, "inbox"));
    resolver = await createPathResolver(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes the body and reports its hash", async () => {
    const result = await ingestUpload(
      resolver,
      { location: "inbox", filename: "notes.txt", body: chunks("hello ", "world") },
      options,
    );

    expect(result).toEqual({
      relPath: "inbox/notes.txt",
      filename: "notes.txt",
      location: "inbox",
      size: 11,
      sha512: sha512("hello world"),
      skipped: false,
    });
    expect(await readFile(join(root, "inbox", "notes.txt"), "utf-8")).toBe("hello world");
    expect(await readdir(join(root, "inbox"))).toEqual(["notes.txt"]);
  });

  it("creates a missing destination directory", async () => {
    await ingestUpload(
      resolver,
      { location: "new/deep", filename: "a.txt", body: chunks("a") },
      options,
    );
    expect(await readFile(join(root, "new", "deep", "a.txt"), "utf-8")).toBe("a");
  });

  it("fails for a missing directory when creation is disabled", async () => {
    await expect(
      ingestUpload(
        resolver,
        { location: "missing", filename: "a.txt", body: chunks("a") },
        { ...options, createMissingDirectories: false },
      ),
    ).rejects.toThrow(NotFoundError);
  });

  it("leaves no file behind when the body aborts", async () => {
    await expect(
      ingestUpload(
        resolver,
        { location: "inbox", filename: "partial.bin", body: failingAfter("some bytes") },
        options,
      ),
    ).rejects.toThrow();
    expect(await readdir(join(root, "inbox"))).toEqual([]);
  });

  it("aborts and cleans up past maxBytes", async () => {
    await expect(
      ingestUpload(
        resolver,
        { location: "inbox", filename: "big.bin", body: chunks("x".repeat(600), "y".repeat(600)) },
        options,
      ),
    ).rejects.toThrow(SizeLimitExceededError);
    expect(await readdir(join(root, "inbox"))).toEqual([]);
  });

  it("keeps the previous content when a replacement aborts", async () => {
    await writeFile(join(root, "inbox", "doc.txt"), "original");
    await expect(
      ingestUpload(
        resolver,
        { location: "inbox", filename: "doc.txt", body: failingAfter("new") },
        options,
      ),
    ).rejects.toThrow();
    expect(await readFile(join(root, "inbox", "doc.txt"), "utf-8")).toBe("original");
  });

  it("skips the write when the declared hash matches the existing file", async () => {
    await writeFile(join(root, "inbox", "same.txt"), "same");
    const result = await ingestUpload(
      resolver,
      { location: "inbox", filename: "same.txt", body: chunks("same"), sha512: sha512("same") },
      options,
    );
    expect(result.skipped).toBe(true);
    expect(result.size).toBe(4);
  });

  it("replaces the file when the declared hash differs from the existing one", async () => {
    await writeFile(join(root, "inbox", "doc.txt"), "old");
    const result = await ingestUpload(
      resolver,
      { location: "inbox", filename: "doc.txt", body: chunks("new"), sha512: sha512("new") },
      options,
    );
    expect(result.skipped).toBe(false);
    expect(await readFile(join(root, "inbox", "doc.txt"), "utf-8")).toBe("new");
  });

  it("rejects a body that does not match the declared hash", async () => {
    await expect(
      ingestUpload(
        resolver,
        { location: "inbox", filename: "doc.txt", body: chunks("abc"), sha512: sha512("xyz") },
        options,
      ),
    ).rejects.toThrow(InvalidRequestError);
    expect(await readdir(join(root, "inbox"))).toEqual([]);
  });

  it("validates the filename before touching the filesystem", async () => {
    for (const filename of ["../evil.txt", "a/b.txt", "..", "", ".filedock-upload-x"]) {
      await expect(
        ingestUpload(resolver, { location: "inbox", filename, body: chunks("x") }, options),
      ).rejects.toThrow(InvalidNameError);
    }
    await expect(
      ingestUpload(resolver, { location: "../outside", filename: "a.txt", body: chunks("x") }, options),
    ).rejects.toThrow(InvalidPathError);
  });

  it("refuses to overwrite a directory", async () => {
    await mkdir(join(root, "inbox", "folder"));
    await expect(
      ingestUpload(resolver, { location: "inbox", filename: "folder", body: chunks("x") }, options),
    ).rejects.toThrow(ConflictError);
  });
});
