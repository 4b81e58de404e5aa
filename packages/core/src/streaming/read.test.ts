import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, realpath, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { NotFoundError, RangeNotSatisfiableError } from "../errors/catalog.js";
import { createPathResolver, type PathResolver } from "../sandbox/resolver.js";
import { openForRead } from "./read.js";

async function readAll(stream: ReadableStream<Uint8Array>): Promise<Buffer> {
  const chunks: Uint8Array[] = [];
  const reader = stream.getReader();
  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks);
}

describe("openForRead", () => {
  let root: string;
  let resolver: PathResolver;
  const content = Buffer.alloc(1000);
  for (let i = 0; i < content.length; i++) {
    content[i] = i % 251;
  }

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), "read-test-")));
    await mkdir(join(root, "media"));
    await writeFile(join(root, "media", "clip.mp4"), content);
    await writeFile(join(root, "big.bin"), Buffer.alloc(200 * 1024, 7));
    resolver = await createPathResolver(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("streams the whole file without a range", async () => {
    const handle = await openForRead(resolver, "media/clip.mp4");
    expect(handle.size).toBe(1000);
    expect(handle.length).toBe(1000);
    expect(handle.range).toBeNull();
    expect(handle.contentType).toBe("video/mp4");
    expect(handle.name).toBe("clip.mp4");
    expect((await readAll(handle.stream)).equals(content)).toBe(true);
  });

  it("returns exactly the requested slice for bytes=100-199", async () => {
    const handle = await openForRead(resolver, "media/clip.mp4", { range: "bytes=100-199" });
    const body = await readAll(handle.stream);
    expect(body.length).toBe(100);
    expect(body.equals(content.subarray(100, 200))).toBe(true);
    expect(handle.range).toEqual({ start: 100, end: 199 });
  });

  it("serves overlapping ranges independently", async () => {
    const [a, b] = await Promise.all([
      openForRead(resolver, "media/clip.mp4", { range: "bytes=0-499" }),
      openForRead(resolver, "media/clip.mp4", { range: "bytes=250-749" }),
    ]);
    const [bodyA, bodyB] = await Promise.all([readAll(a.stream), readAll(b.stream)]);
    expect(bodyA.equals(content.subarray(0, 500))).toBe(true);
    expect(bodyB.equals(content.subarray(250, 750))).toBe(true);
  });

  it("reads files larger than one chunk", async () => {
    const handle = await openForRead(resolver, "big.bin");
    const body = await readAll(handle.stream);
    expect(body.length).toBe(200 * 1024);
  });

  it("releases the handle when the reader cancels", async () => {
    const handle = await openForRead(resolver, "big.bin");
    const reader = handle.stream.getReader();
    const first = await reader.read();
    expect(first.done).toBe(false);
    await reader.cancel();
  });

  it("fails with NotFoundError for missing files and directories", async () => {
    await expect(openForRead(resolver, "nope.txt")).rejects.toThrow(NotFoundError);
    await expect(openForRead(resolver, "media")).rejects.toThrow(NotFoundError);
  });

  it("rejects an unsatisfiable range", async () => {
    await expect(
      openForRead(resolver, "media/clip.mp4", { range: "bytes=5000-" }),
    ).rejects.toThrow(RangeNotSatisfiableError);
  });
});
