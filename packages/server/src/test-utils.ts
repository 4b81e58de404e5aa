import { mkdtemp, mkdir, realpath, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { pino } from "pino";
import { vi, type Mock } from "vitest";
import { ServerConfigSchema } from "@filedock/core/schemas";
import type { ThumbnailGenerator } from "@filedock/core/thumbnails";
import { createServer, type ServerContext } from "./bootstrap.js";

export const CLIP_BYTES = Buffer.from(Array.from({ length: 1000 }, (_, i) => i % 251));

export interface TestContext {
  root: string;
  server: ServerContext;
  generate: Mock<ThumbnailGenerator["generate"]>;
  dispose: () => Promise<void>;
}

/**
 * Served tree:
 *   A.txt b.txt c.txt
 *   docs/report.pdf docs/other.txt
 *   media/clip.mp4 media/.hidden.mp4
 */
export async function createTestContext(
  overrides: Record<string, unknown> = {},
): Promise<TestContext> {
  const root = await realpath(await mkdtemp(join(tmpdir(), "filedock-server-")));
  await mkdir(join(root, "docs"));
  await mkdir(join(root, "media"));
  await writeFile(join(root, "A.txt"), "a");
  await writeFile(join(root, "b.txt"), "bb");
  await writeFile(join(root, "c.txt"), "ccc");
  await writeFile(join(root, "docs", "report.pdf"), "pdf-bytes");
  await writeFile(join(root, "docs", "other.txt"), "hello");
  await writeFile(join(root, "media", "clip.mp4"), CLIP_BYTES);
  await writeFile(join(root, "media", ".hidden.mp4"), "h");

  const config = ServerConfigSchema.parse({
    storage: { rootDir: root },
    uploads: { maxBytes: 1024 },
    listing: { defaultLimit: 25, maxLimit: 100 },
    ...overrides,
  });

  const generate = vi.fn<ThumbnailGenerator["generate"]>(
    async () => new Uint8Array([0xff, 0xd8, 0xff, 0xd9]),
  );
  const server = await createServer(config, {
    logger: pino({ level: "silent" }),
    thumbnailGenerator: { generate },
  });

  return {
    root,
    server,
    generate,
    dispose: async () => {
      await server.cleanup();
      await rm(root, { recursive: true, force: true });
    },
  };
}
