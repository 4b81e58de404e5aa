import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { ServerConfigSchema } from "./server-config.js";
import { loadConfig, saveConfig } from "../config/loader.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "server-config-test-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true });
  }
}

describe("ServerConfigSchema", () => {
  it("fills nested defaults for a partial section", () => {
    const config = ServerConfigSchema.parse({ thumbnails: { width: 200 } });

    expect(config.thumbnails.width).toBe(200);
    expect(config.thumbnails.failureTtlMs).toBe(30000);
    expect(config.thumbnails.ffmpegPath).toBe("ffmpeg");
  });

  it("rejects thumbnail widths outside the supported range", () => {
    expect(() =>
      ServerConfigSchema.parse({ thumbnails: { width: 8 } }),
    ).toThrow();
  });

  it("defaults uploads.maxBytes to 10 GiB", () => {
    const config = ServerConfigSchema.parse({});
    expect(config.uploads.maxBytes).toBe(10737418240);
  });

  it("rejects a walk depth of zero", () => {
    expect(() => ServerConfigSchema.parse({ walk: { maxDepth: 0 } })).toThrow();
  });
});

describe("saveConfig", () => {
  it("writes JSON file that loadConfig reads back identically", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");

      const original = await loadConfig({ configPath, env: {} });
      original.mutations.allowCrossDeviceCopy = true;
      original.storage.skipHiddenByDefault = true;

      await saveConfig(original, { configPath });
      const reloaded = await loadConfig({ configPath, env: {} });

      expect(reloaded.mutations.allowCrossDeviceCopy).toBe(true);
      expect(reloaded.storage.skipHiddenByDefault).toBe(true);
      expect(reloaded.server.port).toBe(original.server.port);
    });
  });

  it("creates parent directory if missing", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "nested", "deep", "config.json");

      await saveConfig(ServerConfigSchema.parse({}), { configPath });

      const parsed = JSON.parse(await readFile(configPath, "utf-8"));
      expect(parsed.server.port).toBe(8080);
      expect(parsed.walk.maxEntries).toBe(100000);
    });
  });
});
