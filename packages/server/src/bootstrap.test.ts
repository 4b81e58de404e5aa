import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { pino } from "pino";
import { ServerConfigSchema } from "@filedock/core/schemas";
import { createServer } from "./bootstrap.js";

const logger = pino({ level: "silent" });

describe("createServer", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "bootstrap-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  function makeConfig(rootDir: string) {
    return ServerConfigSchema.parse({ storage: { rootDir } });
  }

  it("returns object with app, logger, config, startedAt and root", async () => {
    const ctx = await createServer(makeConfig(tempDir), { logger });

    expect(ctx).toHaveProperty("app");
    expect(ctx.logger).toBe(logger);
    expect(ctx.config.storage.rootDir).toBe(tempDir);
    expect(ctx.startedAt).toBeInstanceOf(Date);
    expect(ctx.root).toBe(ctx.resolver.root);
    await ctx.cleanup();
  });

  it("app responds to GET /health", async () => {
    const ctx = await createServer(makeConfig(tempDir), { logger });

    const res = await ctx.app.request("/health");
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.status).toBe("healthy");
    await ctx.cleanup();
  });

  it("serves the configured root", async () => {
    await writeFile(join(tempDir, "hello.txt"), "hi");
    const ctx = await createServer(makeConfig(tempDir), { logger });

    const body = await (await ctx.app.request("/api/v1/files")).json();
    expect(body.files.map((f: { name: string }) => f.name)).toEqual(["hello.txt"]);
    await ctx.cleanup();
  });

  it("fails when the root is missing", async () => {
    await expect(
      createServer(makeConfig(join(tempDir, "missing")), { logger }),
    ).rejects.toThrow();
  });

  it("fails when the root is a file", async () => {
    await writeFile(join(tempDir, "file.txt"), "x");
    await expect(
      createServer(makeConfig(join(tempDir, "file.txt")), { logger }),
    ).rejects.toThrow("Root is not a directory");
  });
});
