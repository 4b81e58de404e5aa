import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, realpath, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { InvalidRequestError, NotFoundError } from "../errors/catalog.js";
import { createPathResolver } from "../sandbox/resolver.js";
import { createDiscoveryService, type DiscoveryService } from "./service.js";

const walk = { maxDepth: 32, maxEntries: 10_000, timeBudgetMs: 10_000 };

describe("DiscoveryService", () => {
  let root: string;
  let service: DiscoveryService;

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), "discovery-test-")));
    await mkdir(join(root, "docs", "old"), { recursive: true });
    await mkdir(join(root, "media", "trips"), { recursive: true });
    await mkdir(join(root, "report-archive"));
    await writeFile(join(root, "docs", "report.pdf"), "pdf");
    await writeFile(join(root, "docs", "other.txt"), "txt");
    await writeFile(join(root, "docs", "old", "Report-2019.pdf"), "old");
    await writeFile(join(root, "media", "intro.mp4"), "0123456789");
    await writeFile(join(root, "media", "trips", "alps.mkv"), "01234");
    await writeFile(join(root, "media", "trips", ".draft.mp4"), "0");
    await writeFile(join(root, "media", "cover.jpg"), "img");

    const resolver = await createPathResolver(root);
    service = createDiscoveryService({ resolver, walk });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("search", () => {
    it("returns only matching files", async () => {
      const result = await service.search("docs", { text: "report" }, { skip: 0, limit: 25 });
      expect(result.files.map((f) => f.relPath)).toEqual([
        "docs/old/Report-2019.pdf",
        "docs/report.pdf",
      ]);
      expect(result.totalFiles).toBe(2);
    });

    it("finds report.pdf from the root without directory matches", async () => {
      const result = await service.search("/", { text: "report.pdf" }, { skip: 0, limit: 25 });
      expect(result.files.map((f) => f.name)).toEqual(["report.pdf"]);
    });

    it("counts all matches while returning one page", async () => {
      const result = await service.search("", { text: "*.pdf" }, { skip: 1, limit: 1 });
      expect(result.totalFiles).toBe(2);
      expect(result.files).toHaveLength(1);
      expect(result.files.map((f) => f.name)).toEqual(["report.pdf"]);
    });

    it("rejects an empty query", async () => {
      await expect(
        service.search("", { text: "  " }, { skip: 0, limit: 25 }),
      ).rejects.toThrow(InvalidRequestError);
    });

    it("fails with NotFoundError for a missing start directory", async () => {
      await expect(
        service.search("nope", { text: "a" }, { skip: 0, limit: 25 }),
      ).rejects.toThrow(NotFoundError);
    });

    it("marks truncated results", async () => {
      const resolver = await createPathResolver(root);
      const bounded = createDiscoveryService({
        resolver,
        walk: { ...walk, maxEntries: 3 },
      });
      const result = await bounded.search("", { text: "report" }, { skip: 0, limit: 25 });
      expect(result.truncated).toBe("entries");
    });
  });

  describe("videos", () => {
    it("finds videos recursively", async () => {
      const result = await service.videos("media", { skip: 0, limit: 25 });
      expect(result.files.map((f) => f.relPath)).toEqual([
        "media/trips/.draft.mp4",
        "media/trips/alps.mkv",
        "media/intro.mp4",
      ]);
      expect(result.truncated).toBeUndefined();
    });

    it("honours skipHidden and recursive=false", async () => {
      const hidden = await service.videos("media", { skip: 0, limit: 25, skipHidden: true });
      expect(hidden.files.map((f) => f.name)).toEqual(["alps.mkv", "intro.mp4"]);

      const flat = await service.videos("media", { skip: 0, limit: 25, recursive: false });
      expect(flat.files.map((f) => f.name)).toEqual(["intro.mp4"]);
    });

    it("sorts by size descending", async () => {
      const result = await service.videos("media", {
        skip: 0,
        limit: 25,
        sortBy: "size",
        order: "desc",
        skipHidden: true,
      });
      expect(result.files.map((f) => f.name)).toEqual(["intro.mp4", "alps.mkv"]);
    });
  });
});
