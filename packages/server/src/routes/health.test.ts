import { describe, it, expect, vi } from "vitest";
import type { ThumbnailService } from "@filedock/core/thumbnails";
import { healthRoute } from "./health.js";

describe("healthRoute", () => {
  const deps = { version: "0.0.1", startedAt: new Date() };

  it("GET /health returns 200", async () => {
    const app = healthRoute(deps);
    const res = await app.request("/health");
    expect(res.status).toBe(200);
  });

  it("body has status, version and uptime", async () => {
    const app = healthRoute(deps);
    const body = await (await app.request("/health")).json();

    expect(body.status).toBe("healthy");
    expect(body.version).toBe("0.0.1");
    expect(typeof body.uptime).toBe("number");
    expect(body.uptime).toBeGreaterThanOrEqual(0);
    expect(body.thumbnail_cache).toBeNull();
  });

  it("uptime increases over time", async () => {
    const past = new Date(Date.now() - 5000);
    const app = healthRoute({ version: "0.0.1", startedAt: past });
    const body = await (await app.request("/health")).json();

    expect(body.uptime).toBeGreaterThanOrEqual(5);
  });

  it("reports thumbnail cache occupancy", async () => {
    const thumbnails: ThumbnailService = {
      getThumbnail: vi.fn(),
      invalidate: vi.fn(),
      stats: vi.fn().mockReturnValue({ entries: 3, bytes: 4096, pending: 1 }),
    };
    const app = healthRoute({ ...deps, thumbnails });
    const body = await (await app.request("/health")).json();

    expect(body.thumbnail_cache).toEqual({ entries: 3, bytes: 4096, pending: 1 });
  });

  it("Content-Type is application/json", async () => {
    const app = healthRoute(deps);
    const res = await app.request("/health");
    expect(res.headers.get("content-type")).toMatch(/application\/json/);
  });
});
