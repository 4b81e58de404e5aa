import { Hono } from "hono";
import type { ThumbnailService } from "@filedock/core/thumbnails";

export interface HealthDeps {
  version: string;
  startedAt: Date;
  thumbnails?: ThumbnailService;
}

export function healthRoute(deps: HealthDeps): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    const uptimeMs = Date.now() - deps.startedAt.getTime();

    return c.json({
      status: "healthy",
      version: deps.version,
      uptime: Math.floor(uptimeMs / 1000),
      thumbnail_cache: deps.thumbnails?.stats() ?? null,
    });
  });

  return app;
}
