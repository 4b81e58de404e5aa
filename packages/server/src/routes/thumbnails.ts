import { Hono } from "hono";
import type { ThumbnailService } from "@filedock/core/thumbnails";

export interface ThumbnailRouteDeps {
  thumbnails: ThumbnailService;
}

export function thumbnailRoutes(deps: ThumbnailRouteDeps): Hono {
  const app = new Hono();

  // GET /thumbnail/<path>: JPEG preview of an image or video
  app.get("/thumbnail/:path{.+}", async (c) => {
    const thumbnail = await deps.thumbnails.getThumbnail(c.req.param("path"));
    return new Response(thumbnail.bytes, {
      headers: {
        "Content-Type": thumbnail.contentType,
        "Content-Length": String(thumbnail.bytes.byteLength),
        "Last-Modified": new Date(thumbnail.modifiedTime).toUTCString(),
        "Cache-Control": "private, max-age=3600",
      },
    });
  });

  return app;
}
