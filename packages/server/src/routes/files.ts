import { Hono } from "hono";
import { z } from "zod";
import type { ListingEngine } from "@filedock/core/listing";
import { parseSortKey, parseSortOrder } from "@filedock/core/listing";
import type { DiscoveryService } from "@filedock/core/search";
import type { ServerConfig } from "@filedock/core/schemas";
import type { Logger } from "pino";
import { toWireListing } from "../serializers.js";
import { parseInput } from "../validation.js";

export interface FileRouteDeps {
  listing: ListingEngine;
  discovery: DiscoveryService;
  listingConfig: ServerConfig["listing"];
  skipHiddenByDefault: boolean;
  logger: Logger;
}

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const PageQuerySchema = z.object({
  path: z.string().optional(),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).optional(),
  sort_by: z.string().optional(),
  order: z.string().optional(),
  skip_hidden: flag.optional(),
});

const VideoQuerySchema = PageQuerySchema.extend({
  recursive: flag.default(true),
});

const SearchQuerySchema = PageQuerySchema.extend({
  query: z.string().trim().min(1, "query is required"),
  match: z.enum(["name", "path"]).default("name"),
});

export function fileRoutes(deps: FileRouteDeps): Hono {
  const app = new Hono();
  const { defaultLimit, maxLimit } = deps.listingConfig;

  function pageOptions(query: z.output<typeof PageQuerySchema>) {
    return {
      skip: query.skip,
      limit: Math.min(query.limit ?? defaultLimit, maxLimit),
      sortBy: parseSortKey(query.sort_by),
      order: parseSortOrder(query.order),
      skipHidden: query.skip_hidden ?? deps.skipHiddenByDefault,
    };
  }

  // GET /files: one directory, non-recursive
  app.get("/files", async (c) => {
    const query = parseInput(PageQuerySchema, c.req.query());
    const result = await deps.listing.list(query.path, pageOptions(query));
    return c.json(toWireListing(result));
  });

  // GET /videos: media files below a directory
  app.get("/videos", async (c) => {
    const query = parseInput(VideoQuerySchema, c.req.query());
    const result = await deps.discovery.videos(query.path, {
      ...pageOptions(query),
      recursive: query.recursive,
      signal: c.req.raw.signal,
    });
    return c.json(toWireListing(result));
  });

  // GET /search: name (or path) matches below a directory
  app.get("/search", async (c) => {
    const query = parseInput(SearchQuerySchema, c.req.query());
    deps.logger.debug({ query: query.query, path: query.path }, "Search");
    const result = await deps.discovery.search(
      query.path,
      { text: query.query, field: query.match },
      { ...pageOptions(query), signal: c.req.raw.signal },
    );
    return c.json(toWireListing(result));
  });

  return app;
}
