import { Hono } from "hono";
import { cors } from "hono/cors";
import {
  FileServiceError,
  RangeNotSatisfiableError,
} from "@filedock/core/errors";
import type { ListingEngine } from "@filedock/core/listing";
import type { MutationCoordinator } from "@filedock/core/mutations";
import type { PathResolver } from "@filedock/core/sandbox";
import type { ServerConfig } from "@filedock/core/schemas";
import type { DiscoveryService } from "@filedock/core/search";
import type { ThumbnailService } from "@filedock/core/thumbnails";
import type { Logger } from "pino";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createRequestLogMiddleware } from "./middleware/request-log.js";
import { healthRoute } from "./routes/health.js";
import { fileRoutes } from "./routes/files.js";
import { transferRoutes } from "./routes/transfer.js";
import { mutationRoutes } from "./routes/mutations.js";
import { thumbnailRoutes } from "./routes/thumbnails.js";

export const API_PREFIX = "/api/v1";

export interface AppDeps {
  logger: Logger;
  version: string;
  startedAt: Date;
  config: Pick<ServerConfig, "storage" | "listing" | "uploads">;
  resolver: PathResolver;
  listing: ListingEngine;
  discovery: DiscoveryService;
  thumbnails: ThumbnailService;
  mutations: MutationCoordinator;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // CORS: allow all origins for the browser front end
  app.use(
    "*",
    cors({
      origin: "*",
      allowHeaders: ["Content-Type", "Range"],
      allowMethods: ["GET", "HEAD", "POST", "OPTIONS"],
      exposeHeaders: ["Content-Range", "Content-Length", "Accept-Ranges", "Content-Disposition"],
      maxAge: 86400,
    }),
  );

  app.use("*", createRequestLogMiddleware(deps.logger));

  app.route(
    "/",
    healthRoute({
      version: deps.version,
      startedAt: deps.startedAt,
      thumbnails: deps.thumbnails,
    }),
  );

  app.route(
    API_PREFIX,
    fileRoutes({
      listing: deps.listing,
      discovery: deps.discovery,
      listingConfig: deps.config.listing,
      skipHiddenByDefault: deps.config.storage.skipHiddenByDefault,
      logger: deps.logger,
    }),
  );

  app.route(
    API_PREFIX,
    transferRoutes({
      resolver: deps.resolver,
      uploads: deps.config.uploads,
      logger: deps.logger,
    }),
  );

  app.route(API_PREFIX, mutationRoutes({ mutations: deps.mutations }));

  app.route(API_PREFIX, thumbnailRoutes({ thumbnails: deps.thumbnails }));

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof FileServiceError) {
      if (err.clientError) {
        deps.logger.warn({ err, path: c.req.path }, err.message);
      } else {
        deps.logger.error({ err, path: c.req.path }, err.message);
      }
      if (err instanceof RangeNotSatisfiableError) {
        c.header("Content-Range", `bytes */${err.size}`);
      }
      return c.json(err.toJSON(), statusOf(err));
    }

    deps.logger.error({ err }, "Unhandled error");
    return c.json(
      {
        error: {
          code: 500,
          error_code: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  });

  // 404 fallback
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 404,
          error_code: "NOT_FOUND",
          message: "Not found",
        },
      },
      404,
    );
  });

  return app;
}

const ERROR_STATUSES = [400, 404, 409, 413, 416, 422, 500] as const satisfies readonly ContentfulStatusCode[];

function statusOf(err: FileServiceError): ContentfulStatusCode {
  return ERROR_STATUSES.find((status) => status === err.code) ?? 500;
}
