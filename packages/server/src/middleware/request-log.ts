import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";

/**
 * One info line per request once the response is ready. Bodies are never
 * logged; uploads only get their content type at debug.
 */
export function createRequestLogMiddleware(logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const started = performance.now();
    const contentType = c.req.header("content-type");
    if (contentType && c.req.method !== "GET") {
      logger.debug({ method: c.req.method, path: c.req.path, contentType }, "Request body");
    }

    await next();

    const query = c.req.query();
    logger.info(
      {
        method: c.req.method,
        path: c.req.path,
        ...(Object.keys(query).length > 0 && { query }),
        status: c.res.status,
        latencyMs: Math.round(performance.now() - started),
      },
      "Request handled",
    );
  };
}
