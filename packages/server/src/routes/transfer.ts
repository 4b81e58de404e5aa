import { Hono, type Context } from "hono";
import { z } from "zod";
import { InvalidRequestError } from "@filedock/core/errors";
import type { PathResolver } from "@filedock/core/sandbox";
import {
  contentRange,
  ingestUpload,
  openForRead,
  type ReadHandle,
  type UploadResult,
} from "@filedock/core/streaming";
import type { ServerConfig } from "@filedock/core/schemas";
import type { Logger } from "pino";
import { createBodyLimit, MULTIPART_OVERHEAD } from "../middleware/body-limit.js";
import { readMultipartFile } from "../multipart.js";
import { parseInput } from "../validation.js";

export interface TransferRouteDeps {
  resolver: PathResolver;
  uploads: ServerConfig["uploads"];
  logger: Logger;
}

const DownloadQuerySchema = z.object({
  inline: z
    .enum(["true", "false", "1", "0"])
    .transform((value) => value === "true" || value === "1")
    .default(false),
});

const UploadFieldsSchema = z.object({
  location: z.string({ error: "location is required" }),
  user: z.string({ error: "user is required" }).min(1, "user is required"),
  filename: z.string().optional(),
  sha512: z
    .string()
    .regex(/^[0-9a-fA-F]{128}$/, "sha512 must be 128 hex characters")
    .optional(),
});

/** RFC 6266 header carrying both a plain and a UTF-8 encoded filename. */
export function contentDisposition(type: "attachment" | "inline", name: string): string {
  const plain = name.replace(/[^\x20-\x7e]|["\\]/g, "_");
  return `${type}; filename="${plain}"; filename*=UTF-8''${encodeURIComponent(name)}`;
}

function fileResponse(
  handle: ReadHandle,
  disposition: "attachment" | "inline",
  extra: Record<string, string> = {},
): Response {
  const headers = new Headers({
    "Content-Type": handle.contentType,
    "Content-Length": String(handle.length),
    "Accept-Ranges": "bytes",
    "Last-Modified": new Date(handle.modifiedTime).toUTCString(),
    "Content-Disposition": contentDisposition(disposition, handle.name),
    ...extra,
  });
  if (handle.range) {
    headers.set("Content-Range", contentRange(handle.range, handle.size));
  }
  return new Response(handle.stream, { status: handle.range ? 206 : 200, headers });
}

/** Reads a web stream chunk by chunk; cancels it if the consumer stops early. */
async function* readChunks(stream: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader();
  let finished = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
  }
}

function uploadResponse(result: UploadResult, user: string) {
  return {
    message: result.skipped ? "File already exists with identical content" : "File uploaded",
    filename: result.filename,
    location: result.location,
    rel_path: result.relPath,
    size: result.size,
    uploaded_by: user,
    sha512: result.sha512,
    skipped: result.skipped,
  };
}

export function transferRoutes(deps: TransferRouteDeps): Hono {
  const app = new Hono();
  const { resolver, uploads, logger } = deps;

  async function serveFile(c: Context, mode: "download" | "stream"): Promise<Response> {
    const handle = await openForRead(resolver, c.req.param("path"), {
      range: c.req.header("range"),
      logger,
    });
    if (mode === "stream") {
      return fileResponse(handle, "inline", { "Cache-Control": "no-cache" });
    }
    const { inline } = parseInput(DownloadQuerySchema, c.req.query());
    return fileResponse(handle, inline ? "inline" : "attachment");
  }

  // GET /file/<path>: download, optionally ranged
  app.get("/file/:path{.+}", (c) => serveFile(c, "download"));

  // GET /stream/<path>: seekable media playback
  app.get("/stream/:path{.+}", (c) => serveFile(c, "stream"));

  // POST /uploadfile: streamed multipart form, or the raw body with fields in the query
  app.post(
    "/uploadfile",
    createBodyLimit(uploads.maxBytes + MULTIPART_OVERHEAD),
    async (c) => {
      const contentType = c.req.header("content-type") ?? "";
      const uploadOptions = {
        maxBytes: uploads.maxBytes,
        createMissingDirectories: uploads.createMissingDirectories,
        logger,
      };

      const body = c.req.raw.body;
      if (body === null) {
        throw new InvalidRequestError("Request body is empty");
      }

      if (contentType.startsWith("multipart/form-data")) {
        const part = await readMultipartFile(body, contentType);
        try {
          const fields = parseInput(UploadFieldsSchema, {
            ...c.req.query(),
            ...part.fields,
            sha512: part.fields["sha512"] || c.req.query("sha512") || undefined,
          });
          const result = await ingestUpload(
            resolver,
            {
              location: fields.location,
              filename: part.filename,
              body: part.stream,
              sha512: fields.sha512,
            },
            uploadOptions,
          );
          return c.json(uploadResponse(result, fields.user));
        } finally {
          if (!part.stream.readableEnded) {
            part.discard();
          }
        }
      }

      const fields = parseInput(UploadFieldsSchema, c.req.query());
      const result = await ingestUpload(
        resolver,
        { location: fields.location, filename: fields.filename, body: readChunks(body), sha512: fields.sha512 },
        uploadOptions,
      );
      return c.json(uploadResponse(result, fields.user));
    },
  );

  return app;
}
