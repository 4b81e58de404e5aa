import { Hono, type Context } from "hono";
import { z } from "zod";
import { InvalidRequestError } from "@filedock/core/errors";
import type { MutationCoordinator } from "@filedock/core/mutations";
import { createBodyLimit, DEFAULT_MAX_SIZE } from "../middleware/body-limit.js";
import { parseInput } from "../validation.js";

export interface MutationRouteDeps {
  mutations: MutationCoordinator;
}

const CreateFolderSchema = z.object({
  path: z.string().optional(),
  foldername: z.string({ error: "foldername is required" }),
});

const MoveSchema = z
  .object({
    oldPath: z.string().optional(),
    newPath: z.string().optional(),
    old_path: z.string().optional(),
    new_path: z.string().optional(),
  })
  .transform((body) => ({
    oldPath: body.oldPath ?? body.old_path,
    newPath: body.newPath ?? body.new_path,
  }))
  .pipe(
    z.object({
      oldPath: z.string({ error: "oldPath is required" }).min(1, "oldPath is required"),
      newPath: z.string({ error: "newPath is required" }).min(1, "newPath is required"),
    }),
  );

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Collects arguments from the query string and, when present, a JSON or
 * form body. Body fields win over query fields.
 */
async function readArguments(c: Context): Promise<Record<string, unknown>> {
  const args: Record<string, unknown> = { ...c.req.query() };
  const contentType = c.req.header("content-type") ?? "";

  if (contentType.includes("application/json")) {
    const body: unknown = await c.req.json().catch(() => null);
    if (!isRecord(body)) {
      throw new InvalidRequestError("Body must be a JSON object");
    }
    return { ...args, ...body };
  }
  if (
    contentType.startsWith("multipart/form-data") ||
    contentType.startsWith("application/x-www-form-urlencoded")
  ) {
    return { ...args, ...(await c.req.parseBody()) };
  }
  return args;
}

export function mutationRoutes(deps: MutationRouteDeps): Hono {
  const app = new Hono();
  const limit = createBodyLimit(DEFAULT_MAX_SIZE, "Request body");

  // POST /createfolder: path + foldername
  app.post("/createfolder", limit, async (c) => {
    const input = parseInput(CreateFolderSchema, await readArguments(c));
    const result = await deps.mutations.createFolder(input.path, input.foldername);
    return c.json({ message: "Folder created", path: result.relPath }, 201);
  });

  // POST /mv: { oldPath, newPath } (snake_case accepted)
  app.post("/mv", limit, async (c) => {
    const input = parseInput(MoveSchema, await readArguments(c));
    const result = await deps.mutations.move(input.oldPath, input.newPath);
    return c.json({
      message: "Moved",
      from: result.from,
      to: result.to,
      method: result.method,
    });
  });

  return app;
}
