import type { z } from "zod";
import { InvalidRequestError } from "@filedock/core/errors";

/** Parses request input with a zod schema; failures become 400 INVALID_REQUEST. */
export function parseInput<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join(".");
    throw new InvalidRequestError(
      field ? `Invalid ${field}: ${issue.message}` : issue.message,
    );
  }
  return result.data;
}
