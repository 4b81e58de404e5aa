import { bodyLimit } from 'hono/body-limit'
import type { MiddlewareHandler } from 'hono'
import { SizeLimitExceededError } from '@filedock/core/errors'

/** Allowance for multipart boundaries and the non-file form fields */
export const MULTIPART_OVERHEAD = 1 * 1024 * 1024

/** 1 MB: max body size for JSON and form mutation routes */
export const DEFAULT_MAX_SIZE = 1 * 1024 * 1024

/**
 * Creates a Hono body-limit middleware that returns 413 JSON on overflow.
 * `subject` names the body in the error message.
 */
export function createBodyLimit(maxSize: number, subject = 'Upload'): MiddlewareHandler {
  return bodyLimit({
    maxSize,
    onError: (c) => {
      return c.json(new SizeLimitExceededError(maxSize, subject).toJSON(), 413)
    },
  })
}
