/**
 * Request validation. Failures are thrown as InvalidRequestError and rendered
 * by the app's error handler in the same shape as conversion errors:
 * `{ error, code, issues }`.
 */

import type { Context } from 'hono'
import type { z } from 'zod'
import { formatIssues } from '@geomesh/converter'

export class InvalidRequestError extends Error {
  readonly code = 'INVALID_REQUEST'

  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message)
    this.name = 'InvalidRequestError'
  }
}

export async function readBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    throw new InvalidRequestError('Invalid JSON body.', [])
  }

  const result = schema.safeParse(body)
  if (!result.success) throw new InvalidRequestError('Invalid request body.', formatIssues(result.error))
  return result.data
}

/** Query string values arrive as strings; schemas coerce what they need. */
export function readQuery<T extends z.ZodTypeAny>(c: Context, schema: T): z.infer<T> {
  const result = schema.safeParse(c.req.query())
  if (!result.success) throw new InvalidRequestError('Invalid query.', formatIssues(result.error))
  return result.data
}
