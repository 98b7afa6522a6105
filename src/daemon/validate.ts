import type { z } from 'zod'
import { ValidationError } from './errors'

/**
 * Parse a request body against `schema`, throwing ValidationError (→ 400)
 * for the first issue. A missing body is validated as `{}`.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body ?? {})
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue.path.join('.') || 'body'
    throw new ValidationError(field, `${field}: ${issue.message}`)
  }
  return result.data
}
