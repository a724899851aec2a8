import { FieldValidationError } from '@thorkit/utils'
import type { z } from 'zod'

/**
 * Parses `value` with `schema`, raising the first issue as a
 * FieldValidationError located at `path`.
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  path: string,
): z.output<S> {
  const result = schema.safeParse(value)
  if (result.success) return result.data
  const issue = result.error.issues[0]
  const location = [path, ...issue.path.map(String)].join('.')
  throw new FieldValidationError(issue.message, {
    path: location,
    cause: result.error,
  })
}
