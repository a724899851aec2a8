import { FieldValidationError, type SafeError, safeError } from '@thorkit/utils'

export function fieldError(
  path: string,
  message: string,
): SafeError<FieldValidationError> {
  return safeError(new FieldValidationError(message, { path }))
}
