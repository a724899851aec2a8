export const ErrorCategory = {
  VALIDATION: 'validation',
  DECODE: 'decode',
  SIGNATURE: 'signature',
  CLAUSE: 'clause',
  NETWORK: 'network',
} as const

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory]

export const ErrorCode = {
  INVALID_FIELD: 'INVALID_FIELD',
  INVALID_ADDRESS: 'INVALID_ADDRESS',
  INVALID_PRIVATE_KEY: 'INVALID_PRIVATE_KEY',
  INVALID_RLP: 'INVALID_RLP',
  INVALID_STRUCTURE: 'INVALID_STRUCTURE',
  UNKNOWN_TX_TYPE: 'UNKNOWN_TX_TYPE',
  INVALID_SIGNATURE_LENGTH: 'INVALID_SIGNATURE_LENGTH',
  RECOVERY_FAILED: 'RECOVERY_FAILED',
  NOT_SIGNED: 'NOT_SIGNED',
  DELEGATION_REQUIRED: 'DELEGATION_REQUIRED',
  EMPTY_DEPLOY: 'EMPTY_DEPLOY',
  REQUEST_FAILED: 'REQUEST_FAILED',
  TIMEOUT: 'TIMEOUT',
  REVERTED: 'REVERTED',
} as const

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode]

export interface ThorkitErrorOptions {
  code: ErrorCode
  category: ErrorCategory
  /** Field path such as `transaction.clauses[0].to` */
  path?: string
  cause?: unknown
}

/**
 * Base error class for every error raised by the thorkit packages
 */
export class ThorkitError extends Error {
  public readonly code: ErrorCode
  public readonly category: ErrorCategory
  public readonly path?: string

  constructor(message: string, options: ThorkitErrorOptions) {
    super(
      options.path !== undefined ? `${options.path}: ${message}` : message,
      { cause: options.cause },
    )
    this.name = this.constructor.name
    this.code = options.code
    this.category = options.category
    this.path = options.path

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      path: this.path,
    }
  }
}

type FieldErrorCode =
  | typeof ErrorCode.INVALID_FIELD
  | typeof ErrorCode.INVALID_ADDRESS
  | typeof ErrorCode.INVALID_PRIVATE_KEY

/**
 * Wrong byte length, out-of-range numeric or malformed hex.
 */
export class FieldValidationError extends ThorkitError {
  constructor(
    message: string,
    options: { code?: FieldErrorCode; path?: string; cause?: unknown } = {},
  ) {
    super(message, {
      code: options.code ?? ErrorCode.INVALID_FIELD,
      category: ErrorCategory.VALIDATION,
      path: options.path,
      cause: options.cause,
    })
  }
}

type DecodeErrorCode =
  | typeof ErrorCode.INVALID_RLP
  | typeof ErrorCode.INVALID_STRUCTURE
  | typeof ErrorCode.UNKNOWN_TX_TYPE

/**
 * Wrong field count, unknown type prefix or a list where bytes were expected.
 */
export class DecodeError extends ThorkitError {
  constructor(
    message: string,
    options: { code?: DecodeErrorCode; path?: string; cause?: unknown } = {},
  ) {
    super(message, {
      code: options.code ?? ErrorCode.INVALID_STRUCTURE,
      category: ErrorCategory.DECODE,
      path: options.path,
      cause: options.cause,
    })
  }
}

type SignatureErrorCode =
  | typeof ErrorCode.INVALID_SIGNATURE_LENGTH
  | typeof ErrorCode.RECOVERY_FAILED
  | typeof ErrorCode.NOT_SIGNED
  | typeof ErrorCode.DELEGATION_REQUIRED

export class SignatureError extends ThorkitError {
  constructor(
    message: string,
    options: { code: SignatureErrorCode; cause?: unknown },
  ) {
    super(message, {
      code: options.code,
      category: ErrorCategory.SIGNATURE,
      cause: options.cause,
    })
  }
}

export class ClauseError extends ThorkitError {
  constructor(message: string, options: { path?: string } = {}) {
    super(message, {
      code: ErrorCode.EMPTY_DEPLOY,
      category: ErrorCategory.CLAUSE,
      path: options.path,
    })
  }
}

export class NetworkError extends ThorkitError {
  public readonly status?: number

  constructor(
    message: string,
    options: {
      code?: typeof ErrorCode.REQUEST_FAILED | typeof ErrorCode.TIMEOUT
      status?: number
      cause?: unknown
    } = {},
  ) {
    super(message, {
      code: options.code ?? ErrorCode.REQUEST_FAILED,
      category: ErrorCategory.NETWORK,
      cause: options.cause,
    })
    this.status = options.status
  }
}

export class TransactionRevertedError extends ThorkitError {
  public readonly txId: string

  constructor(txId: string, reason: string) {
    super(`transaction ${txId} reverted: ${reason}`, {
      code: ErrorCode.REVERTED,
      category: ErrorCategory.NETWORK,
    })
    this.txId = txId
  }
}

export function isThorkitError(err: unknown): err is ThorkitError {
  return err instanceof ThorkitError
}
