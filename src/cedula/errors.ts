/** Reasons a number is rejected, reported in this order of precedence */
export type ValidationErrorCode = 'INVALID_FORMAT' | 'INVALID_LENGTH' | 'INVALID_CHECKSUM'

const DEFAULT_MESSAGES: Record<ValidationErrorCode, string> = {
  INVALID_FORMAT: 'The number has an invalid format.',
  INVALID_LENGTH: 'The number has an invalid length.',
  INVALID_CHECKSUM: "The number's checksum or check digit is invalid.",
}

/** Cedula validation failure with a typed code callers can branch on */
export class ValidationError extends Error {
  readonly code: ValidationErrorCode

  constructor(code: ValidationErrorCode, message: string = DEFAULT_MESSAGES[code]) {
    super(message)
    this.name = 'ValidationError'
    this.code = code
  }
}
