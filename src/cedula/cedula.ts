/**
 * Cedula (Dominican Republic national identification number).
 *
 * An 11-digit number issued by the Dominican Republic government to citizens
 * and residents. The last digit is a Luhn check digit, except for a set of
 * historically issued numbers accepted by {@link isWhitelisted}.
 *
 * @example
 * ```typescript
 * validate('001-1391820-5') // '00113918205'
 * isValid('00113918204')    // false
 * format('22400022111')     // '224-0002211-1'
 * ```
 */

import { clean } from '../validators/clean.js'
import { isValidLuhn } from '../validators/luhn.js'
import type { DgiiRecord, LookupOptions, RegistrationLookup } from '../dgii/types.js'
import { ValidationError } from './errors.js'
import { isWhitelisted } from './whitelist.js'

export const CEDULA_LENGTH = 11

const SEPARATORS = ' -'
const ASCII_DIGITS = /^[0-9]+$/

/** Registration data for a cedula, as reported by DGII */
export type CedulaRegistration = Omit<DgiiRecord, 'rnc'> & { cedula: string }

/**
 * Convert the number to its minimal representation: separators removed,
 * surrounding whitespace trimmed.
 */
export function compact(input: string): string {
  return clean(input, SEPARATORS).trim()
}

/**
 * Check that the number is a valid cedula.
 *
 * @returns The compact form of the number
 * @throws ValidationError with code INVALID_FORMAT, INVALID_LENGTH or INVALID_CHECKSUM
 */
export function validate(input: string): string {
  const number = compact(input)
  if (!ASCII_DIGITS.test(number)) {
    throw new ValidationError('INVALID_FORMAT')
  }
  // Whitelisted numbers are accepted whatever their length
  if (isWhitelisted(number)) {
    return number
  }
  if (number.length !== CEDULA_LENGTH) {
    throw new ValidationError('INVALID_LENGTH')
  }
  if (!isValidLuhn(number)) {
    throw new ValidationError('INVALID_CHECKSUM')
  }
  return number
}

/** Non-throwing variant of {@link validate}. */
export function isValid(input: string): boolean {
  try {
    validate(input)
    return true
  } catch (err) {
    if (err instanceof ValidationError) {
      return false
    }
    throw err
  }
}

/**
 * Reformat the number to the standard `XXX-XXXXXXX-X` presentation.
 *
 * The input is only compacted, not validated. Run {@link validate} first:
 * anything but 11 digits produces a malformed result.
 */
export function format(input: string): string {
  const number = compact(input)
  return [number.slice(0, 3), number.slice(3, -1), number.slice(-1)].join('-')
}

/**
 * Look up the registration of a cedula with DGII.
 *
 * Resolves to null when the service does not know the number.
 */
export async function checkDgii(
  input: string,
  lookup: RegistrationLookup,
  options?: LookupOptions,
): Promise<CedulaRegistration | null> {
  const record = await lookup.lookup(compact(input), options)
  if (!record) {
    return null
  }
  const { rnc, ...rest } = record
  return { cedula: rnc, ...rest }
}
