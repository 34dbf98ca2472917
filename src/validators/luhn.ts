/**
 * Luhn (ISO/IEC 7812, "modulus 10 double-add-double") check digit primitive.
 *
 * Independent of any particular identifier: callers decide length and
 * format rules and use these functions only for the check digit.
 *
 * @see https://en.wikipedia.org/wiki/Luhn_algorithm
 */

const DIGITS = /^\d+$/

/**
 * Compute the Luhn checksum of a digit string, including its check digit.
 *
 * Walking from the rightmost digit, every second digit is doubled (the
 * check digit itself is not). Doubled values above 9 have 9 subtracted,
 * which equals summing their digits.
 *
 * @returns The sum modulo 10; 0 means the string carries a valid check digit
 */
export function luhnChecksum(digits: string): number {
  let sum = 0
  for (let i = digits.length - 1; i >= 0; i--) {
    const positionFromRight = digits.length - 1 - i
    let digit = Number(digits[i])
    if (positionFromRight % 2 === 1) {
      digit *= 2
      if (digit > 9) digit -= 9
    }
    sum += digit
  }
  return sum % 10
}

/**
 * Check whether a string of ASCII digits passes the Luhn check.
 * Empty and non-numeric strings are never valid.
 */
export function isValidLuhn(value: string): boolean {
  if (!DIGITS.test(value)) {
    return false
  }
  return luhnChecksum(value) === 0
}

/**
 * Calculate the check digit that makes `digits` + result Luhn-valid.
 */
export function calcLuhnCheckDigit(digits: string): string {
  if (!DIGITS.test(digits)) {
    throw new RangeError(`Cannot compute a check digit for non-numeric input "${digits}"`)
  }
  const checksum = luhnChecksum(digits + '0')
  return String((10 - checksum) % 10)
}
