/**
 * Remove every occurrence of the given characters from a string.
 *
 * @param value - Raw input
 * @param deleteChars - Characters to strip, e.g. `' -'`
 */
export function clean(value: string, deleteChars: string): string {
  let result = ''
  for (const ch of value) {
    if (!deleteChars.includes(ch)) result += ch
  }
  return result
}
