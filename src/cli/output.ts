/**
 * CLI output helpers.
 *
 * Plain text on process.stdout/stderr so tests can spy on the streams.
 */
export const output = {
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Prefixed with "OK:". */
  success(message: string): void {
    process.stdout.write('OK: ' + message + '\n')
  },

  /** Prefixed with "Error:", to stderr. */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /** Prefixed with "Warning:", to stderr. */
  warn(message: string): void {
    process.stderr.write('Warning: ' + message + '\n')
  },

  /** Print label/value pairs with the labels padded to a common width. */
  fields(entries: Array<[label: string, value: string]>): void {
    const width = Math.max(0, ...entries.map(([label]) => label.length))
    for (const [label, value] of entries) {
      process.stdout.write(`${label.padEnd(width)}  ${value}\n`)
    }
  },
}
