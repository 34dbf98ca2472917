import { readFileSync } from 'node:fs'
import { Type } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'

/**
 * Cedulas that were issued even though they fail the Luhn check.
 *
 * Entries are stored in compact form and matched by exact string equality.
 * A few predate the 11-digit format and are shorter.
 */

const WhitelistSchema = Type.Array(Type.String({ pattern: '^\\d+$' }))

const WHITELIST_PATH = new URL('../../data/cedula-whitelist.json', import.meta.url)

function loadWhitelist(path: URL): ReadonlySet<string> {
  const data: unknown = JSON.parse(readFileSync(path, 'utf-8'))
  if (!Value.Check(WhitelistSchema, data)) {
    const first = Value.Errors(WhitelistSchema, data).First()
    throw new Error(
      `Invalid cedula whitelist at ${path.pathname}: ${first ? `${first.path} ${first.message}` : 'schema mismatch'}`,
    )
  }
  return new Set(data)
}

/** Not re-exported from the package: callers get {@link isWhitelisted} */
export const CEDULA_WHITELIST: ReadonlySet<string> = loadWhitelist(WHITELIST_PATH)

/** Exact-match membership test against the whitelist. */
export function isWhitelisted(number: string): boolean {
  return CEDULA_WHITELIST.has(number)
}
