/** Per-call options for a registration lookup. */
export interface LookupOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs?: number
}

/**
 * Taxpayer registration as returned by DGII, with its keys translated.
 *
 * Codes are kept as the strings DGII sends:
 * - status: 1 inactive, 2 active
 * - payment_regime: 1 N/D, 2 NORMAL, 3 PST
 */
export interface DgiiRecord {
  rnc: string
  name: string
  commercial_name?: string
  status: string
  category: string
  payment_regime: string
}

/**
 * A service that can look up the registration behind an identifier.
 *
 * Resolves to null when the number is invalid or unknown to the service.
 */
export interface RegistrationLookup {
  lookup(number: string, options?: LookupOptions): Promise<DgiiRecord | null>
}
