import { Type, type Static } from '@sinclair/typebox'

/** Largest delay AbortSignal.timeout accepts (2^32 - 1 ms) */
export const MAX_TIMEOUT_MS = 4294967295

/** Request timeout in whole milliseconds, at least one second */
export const TimeoutMs = Type.Integer({ minimum: 1000, maximum: MAX_TIMEOUT_MS })

/** Configuration schema for cedula.config.json */
export const CedulaConfigSchema = Type.Object({
  dgii: Type.Object({
    url: Type.String({ minLength: 1, default: 'https://dgii.gov.do/wsMovilDGII/WSMovilDGII.asmx' }),
    timeoutMs: Type.Integer({ minimum: 1000, maximum: MAX_TIMEOUT_MS, default: 30000 }),
  }),
})

export type CedulaConfig = Static<typeof CedulaConfigSchema>
