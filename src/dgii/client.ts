/**
 * SOAP client for the DGII "WSMovilDGII" taxpayer lookup service.
 *
 * Stateless aside from the endpoint URL and default timeout. Throws
 * DgiiError on transport failures, non-2xx responses and payloads that do
 * not match the expected shape. Does NOT retry.
 */

import { XMLBuilder, XMLParser } from 'fast-xml-parser'
import { Value } from '@sinclair/typebox/value'
import { DgiiContribuyenteSchema, type DgiiContribuyente } from './schemas.js'
import type { DgiiRecord, LookupOptions, RegistrationLookup } from './types.js'

export const DGII_DEFAULT_URL = 'https://dgii.gov.do/wsMovilDGII/WSMovilDGII.asmx'
export const DGII_DEFAULT_TIMEOUT_MS = 30_000

/** AbortSignal.timeout rejects delays outside 0..2^32-1 */
const MAX_SIGNAL_TIMEOUT_MS = 4294967295

const SOAP_NS = 'http://schemas.xmlsoap.org/soap/envelope/'
const DGII_NS = 'http://dgii.gov.do/'

/** Returned in place of a JSON payload when DGII has no match */
const NOT_FOUND = '0'
const RESULT_SEPARATOR = '@@@'

/** Typed error thrown when a DGII lookup cannot be completed. */
export class DgiiError extends Error {
  readonly statusCode?: number

  constructor(message: string, statusCode?: number, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DgiiError'
    this.statusCode = statusCode
  }
}

const builder = new XMLBuilder({ ignoreAttributes: false, attributeNamePrefix: '@_' })
const parser = new XMLParser({ removeNSPrefix: true, parseTagValue: false })

/** Build the GetContribuyentes envelope, searching by number for one row. */
export function buildGetContribuyentesEnvelope(number: string): string {
  return builder.build({
    'soap:Envelope': {
      '@_xmlns:soap': SOAP_NS,
      'soap:Body': {
        GetContribuyentes: {
          '@_xmlns': DGII_NS,
          value: number,
          patronBusqueda: 0, // 0 = by number, 1 = by name
          inicioFilas: 1,
          filaFilas: 1,
          IMEI: '',
        },
      },
    },
  })
}

function child(node: unknown, key: string): unknown {
  if (node === null || typeof node !== 'object') {
    return undefined
  }
  const value: unknown = Reflect.get(node, key)
  return value
}

/** Pull the GetContribuyentesResult text out of a SOAP response body. */
export function extractGetContribuyentesResult(xml: string): string {
  let doc: unknown
  try {
    doc = parser.parse(xml)
  } catch (err) {
    throw new DgiiError('GetContribuyentes returned malformed XML', undefined, { cause: err })
  }
  const result = ['Envelope', 'Body', 'GetContribuyentesResponse', 'GetContribuyentesResult']
    .reduce<unknown>((node, key) => child(node, key), doc)
  if (typeof result !== 'string') {
    throw new DgiiError('GetContribuyentes response has no GetContribuyentesResult')
  }
  return result
}

function toRecord(data: DgiiContribuyente): DgiiRecord {
  const record: DgiiRecord = {
    rnc: data.RGE_RUC.trim(),
    name: data.RGE_NOMBRE.trim(),
    status: String(data.ESTATUS),
    category: String(data.CATEGORIA),
    payment_regime: String(data.REGIMEN_PAGOS),
  }
  const commercialName = data.NOMBRE_COMERCIAL?.trim()
  if (commercialName) {
    record.commercial_name = commercialName
  }
  return record
}

/**
 * Parse a GetContribuyentesResult payload.
 *
 * @returns null when DGII reports no match, otherwise the first record
 */
export function parseGetContribuyentesResult(result: string): DgiiRecord | null {
  if (result === NOT_FOUND) {
    return null
  }
  const [first] = result.split(RESULT_SEPARATOR)
  // DGII leaves raw control characters inside its JSON strings
  const json = first.replace(/\n/g, '\\n').replace(/\t/g, '\\t')

  let data: unknown
  try {
    data = JSON.parse(json)
  } catch (err) {
    throw new DgiiError('GetContribuyentesResult is not valid JSON', undefined, { cause: err })
  }
  if (!Value.Check(DgiiContribuyenteSchema, data)) {
    const fields = [...Value.Errors(DgiiContribuyenteSchema, data)]
      .map((e) => `${e.path}: ${e.message}`)
      .join(', ')
    throw new DgiiError(`GetContribuyentesResult has an unexpected shape (${fields})`)
  }
  return toRecord(data)
}

export class DgiiClient implements RegistrationLookup {
  constructor(
    private readonly url: string = DGII_DEFAULT_URL,
    private readonly defaultTimeoutMs: number = DGII_DEFAULT_TIMEOUT_MS,
  ) {}

  /**
   * Look up a taxpayer by RNC or cedula.
   * POST GetContribuyentes
   */
  async lookup(number: string, options?: LookupOptions): Promise<DgiiRecord | null> {
    const timeoutMs = options?.timeoutMs ?? this.defaultTimeoutMs
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_SIGNAL_TIMEOUT_MS) {
      throw new RangeError(`Invalid DGII timeout ${timeoutMs}: expected whole milliseconds from 1 to ${MAX_SIGNAL_TIMEOUT_MS}`)
    }

    let res: Response
    try {
      res = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'text/xml; charset=utf-8',
          SOAPAction: `"${DGII_NS}GetContribuyentes"`,
        },
        body: buildGetContribuyentesEnvelope(number),
        signal: AbortSignal.timeout(timeoutMs),
      })
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new DgiiError(`GetContribuyentes request failed: ${reason}`, undefined, { cause: err })
    }
    if (!res.ok) {
      throw new DgiiError(`GetContribuyentes failed: ${res.status}`, res.status)
    }

    return parseGetContribuyentesResult(extractGetContribuyentesResult(await res.text()))
  }
}
