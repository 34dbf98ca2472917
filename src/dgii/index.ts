export {
  DgiiClient,
  DgiiError,
  DGII_DEFAULT_URL,
  DGII_DEFAULT_TIMEOUT_MS,
  buildGetContribuyentesEnvelope,
  extractGetContribuyentesResult,
  parseGetContribuyentesResult,
} from './client.js'
export { DgiiContribuyenteSchema, type DgiiContribuyente } from './schemas.js'
export type { DgiiRecord, LookupOptions, RegistrationLookup } from './types.js'
