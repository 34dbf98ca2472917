import { DGII_DEFAULT_TIMEOUT_MS, DGII_DEFAULT_URL } from '../dgii/client.js'
import type { CedulaConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: CedulaConfig = {
  dgii: {
    url: DGII_DEFAULT_URL,
    timeoutMs: DGII_DEFAULT_TIMEOUT_MS,
  },
}
