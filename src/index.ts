export * from './cedula/index.js'
export * from './dgii/index.js'
export { clean } from './validators/clean.js'
export { luhnChecksum, isValidLuhn, calcLuhnCheckDigit } from './validators/luhn.js'
export { loadConfig, ConfigError, DEFAULT_CONFIG } from './config/index.js'
export { CedulaConfigSchema, type CedulaConfig } from './types/config.js'
