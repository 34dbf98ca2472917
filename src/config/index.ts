export { loadConfig, ConfigError, ENV_PREFIX } from './loader.js'
export { DEFAULT_CONFIG } from './defaults.js'
