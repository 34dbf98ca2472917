export {
  CEDULA_LENGTH,
  compact,
  validate,
  isValid,
  format,
  checkDgii,
  type CedulaRegistration,
} from './cedula.js'
export { ValidationError, type ValidationErrorCode } from './errors.js'
export { isWhitelisted } from './whitelist.js'
