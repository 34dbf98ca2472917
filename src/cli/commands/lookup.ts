import type { Command } from 'commander'
import { Value } from '@sinclair/typebox/value'
import { checkDgii, validate, ValidationError } from '../../cedula/index.js'
import { ConfigError, loadConfig } from '../../config/index.js'
import { DgiiClient, DgiiError } from '../../dgii/index.js'
import { MAX_TIMEOUT_MS, TimeoutMs, type CedulaConfig } from '../../types/config.js'
import { output } from '../output.js'

const STATUS_LABELS: Record<string, string> = { '1': 'inactive', '2': 'active' }
const PAYMENT_REGIME_LABELS: Record<string, string> = { '1': 'N/D', '2': 'NORMAL', '3': 'PST' }

function describeCode(code: string, labels: Record<string, string>): string {
  const label = labels[code]
  return label ? `${code} (${label})` : code
}

/**
 * Register the `lookup` command on the Commander program.
 *
 * Validates the number, then queries the DGII registration service.
 * Exit code 1 on any validation, configuration or service error.
 */
export function registerLookupCommand(program: Command): void {
  program
    .command('lookup')
    .description('Look up the DGII registration of a cedula')
    .argument('<number>', 'cedula to look up')
    .option('-c, --config <path>', 'configuration file path')
    .option('-t, --timeout <ms>', 'request timeout in milliseconds (overrides config)')
    .action(async (number: string, options: { config?: string; timeout?: string }) => {
      let config: CedulaConfig
      let cedula: string
      try {
        config = loadConfig(options.config)
        cedula = validate(number)
      } catch (err) {
        if (!(err instanceof ConfigError) && !(err instanceof ValidationError)) throw err
        output.error(err instanceof ValidationError ? `${number}: ${err.message}` : err.message)
        process.exit(1)
        return
      }

      const timeoutMs = options.timeout === undefined ? config.dgii.timeoutMs : Number(options.timeout)
      if (!Value.Check(TimeoutMs, timeoutMs)) {
        output.error(`Invalid timeout: ${options.timeout} (expected whole milliseconds from 1000 to ${MAX_TIMEOUT_MS})`)
        process.exit(1)
        return
      }

      try {
        const client = new DgiiClient(config.dgii.url, config.dgii.timeoutMs)
        const registration = await checkDgii(cedula, client, { timeoutMs })
        if (!registration) {
          output.warn(`${cedula} is not registered with DGII`)
          return
        }
        const entries: Array<[string, string]> = [
          ['Cedula', registration.cedula],
          ['Name', registration.name],
        ]
        if (registration.commercial_name) {
          entries.push(['Commercial name', registration.commercial_name])
        }
        entries.push(
          ['Status', describeCode(registration.status, STATUS_LABELS)],
          ['Category', registration.category],
          ['Payment regime', describeCode(registration.payment_regime, PAYMENT_REGIME_LABELS)],
        )
        output.fields(entries)
      } catch (err) {
        if (!(err instanceof DgiiError)) throw err
        output.error(`DGII lookup failed: ${err.message}`)
        process.exit(1)
      }
    })
}
