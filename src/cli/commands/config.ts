/**
 * `colloquy config show` prints the configuration a run would use, after
 * every layer is merged and validated, with credentials masked.
 */

import { InvalidArgumentError, type Command } from 'commander'
import { dump } from 'js-yaml'
import { describeError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/index.js'
import { createLogger } from '../../utils/logger.js'
import { deepMask } from '../utils/masking.js'

const logger = createLogger('cli:config')

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1

export type ConfigShowFormat = 'yaml' | 'json'

export interface ConfigShowOptions {
  projectConfigDir?: string
  globalConfigDir?: string
  format?: ConfigShowFormat
  /** Dot-notation path of a single value to print, e.g. `timeouts.solve_sec` */
  key?: string
  env?: NodeJS.ProcessEnv
}

const YAML_HEADER = '# Colloquy configuration (credentials masked)\n\n'

function render(value: unknown, format: ConfigShowFormat, withHeader: boolean): string {
  if (format === 'json') return JSON.stringify(value, null, 2) + '\n'
  return (withHeader ? YAML_HEADER : '') + dump(value)
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const format = opts.format ?? 'yaml'
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })

  try {
    await system.load()
  } catch (err) {
    const { code, message } = describeError(err)
    logger.debug({ code }, 'Configuration rejected')
    process.stderr.write(`Configuration error: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }

  if (opts.key === undefined) {
    process.stdout.write(render(system.getMasked(), format, true))
    return CONFIG_EXIT_SUCCESS
  }

  const value = system.get(opts.key)
  if (value === undefined) {
    process.stderr.write(`Configuration error: no value at "${opts.key}"\n`)
    return CONFIG_EXIT_ERROR
  }
  process.stdout.write(render(deepMask(value), format, false))
  return CONFIG_EXIT_SUCCESS
}

function parseFormat(value: string): ConfigShowFormat {
  if (value === 'yaml' || value === 'json') return value
  throw new InvalidArgumentError('Expected "yaml" or "json".')
}

export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Inspect Colloquy configuration')
    .command('show')
    .description('Print the merged configuration with credentials masked')
    .option('--format <format>', 'yaml (default) or json', parseFormat, 'yaml')
    .option('--key <path>', 'Print only the value at this dot-notation path')
    .option('--config-dir <dir>', 'Project configuration directory (default: ./.colloquy)')
    .option('--global-config-dir <dir>', 'Global configuration directory (default: ~/.colloquy)')
    .action(async (opts: { format: ConfigShowFormat; key?: string; configDir?: string; globalConfigDir?: string }) => {
      process.exitCode = await runConfigShow({
        format: opts.format,
        ...(opts.key !== undefined && { key: opts.key }),
        ...(opts.configDir !== undefined && { projectConfigDir: opts.configDir }),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
    })
}
