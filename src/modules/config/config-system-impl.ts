/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.colloquy/config.yaml)
 *     → project config      (./.colloquy/config.yaml)
 *     → environment vars    (COLLOQUY_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import { load as loadYaml } from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { ConfigError, describeError } from '../../core/errors.js'
import {
  ColloquyConfigSchema,
  PartialColloquyConfigSchema,
  type ColloquyConfig,
  type PartialColloquyConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../cli/utils/masking.js'

const logger = createLogger('config')

const CONFIG_FILE_NAME = 'config.yaml'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

type PlainObject = Record<string, unknown>

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/** Objects merge key by key; arrays and scalars replace. */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

/**
 * COLLOQUY_* variables and the config path each one sets. Only scalars can
 * come from the environment.
 */
const ENV_OVERRIDES: readonly (readonly [envVar: string, path: readonly string[]])[] = [
  ['COLLOQUY_LOG_LEVEL', ['global', 'log_level']],
  ['COLLOQUY_MAX_CONCURRENCY', ['global', 'max_concurrency']],
  ['COLLOQUY_MAX_CONCURRENT_SESSIONS', ['global', 'max_concurrent_sessions']],
  ['COLLOQUY_LOG_INTERVAL_SEC', ['global', 'log_interval_sec']],
  ['COLLOQUY_OUTPUT_DIR', ['global', 'output_dir']],
  ['COLLOQUY_DATABASE_PATH', ['global', 'database_path']],
  ['COLLOQUY_MIRROR_ARTIFACTS', ['global', 'mirror_artifacts']],
  ['COLLOQUY_PROBLEMS_PATH', ['problems', 'path']],
  ['COLLOQUY_PROBLEMS_SKIP', ['problems', 'skip']],
  ['COLLOQUY_PROBLEMS_TAKE', ['problems', 'take']],
  ['COLLOQUY_SOLVE_TIMEOUT_SEC', ['timeouts', 'solve_sec']],
]

/** `true`/`false` and numerals become booleans and numbers; anything else stays a string */
function coerceEnvValue(raw: string): unknown {
  if (raw === 'true' || raw === 'false') return raw === 'true'
  if (/^\d+$/.test(raw)) return parseInt(raw, 10)
  if (/^\d*\.\d+$/.test(raw)) return parseFloat(raw)
  return raw
}

function setByPath(target: PlainObject, path: readonly string[], value: unknown): void {
  const [head, ...rest] = path
  if (head === undefined) return
  if (rest.length === 0) {
    target[head] = value
    return
  }
  const existing = target[head]
  const child: PlainObject = isPlainObject(existing) ? existing : {}
  target[head] = child
  setByPath(child, rest, value)
}

/**
 * Partial config built from COLLOQUY_* variables. An overlay that fails
 * validation is logged and dropped as a whole.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialColloquyConfig {
  const overlay: PlainObject = {}
  for (const [envVar, path] of ENV_OVERRIDES) {
    const raw = env[envVar]
    if (raw !== undefined) setByPath(overlay, path, coerceEnvValue(raw))
  }

  const parsed = PartialColloquyConfigSchema.safeParse(overlay)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Ignoring invalid COLLOQUY_* overrides')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (Array.isArray(cursor)) {
      cursor = /^\d+$/.test(part) ? cursor[parseInt(part, 10)] : undefined
    } else if (isPlainObject(cursor)) {
      cursor = cursor[part]
    } else {
      return undefined
    }
  }
  return cursor
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: ColloquyConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialColloquyConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.colloquy')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.colloquy')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    let merged: PlainObject = structuredClone(DEFAULT_CONFIG)

    const fileLayers = await Promise.all([
      this._readLayer(join(this._globalConfigDir, CONFIG_FILE_NAME)),
      this._readLayer(join(this._projectConfigDir, CONFIG_FILE_NAME)),
    ])
    for (const layer of [...fileLayers, readEnvOverrides(this._env), this._cliOverrides]) {
      if (layer !== null) merged = deepMerge(merged, layer)
    }

    const result = ColloquyConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug(
      { agents: result.data.agents.length, maxConcurrency: result.data.global.max_concurrency },
      'Configuration loaded successfully'
    )
  }

  getConfig(): ColloquyConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  getMasked(): unknown {
    return deepMask(this.getConfig())
  }

  /** A missing file is no layer; an empty one is an empty layer. */
  private async _readLayer(filePath: string): Promise<PartialColloquyConfig | null> {
    let parsed: unknown
    try {
      parsed = loadYaml(await readFile(filePath, 'utf-8'))
    } catch (err) {
      if (isMissingFile(err)) return null
      throw new ConfigError(`Failed to read config file at ${filePath}: ${describeError(err).message}`, {
        filePath,
      })
    }
    if (parsed === null || parsed === undefined) return {}

    const layer = PartialColloquyConfigSchema.safeParse(parsed)
    if (!layer.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(layer.error.issues)}`, {
        filePath,
        issues: layer.error.issues,
      })
    }
    return layer.data
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
