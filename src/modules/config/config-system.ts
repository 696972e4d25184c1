/**
 * Contract for loading Colloquy configuration.
 *
 * Layers, later ones winning: built-in defaults, global config.yaml, project
 * config.yaml, COLLOQUY_* environment variables, CLI flag overrides.
 */

import type { ColloquyConfig, PartialColloquyConfig } from './config-schema.js'

export interface ConfigSystemOptions {
  /** Directory holding the project config.yaml (default: <cwd>/.colloquy) */
  projectConfigDir?: string
  /** Directory holding the user config.yaml (default: ~/.colloquy) */
  globalConfigDir?: string
  /** Top layer, built from command-line flags */
  cliOverrides?: PartialColloquyConfig
  /** Source of COLLOQUY_* overrides (default: process.env) */
  env?: NodeJS.ProcessEnv
}

export interface ConfigSystem {
  /**
   * Read, merge and validate every layer.
   * @throws {ConfigError} for an unreadable file or an invalid result
   */
  load(): Promise<void>

  /** @throws {ConfigError} before `load()` has succeeded */
  getConfig(): ColloquyConfig

  /** Value at a dot-notation path such as `timeouts.solve_sec`, or undefined */
  get(key: string): unknown

  /** The loaded configuration with credentials masked, for display */
  getMasked(): unknown

  readonly isLoaded: boolean
}
