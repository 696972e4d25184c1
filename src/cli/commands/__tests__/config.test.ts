/**
 * Unit tests for the `colloquy config` command group
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { runConfigShow, CONFIG_EXIT_SUCCESS, CONFIG_EXIT_ERROR } from '../config.js'
import { captureOutput } from './capture-output.js'

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `colloquy-config-cmd-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, '.colloquy')
  globalConfigDir = join(testDir, 'global', '.colloquy')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

async function writeConfigYaml(content: string): Promise<void> {
  await writeFile(join(projectConfigDir, 'config.yaml'), content, 'utf-8')
}

const PROXY_CONFIG = `
global:
  log_level: debug
providers:
  proxy:
    base_url: https://proxy.example.com/sk-test-secret-placeholder-value
    api_key_env: PROXY_KEY
`

describe('config show', () => {
  it('prints the merged configuration as YAML', async () => {
    await writeConfigYaml(PROXY_CONFIG)
    const output = captureOutput()

    const exitCode = await runConfigShow({ projectConfigDir, globalConfigDir, env: {} })
    output.restore()

    expect(exitCode).toBe(CONFIG_EXIT_SUCCESS)
    const stdout = output.getStdout()
    expect(stdout.startsWith('# Colloquy configuration (credentials masked)\n\n')).toBe(true)
    expect(stdout).toContain('log_level: debug')
    expect(stdout).toContain('api_key_env: PROXY_KEY')
    expect(stdout).not.toContain('sk-test-secret')
  })

  it('masks key-shaped values in JSON output', async () => {
    await writeConfigYaml(PROXY_CONFIG)
    const output = captureOutput()

    const exitCode = await runConfigShow({ projectConfigDir, globalConfigDir, format: 'json', env: {} })
    output.restore()

    expect(exitCode).toBe(CONFIG_EXIT_SUCCESS)
    const parsed: unknown = JSON.parse(output.getStdout())
    expect(parsed).toMatchObject({
      global: { log_level: 'debug', max_concurrency: 5 },
      providers: { proxy: { base_url: 'https://proxy.example.com/***', api_key_env: 'PROXY_KEY' } },
    })
  })

  it('applies COLLOQUY_* environment overrides', async () => {
    const output = captureOutput()

    await runConfigShow({
      projectConfigDir,
      globalConfigDir,
      format: 'json',
      env: { COLLOQUY_MAX_CONCURRENCY: '9' },
    })
    output.restore()

    expect(JSON.parse(output.getStdout())).toMatchObject({ global: { max_concurrency: 9 } })
  })

  it('returns an error exit code for invalid configuration', async () => {
    await writeConfigYaml('global:\n  max_concurrency: 0\n')
    const output = captureOutput()

    const exitCode = await runConfigShow({ projectConfigDir, globalConfigDir, env: {} })
    output.restore()

    expect(exitCode).toBe(CONFIG_EXIT_ERROR)
    expect(output.getStderr()).toContain('Configuration error:')
    expect(output.getStdout()).toBe('')
  })

  it('prints a single value by key', async () => {
    await writeConfigYaml('timeouts:\n  solve_sec: 90\n')
    const output = captureOutput()

    const exitCode = await runConfigShow({ projectConfigDir, globalConfigDir, key: 'timeouts.solve_sec', env: {} })
    output.restore()

    expect(exitCode).toBe(CONFIG_EXIT_SUCCESS)
    expect(output.getStdout()).toBe('90\n')
  })

  it('masks a subtree printed by key', async () => {
    await writeConfigYaml(PROXY_CONFIG)
    const output = captureOutput()

    await runConfigShow({ projectConfigDir, globalConfigDir, key: 'providers.proxy', format: 'json', env: {} })
    output.restore()

    expect(JSON.parse(output.getStdout())).toEqual({
      base_url: 'https://proxy.example.com/***',
      api_key_env: 'PROXY_KEY',
    })
  })

  it('fails for a key with no value', async () => {
    const output = captureOutput()

    const exitCode = await runConfigShow({ projectConfigDir, globalConfigDir, key: 'timeouts.nope', env: {} })
    output.restore()

    expect(exitCode).toBe(CONFIG_EXIT_ERROR)
    expect(output.getStderr()).toBe('Configuration error: no value at "timeouts.nope"\n')
  })
})
