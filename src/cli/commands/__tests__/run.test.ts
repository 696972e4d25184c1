/**
 * Unit tests for the `colloquy run` command
 *
 * Runs whole batches against a temporary config directory, a temporary
 * SQLite file and a scripted model client; nothing leaves the process.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { access, mkdir, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { z } from 'zod'
import { buildCliOverrides, runRunAction, RUN_EXIT_ERROR, RUN_EXIT_SUCCESS } from '../run.js'
import type { CompletionRequest, ModelClient } from '../../../modules/agent/index.js'
import type { ProviderConfig } from '../../../modules/config/index.js'
import { captureOutput } from './capture-output.js'

let testDir: string
let configDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `colloquy-run-cmd-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  configDir = join(testDir, '.colloquy')
  globalConfigDir = join(testDir, 'global')
  await mkdir(configDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })

  await writeFile(
    join(testDir, 'problems.json'),
    JSON.stringify(
      ['p1', 'p2', 'p3'].map((id) => ({
        id,
        category: 'arithmetic',
        problem_statement: `What is the answer to ${id}?`,
        ground_answer: '42',
        difficulty: 'easy',
      })),
    ),
    'utf-8',
  )

  await writeFile(
    join(configDir, 'config.yaml'),
    [
      'global:',
      `  database_path: ${join(testDir, 'db', 'colloquy.db')}`,
      `  output_dir: ${join(testDir, 'out')}`,
      '  max_concurrency: 3',
      'problems:',
      `  path: ${join(testDir, 'problems.json')}`,
      'providers:',
      '  fake:',
      '    api_key_env: FAKE_API_KEY',
      'agents:',
      '  - { llm_id: alpha, provider: fake, model: model-solver, temperature: 0.2, top_p: 0.9 }',
      '  - { llm_id: beta, provider: fake, model: model-solver, temperature: 0.7, top_p: 0.9 }',
      '  - { llm_id: gamma, provider: fake, model: model-judge, temperature: 0.2, top_p: 0.9 }',
      '',
    ].join('\n'),
    'utf-8',
  )
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// Scripted model client
// ---------------------------------------------------------------------------

interface ClientLog {
  apiKeys: string[]
  calls: string[]
}

function scriptedClientFactory(
  log: ClientLog,
  options: { failAssessments?: boolean; rejectReviewsAtTemperature?: number } = {},
): (provider: ProviderConfig, apiKey: string) => ModelClient {
  return (_provider, apiKey) => {
    log.apiKeys.push(apiKey)
    return {
      complete(request: CompletionRequest): Promise<string> {
        log.calls.push(`${request.model}:${request.schemaName}`)
        switch (request.schemaName) {
          case 'role_assessment': {
            if (options.failAssessments === true) return Promise.reject(new Error('upstream unavailable'))
            const judge = request.model === 'model-judge' ? 0.9 : 0.1
            return Promise.resolve(
              JSON.stringify({
                role_scores: [
                  { role: 'Judge', score: judge },
                  { role: 'Solver', score: 1 - judge },
                ],
                reasoning: 'scripted',
              }),
            )
          }
          case 'problem_solution':
            return Promise.resolve(JSON.stringify({ answer: '42', reasoning: ['six times seven'] }))
          case 'problem_solution_review':
            if (request.temperature === options.rejectReviewsAtTemperature) {
              return Promise.reject(new Error(`rejected key ${apiKey}`))
            }
            return Promise.resolve(
              JSON.stringify({
                evaluation: { strengths: ['right'], weaknesses: [], errors: [], suggested_changes: [] },
                overall_assessment: 'correct',
                confidence_score: 0.9,
              }),
            )
          default:
            return Promise.resolve(JSON.stringify({ refined_answer: '42', reasoning: ['confirmed'] }))
        }
      },
    }
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

// ---------------------------------------------------------------------------
// buildCliOverrides
// ---------------------------------------------------------------------------

describe('buildCliOverrides', () => {
  it('is empty without flags', () => {
    expect(buildCliOverrides({ outputFormat: 'text' })).toEqual({})
  })

  it('maps flags onto config keys', () => {
    expect(
      buildCliOverrides({ outputFormat: 'text', problemsPath: 'set.json', take: 2, maxConcurrency: 4 }),
    ).toEqual({
      global: { max_concurrency: 4 },
      problems: { path: 'set.json', take: 2 },
    })
  })
})

// ---------------------------------------------------------------------------
// runRunAction
// ---------------------------------------------------------------------------

describe('runRunAction', () => {
  it('debates the selected problems and prints a table', async () => {
    const log: ClientLog = { apiKeys: [], calls: [] }
    const output = captureOutput()

    const exitCode = await runRunAction({
      configDir,
      globalConfigDir,
      skip: 1,
      take: 1,
      outputFormat: 'text',
      env: { FAKE_API_KEY: 'test-secret' },
      clientFactory: scriptedClientFactory(log),
    })
    output.restore()

    expect(exitCode).toBe(RUN_EXIT_SUCCESS)
    expect(log.apiKeys).toEqual(['test-secret'])
    const stdout = output.getStdout()
    expect(stdout).toContain('Problem | Status    | Run')
    expect(stdout).toMatch(/^p2 +\| completed \| /m)
    expect(stdout).toContain('| gamma | alpha, beta | 2/2')
    expect(stdout).toContain('1 completed, 0 failed')
    expect(stdout).not.toContain('p1 ')
  })

  it('writes JSON output and mirrors every document', async () => {
    const log: ClientLog = { apiKeys: [], calls: [] }
    const output = captureOutput()

    const exitCode = await runRunAction({
      configDir,
      globalConfigDir,
      take: 1,
      outputFormat: 'json',
      version: '1.2.3',
      env: { FAKE_API_KEY: 'test-secret' },
      clientFactory: scriptedClientFactory(log),
    })
    output.restore()

    expect(exitCode).toBe(RUN_EXIT_SUCCESS)
    const parsed: unknown = JSON.parse(output.getStdout())
    expect(parsed).toMatchObject({
      version: '1.2.3',
      command: 'colloquy run',
      data: { completed: 1, failed: 0, outcomes: [{ status: 'completed', problemId: 'p1' }] },
    })

    const runId = getRunId(parsed)
    expect(await exists(join(testDir, 'out', runId, '_session', 'p1', 'Runs', `${runId}.json`))).toBe(true)
    expect(await exists(join(testDir, 'db', 'colloquy.db'))).toBe(true)
  })

  it('never calls the judge model after role assessment', async () => {
    const log: ClientLog = { apiKeys: [], calls: [] }
    const output = captureOutput()

    await runRunAction({
      configDir,
      globalConfigDir,
      take: 1,
      outputFormat: 'text',
      env: { FAKE_API_KEY: 'test-secret' },
      clientFactory: scriptedClientFactory(log),
    })
    output.restore()

    expect(log.calls.filter((c) => c.startsWith('model-judge:'))).toEqual(['model-judge:role_assessment'])
  })

  it('fails up front when an API key is missing', async () => {
    const log: ClientLog = { apiKeys: [], calls: [] }
    const output = captureOutput()

    const exitCode = await runRunAction({
      configDir,
      globalConfigDir,
      outputFormat: 'text',
      env: {},
      clientFactory: scriptedClientFactory(log),
    })
    output.restore()

    expect(exitCode).toBe(RUN_EXIT_ERROR)
    expect(output.getStderr()).toBe('Error: Required credential is not set: FAKE_API_KEY\n')
    expect(log.calls).toEqual([])
  })

  it('fails when the dataset cannot be read', async () => {
    const output = captureOutput()

    const exitCode = await runRunAction({
      configDir,
      globalConfigDir,
      problemsPath: join(testDir, 'missing.json'),
      outputFormat: 'text',
      env: { FAKE_API_KEY: 'test-secret' },
      clientFactory: scriptedClientFactory({ apiKeys: [], calls: [] }),
    })
    output.restore()

    expect(exitCode).toBe(RUN_EXIT_ERROR)
    expect(output.getStderr()).toContain('Error: Cannot read problem dataset')
  })

  it('scrubs resolved API keys from the printed report', async () => {
    const output = captureOutput()

    const exitCode = await runRunAction({
      configDir,
      globalConfigDir,
      take: 1,
      outputFormat: 'json',
      env: { FAKE_API_KEY: 'test-secret-key' },
      clientFactory: scriptedClientFactory({ apiKeys: [], calls: [] }, { rejectReviewsAtTemperature: 0.7 }),
    })
    output.restore()

    expect(exitCode).toBe(RUN_EXIT_SUCCESS)
    const stdout = output.getStdout()
    expect(stdout).toContain('"message": "Model client failed: rejected key ***"')
    expect(stdout).not.toContain('test-secret-key')
  })

  it('reports failed problems and exits with an error code', async () => {
    const output = captureOutput()

    const exitCode = await runRunAction({
      configDir,
      globalConfigDir,
      take: 2,
      outputFormat: 'text',
      env: { FAKE_API_KEY: 'test-secret' },
      clientFactory: scriptedClientFactory({ apiKeys: [], calls: [] }, { failAssessments: true }),
    })
    output.restore()

    expect(exitCode).toBe(RUN_EXIT_ERROR)
    const stdout = output.getStdout()
    expect(stdout).toContain('INSUFFICIENT_AGENTS: At least 3 assessed agents required, got 0')
    expect(stdout).toContain('0 completed, 2 failed')
  })
})

const RunOutputSchema = z.object({
  data: z.object({ outcomes: z.array(z.object({ runId: z.string() })).min(1) }),
})

function getRunId(parsed: unknown): string {
  const [first] = RunOutputSchema.parse(parsed).data.outcomes
  if (first === undefined) throw new Error('run id missing from output')
  return first.runId
}
