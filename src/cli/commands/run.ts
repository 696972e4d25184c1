/**
 * `colloquy run` command
 *
 * Loads configuration and the problem dataset, builds the agent roster, and
 * debates every selected problem. Every record is written to the SQLite
 * document store (and mirrored to JSON files when `mirror_artifacts` is on).
 *
 * Usage:
 *   colloquy run                                  Debate every configured problem
 *   colloquy run --problems data/set.json         Use another dataset
 *   colloquy run --skip 10 --take 5               Debate problems 11 to 15
 *   colloquy run --max-concurrency 3              Agent calls in flight per session
 *   colloquy run --output-format json             JSON output
 *
 * Exit codes:
 *   0 - Every problem completed
 *   1 - Configuration, dataset or credential error, or a failed problem
 */

import { InvalidArgumentError, type Command } from 'commander'
import { describeError } from '../../core/errors.js'
import { createAgents, type CreateAgentsOptions } from '../../modules/agent/index.js'
import { createConfigSystem, type PartialColloquyConfig } from '../../modules/config/index.js'
import { DebateRunner } from '../../modules/debate-runner/index.js'
import {
  MirroredDocumentWriter,
  SqliteDocumentWriter,
  type DocumentWriter,
} from '../../modules/document-writer/index.js'
import { loadProblems } from '../../modules/problem-source/index.js'
import { createDatabaseService, type DatabaseService } from '../../persistence/database.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'
import { formatDuration } from '../../utils/helpers.js'
import { buildJsonOutput, formatBatchReport } from '../utils/formatting.js'
import { maskSecrets, providerSecrets } from '../utils/masking.js'

const logger = createLogger('run-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RUN_EXIT_SUCCESS = 0
export const RUN_EXIT_ERROR = 1

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RunOutputFormat = 'text' | 'json'

export interface RunActionOptions {
  /** Project .colloquy/ directory (default: <cwd>/.colloquy) */
  configDir?: string
  /** Global .colloquy/ directory (default: ~/.colloquy) */
  globalConfigDir?: string
  problemsPath?: string
  skip?: number
  take?: number
  maxConcurrency?: number
  outputFormat: RunOutputFormat
  version?: string
  /** Environment for COLLOQUY_* overrides and API keys (default: process.env) */
  env?: NodeJS.ProcessEnv
  clientFactory?: CreateAgentsOptions['clientFactory']
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Translate CLI flags into the highest-priority config layer.
 */
export function buildCliOverrides(opts: RunActionOptions): PartialColloquyConfig {
  const overrides: PartialColloquyConfig = {}
  if (opts.maxConcurrency !== undefined) {
    overrides.global = { max_concurrency: opts.maxConcurrency }
  }
  if (opts.problemsPath !== undefined || opts.skip !== undefined || opts.take !== undefined) {
    overrides.problems = {
      ...(opts.problemsPath !== undefined && { path: opts.problemsPath }),
      ...(opts.skip !== undefined && { skip: opts.skip }),
      ...(opts.take !== undefined && { take: opts.take }),
    }
  }
  return overrides
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value)
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

function parseOutputFormat(value: string): RunOutputFormat {
  if (value === 'text' || value === 'json') return value
  throw new InvalidArgumentError('Expected "text" or "json".')
}

// ---------------------------------------------------------------------------
// Action
// ---------------------------------------------------------------------------

/**
 * Run a batch of debates and print the outcome of each problem.
 * Returns the process exit code.
 */
export async function runRunAction(opts: RunActionOptions): Promise<number> {
  const startedAt = Date.now()
  const env = opts.env ?? process.env

  const system = createConfigSystem({
    ...(opts.configDir !== undefined && { projectConfigDir: opts.configDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    cliOverrides: buildCliOverrides(opts),
    env,
  })

  let database: DatabaseService | undefined
  let secrets: string[] = []

  try {
    await system.load()
    const config = system.getConfig()
    if (process.env.LOG_LEVEL === undefined) setLogLevel(config.global.log_level)
    secrets = providerSecrets(config.providers, env)

    const problems = await loadProblems(config.problems.path, {
      skip: config.problems.skip,
      take: config.problems.take,
    })
    const agents = createAgents({
      providers: config.providers,
      agents: config.agents,
      logIntervalSec: config.global.log_interval_sec,
      env,
      ...(opts.clientFactory !== undefined && { clientFactory: opts.clientFactory }),
    })

    database = createDatabaseService(config.global.database_path)
    await database.initialize()
    const store = new SqliteDocumentWriter(database.db)
    const writer: DocumentWriter = config.global.mirror_artifacts
      ? new MirroredDocumentWriter(store, { outputDir: config.global.output_dir })
      : store

    const runner = new DebateRunner({
      agents,
      writer,
      timeouts: {
        roleAssessmentSec: config.timeouts.role_assessment_sec,
        solveSec: config.timeouts.solve_sec,
        peerReviewSec: config.timeouts.peer_review_sec,
        refineSec: config.timeouts.refine_sec,
      },
      maxConcurrency: config.global.max_concurrency,
      maxConcurrentSessions: config.global.max_concurrent_sessions,
      logIntervalSec: config.global.log_interval_sec,
    })

    const report = await runner.runAll(problems)
    logger.info({ duration: formatDuration(Date.now() - startedAt) }, 'Run finished')

    const rendered =
      opts.outputFormat === 'json'
        ? JSON.stringify(buildJsonOutput('colloquy run', report, opts.version ?? '0.0.0'), null, 2)
        : formatBatchReport(report)
    process.stdout.write(maskSecrets(rendered, secrets) + '\n')

    return report.failed === 0 ? RUN_EXIT_SUCCESS : RUN_EXIT_ERROR
  } catch (err) {
    const { code } = describeError(err)
    const message = maskSecrets(describeError(err).message, secrets)
    logger.error({ code, err: message }, 'Run aborted')
    if (opts.outputFormat === 'json') {
      process.stdout.write(
        JSON.stringify(buildJsonOutput('colloquy run', { error: { code, message } }, opts.version ?? '0.0.0'), null, 2) + '\n'
      )
    } else {
      process.stderr.write(`Error: ${message}\n`)
    }
    return RUN_EXIT_ERROR
  } finally {
    if (database?.isOpen === true) {
      await database.shutdown()
    }
  }
}

// ---------------------------------------------------------------------------
// registerRunCommand
// ---------------------------------------------------------------------------

/**
 * Register the `colloquy run` command with the CLI program.
 *
 * @param program - Commander program instance
 * @param version - Current package version (for JSON output)
 */
export function registerRunCommand(program: Command, version = '0.0.0'): void {
  program
    .command('run')
    .description('Debate every selected problem with the configured agents')
    .option('--config-dir <path>', 'Project configuration directory (default: ./.colloquy)')
    .option('--problems <path>', 'Problem dataset (JSON array)')
    .option('--skip <n>', 'Problems to skip from the start of the dataset', parseNonNegativeInt)
    .option('--take <n>', 'Problems to debate after skipping', parseNonNegativeInt)
    .option('--max-concurrency <n>', 'Agent calls in flight per session', parseNonNegativeInt)
    .option('--output-format <format>', 'Output format: text (default) or json', parseOutputFormat, 'text')
    .action(async (opts: {
      configDir?: string
      problems?: string
      skip?: number
      take?: number
      maxConcurrency?: number
      outputFormat: RunOutputFormat
    }) => {
      const exitCode = await runRunAction({
        ...(opts.configDir !== undefined && { configDir: opts.configDir }),
        ...(opts.problems !== undefined && { problemsPath: opts.problems }),
        ...(opts.skip !== undefined && { skip: opts.skip }),
        ...(opts.take !== undefined && { take: opts.take }),
        ...(opts.maxConcurrency !== undefined && { maxConcurrency: opts.maxConcurrency }),
        outputFormat: opts.outputFormat,
        version,
      })
      process.exitCode = exitCode
    })
}
