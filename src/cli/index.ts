#!/usr/bin/env node
/**
 * Colloquy CLI - Main entry point
 * Provides the `colloquy` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerConfigCommand } from './commands/config.js'
import { registerRunCommand } from './commands/run.js'

const logger = createLogger('cli')

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string().optional() })

/** Resolve the package version relative to this file */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // src/cli/ and dist/cli/ both sit two levels below the package root
  const paths = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of paths) {
    let content: string
    try {
      content = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const pkg = PackageJsonSchema.safeParse(JSON.parse(content))
    if (pkg.success && pkg.data.name === 'colloquy') {
      return pkg.data.version ?? '0.0.0'
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('colloquy')
    .description('Colloquy - multi-agent debate over reasoning problems')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program, version)
  registerConfigCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

void main()
