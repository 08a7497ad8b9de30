#!/usr/bin/env node
/**
 * StoryLoom CLI - Main entry point
 * Provides the `loom` command-line interface
 */

import { CommanderError } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { createLogger } from '../utils/logger.js'
import { createProgram } from './program.js'
import { EXIT_ERROR, EXIT_USAGE } from './utils/engine.js'

const logger = createLogger('cli')

/** Read the version from package.json, whether running from src/ or dist/ */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    try {
      const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'))
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
    } catch (err) {
      logger.debug({ err, pkgPath }, 'package.json not readable here; trying next location')
    }
  }
  return '0.0.0'
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = createProgram(await getPackageVersion())
    await program.parseAsync(process.argv)
  } catch (error) {
    // Commander reports help and --version as errors with exit code 0
    if (error instanceof CommanderError) {
      process.exit(error.exitCode === 0 ? 0 : EXIT_USAGE)
    }
    logger.error({ error }, 'CLI error')
    process.exit(EXIT_ERROR)
  }
}

void main()
