#!/usr/bin/env node
import { createRequire } from 'node:module'
import { Command, InvalidArgumentError, Option } from 'commander'
import { runCheckCommand } from './check-command.js'
import type { OutputFormat } from './types.js'

const require = createRequire(import.meta.url)
const pkg: { version: string } = require('../package.json')

function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.')
  }
  return parsed
}

const program = new Command()

program
  .name('contextlint')
  .description('Lint AI agent context files for bloat, broken refs, and duplication')
  .version(`contextlint ${pkg.version}`)

// --- check command ---
program
  .command('check', { isDefault: true })
  .description('Check context files under the repository root')
  .option('--root <dir>', 'Repository root to lint', '.')
  .option('--config <path>', 'Config file path (default: auto-detect .contextlintrc.json)')
  .addOption(
    new Option('--format <format>', 'Output format').choices(['text', 'json']).default('text'),
  )
  .option('--no-dup', 'Disable duplicate-block detection')
  .option('--top <n>', 'Number of top offenders to list', parseCount, 3)
  .option('--report-file <path>', 'Also write the JSON report to a file')
  .action(
    (options: {
      root: string
      config?: string
      format: OutputFormat
      dup: boolean
      top: number
      reportFile?: string
    }) => {
      process.exitCode = runCheckCommand(options)
    },
  )

program.parse()
