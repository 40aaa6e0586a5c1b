import chalk from 'chalk'
import { summarize, toJsonReport, topOffenders } from './lint-result.js'
import type { Diagnostic, LintResult, LintSummary } from './types.js'

export interface ReporterOptions {
  top?: number // number of top offenders listed in text output
}

export class Reporter {
  private top: number

  constructor(options: ReporterOptions = {}) {
    this.top = options.top ?? 3
  }

  report(result: LintResult): void {
    if (result.diagnostics.length === 0) {
      console.log(chalk.green('contextlint: all clear ✓'))
      return
    }

    const warnings = result.diagnostics.filter((d) => !d.hard)
    const errors = result.diagnostics.filter((d) => d.hard)

    if (warnings.length > 0) {
      console.log(chalk.yellow.bold('Warnings:'))
      for (const diagnostic of warnings) {
        console.log(this.formatDiagnostic(diagnostic))
      }
    }

    if (errors.length > 0) {
      if (warnings.length > 0) {
        console.log()
      }
      console.log(chalk.red.bold('Errors:'))
      for (const diagnostic of errors) {
        console.log(this.formatDiagnostic(diagnostic))
      }
    }

    const offenders = topOffenders(result, this.top)
    if (offenders.length > 0) {
      console.log()
      console.log(chalk.white.bold('Top offenders by size:'))
      for (const [relPath, size] of offenders) {
        console.log(`  ${relPath}: ${size} lines`)
      }
    }

    console.log()
    console.log(this.formatSummary(summarize(result)))
  }

  reportJson(result: LintResult): void {
    console.log(JSON.stringify(toJsonReport(result), null, 2))
  }

  formatDiagnostic(diagnostic: Diagnostic): string {
    const label = diagnostic.hard ? chalk.red('  ERROR') : chalk.yellow('  warn ')
    const location = diagnostic.lineno
      ? `${diagnostic.path}:${diagnostic.lineno}`
      : diagnostic.path
    return `${label}  ${chalk.dim(location)}: ${diagnostic.message}`
  }

  private formatSummary(summary: LintSummary): string {
    return `contextlint: ${summary.total} ${plural(summary.total, 'issue')} (${summary.errors} ${plural(summary.errors, 'error')}, ${summary.warnings} ${plural(summary.warnings, 'warning')})`
  }
}

function plural(count: number, word: string): string {
  return count === 1 ? word : `${word}s`
}
