import { loadConfig } from './config-loader.js'
import { hasHard } from './lint-result.js'
import { runChecks } from './linter-engine.js'
import { canonicalize } from './paths.js'
import { writeReportFile } from './report-file.js'
import { Reporter } from './reporter.js'
import { isDirectory } from './text.js'
import type { OutputFormat } from './types.js'

export interface CheckOptions {
  root: string
  config?: string
  format: OutputFormat
  dup: boolean // false with --no-dup
  top: number
  reportFile?: string
}

/**
 * Run `contextlint check` and return the process exit code:
 * 0 when clean or warnings only, 1 on any hard diagnostic, 2 on failure.
 */
export function runCheckCommand(
  options: CheckOptions,
  reporter: Reporter = new Reporter({ top: options.top }),
): number {
  try {
    const root = canonicalize(options.root)
    if (!isDirectory(root)) {
      throw new Error(`Root directory does not exist: ${options.root}`)
    }

    const config = loadConfig(root, options.config)
    const result = runChecks(root, config, options.dup)
    const exitCode = hasHard(result) ? 1 : 0

    if (options.format === 'json') {
      reporter.reportJson(result)
    } else {
      reporter.report(result)
    }

    if (options.reportFile) {
      const reportPath = writeReportFile(options.reportFile, { result, exitCode })
      if (options.format === 'text') {
        console.log(`Report written: ${reportPath}`)
      }
    }

    return exitCode
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`)
    } else {
      console.error('An unexpected error occurred')
    }
    return 2
  }
}
