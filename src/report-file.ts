import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { toJsonReport } from './lint-result.js'
import type { LintResult } from './types.js'

/**
 * Write the JSON report to `reportFile`, creating parent directories.
 * Returns the absolute path written.
 */
export function writeReportFile(
  reportFile: string,
  payload: {
    result: LintResult
    exitCode: number
  },
): string {
  const reportPath = resolve(reportFile)
  mkdirSync(dirname(reportPath), { recursive: true })
  writeFileSync(
    reportPath,
    JSON.stringify(
      {
        generated_at: new Date().toISOString(),
        exit_code: payload.exitCode,
        ...toJsonReport(payload.result),
      },
      null,
      2,
    ),
    'utf-8',
  )
  return reportPath
}
