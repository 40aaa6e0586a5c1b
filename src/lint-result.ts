import type { LintJsonReport, LintResult, LintSummary } from './types.js'

export function createLintResult(): LintResult {
  return { diagnostics: [], file_sizes: new Map() }
}

/**
 * True when any diagnostic is hard, i.e. the run should exit non-zero.
 */
export function hasHard(result: LintResult): boolean {
  return result.diagnostics.some((d) => d.hard)
}

/**
 * The `n` largest files by line count. Ties keep discovery order.
 */
export function topOffenders(result: LintResult, n = 3): Array<[string, number]> {
  return Array.from(result.file_sizes.entries())
    .sort(([, a], [, b]) => b - a)
    .slice(0, Math.max(0, n))
}

export function summarize(result: LintResult): LintSummary {
  const errors = result.diagnostics.filter((d) => d.hard).length
  return {
    total: result.diagnostics.length,
    errors,
    warnings: result.diagnostics.length - errors,
  }
}

export function toJsonReport(result: LintResult): LintJsonReport {
  return {
    diagnostics: result.diagnostics.map(({ path, lineno, message, hard }) => ({
      path,
      lineno,
      message,
      hard,
    })),
    file_sizes: Object.fromEntries(result.file_sizes),
    summary: summarize(result),
  }
}
