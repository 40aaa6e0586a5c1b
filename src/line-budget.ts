import path from 'node:path'
import type { ContextFile, ContextLintConfig, Diagnostic } from './types.js'

export interface LineBudgetReport {
  diagnostics: Diagnostic[]
  fileSizes: Map<string, number>
}

/**
 * LineBudgetChecker measures context files against the line budget.
 *
 * - docs/ files only ever warn: documentation may grow, it just gets flagged
 * - hot files fail hard at the error limit (per-file override or default)
 * - everything else warns from `default_warn` on
 */
export class LineBudgetChecker {
  constructor(private config: ContextLintConfig) {}

  check(files: readonly ContextFile[]): LineBudgetReport {
    const diagnostics: Diagnostic[] = []
    const fileSizes = new Map<string, number>()

    for (const file of files) {
      const count = file.lines.length
      fileSizes.set(file.relPath, count)

      const message = this.evaluate(file, count)
      if (message) {
        diagnostics.push({ path: file.relPath, lineno: 0, ...message })
      }
    }

    return { diagnostics, fileSizes }
  }

  /**
   * Hard limit for a relative path: the per-file override, else the default.
   */
  errorLimit(relPath: string): number {
    const overrides = this.config.per_file_error
    return Object.hasOwn(overrides, relPath) ? overrides[relPath] : this.config.default_error
  }

  private evaluate(
    file: ContextFile,
    count: number,
  ): Pick<Diagnostic, 'message' | 'hard'> | null {
    const warnAt = this.config.default_warn

    if (isDocsPath(file.relPath)) {
      if (count >= warnAt) {
        return { message: `${count} lines — consider splitting (docs/ files never fail)`, hard: false }
      }
      return null
    }

    const limit = this.errorLimit(file.relPath)
    if (file.hot && count >= limit) {
      return { message: `${count} lines (hard limit is ${limit})`, hard: true }
    }

    if (count >= warnAt) {
      const message = file.hot
        ? `${count} lines — consider trimming (soft warn at ${warnAt})`
        : `${count} lines — consider trimming`
      return { message, hard: false }
    }

    return null
  }
}

export function isDocsPath(relPath: string): boolean {
  return relPath.startsWith('docs/') || relPath.startsWith(`docs${path.sep}`)
}
