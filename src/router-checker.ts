import path from 'node:path'
import { DEFAULT_DISCOVERY } from './defaults.js'
import { compareStrings, isFile, readText, splitLines } from './text.js'
import type { ContextLintConfig, Diagnostic } from './types.js'

const DOCS_POINTER = /(AGENTS\.md|docs\/)/i

/**
 * RouterChecker keeps router files (CLAUDE.md, GEMINI.md) short and
 * pointing at the canonical docs. Both checks are independent warnings.
 */
export class RouterChecker {
  constructor(
    private root: string,
    private config: ContextLintConfig,
    private routerFiles: readonly string[] = DEFAULT_DISCOVERY.routerFiles,
  ) {}

  check(): Diagnostic[] {
    const diagnostics: Diagnostic[] = []

    for (const name of [...this.routerFiles].sort(compareStrings)) {
      const filePath = path.join(this.root, name)
      if (!isFile(filePath)) {
        continue
      }
      const text = readText(filePath)
      if (text === null) {
        continue
      }

      const count = splitLines(text).length
      const limit = this.config.router_warn_lines
      if (count > limit) {
        diagnostics.push({
          path: name,
          message: `${count} lines — router files should be short (<=${limit})`,
          hard: false,
          lineno: 0,
        })
      }

      if (!DOCS_POINTER.test(text)) {
        diagnostics.push({
          path: name,
          message: 'no pointer to AGENTS.md or docs/ — add one',
          hard: false,
          lineno: 0,
        })
      }
    }

    return diagnostics
  }
}
