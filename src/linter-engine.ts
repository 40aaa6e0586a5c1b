import path from 'node:path'
import { loadConfig } from './config-loader.js'
import { DEFAULT_DISCOVERY } from './defaults.js'
import { DuplicateDetector } from './duplicate-detector.js'
import { FileDiscovery } from './file-discovery.js'
import { LineBudgetChecker } from './line-budget.js'
import { createLintResult } from './lint-result.js'
import { canonicalize } from './paths.js'
import { ReferenceChecker } from './reference-checker.js'
import { RouterChecker } from './router-checker.js'
import { readText, splitLines } from './text.js'
import type {
  ContextFile,
  ContextLintConfig,
  DiscoveredFiles,
  DiscoveryDefaults,
  LintResult,
} from './types.js'

interface LinterEngineDeps {
  root: string
  config: ContextLintConfig
  defaults?: DiscoveryDefaults
}

export interface RunOptions {
  checkDuplicates?: boolean
}

/**
 * LinterEngine runs every check over the discovered context files:
 * line budget, references, router sanity, then duplicate blocks.
 *
 * The order is fixed and each check emits diagnostics in a deterministic
 * order, so two runs over the same tree produce the same result.
 */
export class LinterEngine {
  private root: string
  private defaults: DiscoveryDefaults

  constructor(private deps: LinterEngineDeps) {
    this.root = canonicalize(deps.root)
    this.defaults = deps.defaults ?? DEFAULT_DISCOVERY
  }

  run(options: RunOptions = {}): LintResult {
    const { config } = this.deps
    const result = createLintResult()

    const discovered = new FileDiscovery(this.root, config, this.defaults).discover()
    const files = this.readFiles(discovered)

    const budget = new LineBudgetChecker(config).check(files)
    result.diagnostics.push(...budget.diagnostics)
    result.file_sizes = budget.fileSizes

    result.diagnostics.push(...new ReferenceChecker(this.root, config).check(files))
    result.diagnostics.push(
      ...new RouterChecker(this.root, config, this.defaults.routerFiles).check(),
    )

    if (options.checkDuplicates ?? true) {
      result.diagnostics.push(...new DuplicateDetector().check(files))
    }

    return result
  }

  /**
   * Read every discovered file once. Files that cannot be read drop out of
   * all checks: no diagnostic, no size entry.
   */
  private readFiles({ files, hot }: DiscoveredFiles): ContextFile[] {
    const contextFiles: ContextFile[] = []
    for (const absPath of files) {
      const text = readText(absPath)
      if (text === null) {
        continue
      }
      const relPath = path.relative(this.root, absPath)
      contextFiles.push({ relPath, hot: hot.has(relPath), lines: splitLines(text) })
    }
    return contextFiles
  }
}

/**
 * Run all checks against `root`. The config is loaded from the root when
 * not supplied.
 */
export function runChecks(
  root: string,
  config?: ContextLintConfig,
  checkDuplicates = true,
): LintResult {
  const resolvedRoot = canonicalize(root)
  const engine = new LinterEngine({
    root: resolvedRoot,
    config: config ?? loadConfig(resolvedRoot),
  })
  return engine.run({ checkDuplicates })
}
