/**
 * contextlint: lint AI agent context files for bloat, broken references,
 * router sanity and duplicated blocks.
 *
 * @example
 * ```typescript
 * import { hasHard, runChecks, topOffenders } from 'contextlint'
 *
 * const result = runChecks('./my-repo')
 * if (hasHard(result)) process.exitCode = 1
 * console.log(topOffenders(result, 5))
 * ```
 */

// Entry points
export { runChecks, LinterEngine, type RunOptions } from './linter-engine.js'
export { loadConfig, ConfigLoader } from './config-loader.js'
export { discover, FileDiscovery } from './file-discovery.js'

// Individual checks
export { LineBudgetChecker } from './line-budget.js'
export { ReferenceChecker } from './reference-checker.js'
export { RouterChecker } from './router-checker.js'
export { DuplicateDetector, DUPLICATE_MIN_LINES } from './duplicate-detector.js'
export {
  extractAtImports,
  extractMarkdownLinks,
  extractRefs,
  extractStandalonePath,
  looksLikePath,
} from './ref-extractors.js'

// Results and reporting
export { hasHard, summarize, toJsonReport, topOffenders } from './lint-result.js'
export { Reporter } from './reporter.js'
export { writeReportFile } from './report-file.js'

export { createDefaultConfig, DEFAULT_DISCOVERY } from './defaults.js'
export type * from './types.js'
