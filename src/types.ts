// --- Config Types ---

export interface ContextLintConfig {
  // Line budget
  default_warn: number
  default_error: number
  per_file_error: Record<string, number> // relative path → hard limit
  router_warn_lines: number
  // Ignore
  ignore_paths: string[] // globs → drop file from discovery
  ignore_refs: string[] // literal refs or basenames → never reported broken
  // Discovery
  extra_globs: string[]
  disable_default_discovery: boolean
}

export interface DiscoveryDefaults {
  hotFiles: readonly string[] // root-level files always injected into prompts
  hotGlobs: readonly string[] // rule directories, relative to root
  docsGlob: string
  excludeDirs: ReadonlySet<string>
  routerFiles: readonly string[]
}

// --- Discovery Types ---

export interface DiscoveredFiles {
  files: string[] // absolute, unique, sorted by relative path
  hot: Set<string> // relative paths
}

export interface ContextFile {
  relPath: string
  hot: boolean
  lines: string[]
}

// --- Result Types ---

export interface Diagnostic {
  path: string // relative to lint root
  message: string
  hard: boolean // true → non-zero exit
  lineno: number // 0 = not line-specific
}

export interface LintResult {
  diagnostics: Diagnostic[]
  file_sizes: Map<string, number> // relative path → line count, discovery order
}

// --- Reporter Types ---

export interface LintSummary {
  total: number
  errors: number
  warnings: number
}

export interface LintJsonReport {
  diagnostics: Array<Pick<Diagnostic, 'path' | 'lineno' | 'message' | 'hard'>>
  file_sizes: Record<string, number>
  summary: LintSummary
}

export type OutputFormat = 'text' | 'json'
