import type { ContextLintConfig, DiscoveryDefaults } from './types.js'

export const SOFT_WARN_LINES = 200
export const HARD_FAIL_LINES = 300
export const ROUTER_WARN_LINES = 50

export const CONFIG_FILE_NAMES = ['.contextlintrc.json', '.contextlintrc'] as const

export const DEFAULT_DISCOVERY: DiscoveryDefaults = Object.freeze({
  hotFiles: Object.freeze([
    '.cursorrules',
    '.github/copilot-instructions.md',
    '.windsurfrules',
    'AGENTS.md',
    'CLAUDE.md',
    'GEMINI.md',
    'codex.md',
    'opencode.md',
  ]),
  hotGlobs: Object.freeze([
    '.claude/rules/**/*.md',
    '.cursor/rules/**/*.mdc',
    '.windsurf/rules/**/*.md',
    '.windsurf/rules/**/*.mdc',
  ]),
  docsGlob: 'docs/**/*.md',
  excludeDirs: new Set(['.git', 'node_modules', 'dist', 'build', '.venv', 'venv', '__pycache__']),
  // Short files expected to point at canonical docs rather than contain them
  routerFiles: Object.freeze(['CLAUDE.md', 'GEMINI.md']),
})

export function createDefaultConfig(): ContextLintConfig {
  return {
    default_warn: SOFT_WARN_LINES,
    default_error: HARD_FAIL_LINES,
    per_file_error: {},
    router_warn_lines: ROUTER_WARN_LINES,
    ignore_paths: [],
    ignore_refs: [],
    extra_globs: [],
    disable_default_discovery: false,
  }
}
