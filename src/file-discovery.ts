import path from 'node:path'
import fg from 'fast-glob'
import { loadConfig } from './config-loader.js'
import { DEFAULT_DISCOVERY } from './defaults.js'
import { PathMatcher } from './path-matcher.js'
import { canonicalize, inExcludedDir, isWithin } from './paths.js'
import { compareStrings, isDirectory, isFile } from './text.js'
import type { ContextLintConfig, DiscoveredFiles, DiscoveryDefaults } from './types.js'

/**
 * FileDiscovery enumerates the context files of a repository:
 * - Always-hot root files (AGENTS.md, CLAUDE.md, .cursorrules, ...)
 * - Always-hot rule directories (.claude/rules, .cursor/rules, ...)
 * - Markdown under docs/
 * - Extra globs from the config
 *
 * The result is deduplicated, sorted by relative path and filtered
 * through `ignore_paths`, so repeated runs over the same tree agree.
 */
export class FileDiscovery {
  private ignoreMatcher: PathMatcher

  constructor(
    private root: string,
    private config: ContextLintConfig,
    private defaults: DiscoveryDefaults = DEFAULT_DISCOVERY,
  ) {
    this.ignoreMatcher = new PathMatcher(config.ignore_paths)
  }

  discover(): DiscoveredFiles {
    // absolute path → relative path, first-seen order
    const found = new Map<string, string>()
    const hot = new Set<string>()

    const add = (absPath: string, isHot: boolean): void => {
      const relPath = path.relative(this.root, absPath)
      if (!isWithin(this.root, absPath) || inExcludedDir(relPath, this.defaults.excludeDirs)) {
        return
      }
      if (!found.has(absPath)) {
        found.set(absPath, relPath)
      }
      if (isHot) {
        hot.add(relPath)
      }
    }

    if (!this.config.disable_default_discovery) {
      for (const name of this.defaults.hotFiles) {
        const absPath = path.join(this.root, name)
        if (isFile(absPath)) {
          add(absPath, true)
        }
      }

      for (const pattern of this.defaults.hotGlobs) {
        for (const absPath of this.glob(pattern)) {
          add(absPath, true)
        }
      }

      if (isDirectory(path.join(this.root, 'docs'))) {
        for (const absPath of this.glob(this.defaults.docsGlob)) {
          add(absPath, false)
        }
      }
    }

    for (const pattern of this.config.extra_globs) {
      for (const absPath of this.glob(pattern)) {
        add(absPath, false)
      }
    }

    const ordered = Array.from(found.entries()).sort(([, a], [, b]) => compareStrings(a, b))

    const files: string[] = []
    for (const [absPath, relPath] of ordered) {
      if (!this.ignoreMatcher.matches(relPath)) {
        files.push(absPath)
      }
    }

    return {
      files,
      hot: new Set(this.ignoreMatcher.reject(hot)),
    }
  }

  /**
   * Regular files matching a glob relative to the root, as absolute paths.
   * A pattern that matches nothing or cannot be evaluated yields [].
   */
  private glob(pattern: string): string[] {
    try {
      const matches = fg.sync(pattern, {
        cwd: this.root,
        dot: true,
        onlyFiles: true,
        unique: true,
        suppressErrors: true,
        ignore: Array.from(this.defaults.excludeDirs, (dir) => `**/${dir}/**`),
      })
      return matches.map((match) => path.resolve(this.root, match)).sort(compareStrings)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      console.warn(`Warning: Failed to resolve glob pattern "${pattern}": ${reason}`)
      return []
    }
  }
}

/**
 * Discover context files without running any checks.
 */
export function discover(root: string, config?: ContextLintConfig): DiscoveredFiles {
  const resolvedRoot = canonicalize(root)
  return new FileDiscovery(resolvedRoot, config ?? loadConfig(resolvedRoot)).discover()
}
