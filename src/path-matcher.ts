import micromatch from 'micromatch'
import { toPosix } from './paths.js'

// `bash` makes a single star behave as a globstar
const MATCH_OPTIONS: micromatch.Options = { dot: true, bash: true }

/**
 * PathMatcher decides whether repo-relative paths fall under a set of
 * ignore globs (`ignore.paths` in the config).
 *
 * Paths are matched in POSIX form with shell-style (fnmatch) rules: `*`
 * matches across `/`, so `*.md` ignores Markdown files at any depth, and
 * dotfiles match like any other file.
 */
export class PathMatcher {
  private patterns: string[]

  constructor(patterns: readonly string[]) {
    this.patterns = Array.from(new Set(patterns))
  }

  get isEmpty(): boolean {
    return this.patterns.length === 0
  }

  /**
   * Returns true when the path matches any pattern.
   *
   * @param relPath - Path relative to the lint root
   */
  matches(relPath: string): boolean {
    if (this.isEmpty) {
      return false
    }
    return micromatch.isMatch(toPosix(relPath), this.patterns, MATCH_OPTIONS)
  }

  /**
   * Batch operation: keeps the paths that match no pattern, in order.
   */
  reject(relPaths: Iterable<string>): string[] {
    const kept: string[] = []
    for (const relPath of relPaths) {
      if (!this.matches(relPath)) {
        kept.push(relPath)
      }
    }
    return kept
  }
}
