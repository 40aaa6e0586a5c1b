import { compareStrings } from './text.js'
import type { ContextFile, Diagnostic } from './types.js'

export const DUPLICATE_MIN_LINES = 4

interface BlockWindow {
  lineno: number // 1-based line of the window's first line
  fingerprint: string
}

interface Location {
  relPath: string
  lineno: number
}

/**
 * DuplicateDetector finds blocks of at least four trimmed, non-blank lines
 * shared by two or more files.
 *
 * Blank lines are dropped before windowing: they never break a block and
 * never count towards its length. Each set of files is reported once, on
 * the first shared fingerprint in sorted order, so two files with many
 * duplicated regions still produce a single diagnostic.
 */
export class DuplicateDetector {
  constructor(private windowSize: number = DUPLICATE_MIN_LINES) {}

  check(files: readonly ContextFile[]): Diagnostic[] {
    const index = this.buildIndex(files)
    const diagnostics: Diagnostic[] = []
    const reported = new Set<string>()

    const fingerprints = Array.from(index.keys()).sort(compareStrings)
    for (const fingerprint of fingerprints) {
      const locations = index.get(fingerprint) ?? []

      // First occurrence per file
      const first = new Map<string, number>()
      for (const { relPath, lineno } of locations) {
        const current = first.get(relPath)
        if (current === undefined || lineno < current) {
          first.set(relPath, lineno)
        }
      }
      if (first.size < 2) {
        continue
      }

      const sharedBy = Array.from(first.keys()).sort(compareStrings)
      const key = sharedBy.join('\0')
      if (reported.has(key)) {
        continue
      }
      reported.add(key)

      const [primary, ...others] = sharedBy
      const elsewhere = others.map((relPath) => `${relPath}:${first.get(relPath)}`)
      diagnostics.push({
        path: primary,
        message: `duplicate block found also in ${elsewhere.join(', ')} — consider consolidating`,
        hard: false,
        lineno: first.get(primary) ?? 0,
      })
    }

    return diagnostics
  }

  /**
   * Sliding windows over the normalized lines of one file, one per position.
   */
  windows(lines: readonly string[]): BlockWindow[] {
    const normalized: Array<{ lineno: number; text: string }> = []
    lines.forEach((line, i) => {
      const text = line.trim()
      if (text) {
        normalized.push({ lineno: i + 1, text })
      }
    })

    const windows: BlockWindow[] = []
    for (let i = 0; i + this.windowSize <= normalized.length; i++) {
      const block = normalized.slice(i, i + this.windowSize)
      windows.push({
        lineno: block[0].lineno,
        fingerprint: block.map((entry) => entry.text).join('\n'),
      })
    }
    return windows
  }

  /**
   * Inverted index: fingerprint → first location in each file.
   */
  private buildIndex(files: readonly ContextFile[]): Map<string, Location[]> {
    const index = new Map<string, Location[]>()

    for (const file of files) {
      const emitted = new Set<string>()
      for (const { lineno, fingerprint } of this.windows(file.lines)) {
        if (emitted.has(fingerprint)) {
          continue
        }
        emitted.add(fingerprint)

        const locations = index.get(fingerprint)
        if (locations) {
          locations.push({ relPath: file.relPath, lineno })
        } else {
          index.set(fingerprint, [{ relPath: file.relPath, lineno }])
        }
      }
    }

    return index
  }
}
