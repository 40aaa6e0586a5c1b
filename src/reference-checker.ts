import { existsSync } from 'node:fs'
import path from 'node:path'
import { canonicalize, isWithin } from './paths.js'
import { extractRefs } from './ref-extractors.js'
import type { ContextFile, ContextLintConfig, Diagnostic } from './types.js'

const SKIP_REF = /^(https?:\/\/|mailto:|#)/

/**
 * ReferenceChecker resolves the file references found in context files
 * against the lint root.
 *
 * A reference that resolves (after following symlinks) outside the root is
 * reported as a warning and not checked further. One that stays inside but
 * points at nothing is a hard error.
 */
export class ReferenceChecker {
  private ignoreRefs: Set<string>

  constructor(
    private root: string,
    config: ContextLintConfig,
  ) {
    this.ignoreRefs = new Set(config.ignore_refs)
  }

  check(files: readonly ContextFile[]): Diagnostic[] {
    return files.flatMap((file) => this.checkFile(file))
  }

  checkFile(file: ContextFile): Diagnostic[] {
    const diagnostics: Diagnostic[] = []
    const seen = new Set<string>()

    file.lines.forEach((line, index) => {
      const lineno = index + 1

      for (const raw of extractRefs(line)) {
        const ref = raw.split('#')[0]
        if (!ref || SKIP_REF.test(ref) || this.isIgnored(ref) || seen.has(ref)) {
          continue
        }
        seen.add(ref)

        const diagnostic = this.resolve(file.relPath, ref, lineno)
        if (diagnostic) {
          diagnostics.push(diagnostic)
        }
      }
    })

    return diagnostics
  }

  private isIgnored(ref: string): boolean {
    return this.ignoreRefs.has(ref) || this.ignoreRefs.has(path.basename(ref))
  }

  /**
   * Containment is checked against the canonical root on every call; a
   * symlink swapped between discovery and this check is not detected.
   */
  private resolve(relPath: string, ref: string, lineno: number): Diagnostic | null {
    const rootReal = canonicalize(this.root)
    const target = canonicalize(ref, rootReal)

    if (!isWithin(rootReal, target)) {
      return {
        path: relPath,
        message: `ref '${ref}' escapes repo root — ignored`,
        hard: false,
        lineno,
      }
    }

    if (!existsSync(target)) {
      return { path: relPath, message: `broken ref → ${ref}`, hard: true, lineno }
    }

    return null
  }
}
