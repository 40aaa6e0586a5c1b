import { realpathSync } from 'node:fs'
import path from 'node:path'

export function toPosix(relPath: string): string {
  return relPath.replace(/\\/g, '/')
}

/**
 * Absolute path with symlinks resolved, one segment at a time from `base`
 * (or the filesystem root for an absolute `target`).
 *
 * `..` steps up from the resolved directory, so `link/..` is the parent of
 * the link's target, not the directory holding the link. Segments that do
 * not exist are appended as they are.
 */
export function canonicalize(target: string, base: string = process.cwd()): string {
  const start = path.isAbsolute(target) ? target : `${base}${path.sep}${target}`
  const fsRoot = path.parse(start).root
  let resolved = fsRoot

  for (const segment of start.slice(fsRoot.length).split(/[\\/]+/)) {
    if (segment === '' || segment === '.') {
      continue
    }
    if (segment === '..') {
      resolved = path.dirname(resolved)
      continue
    }
    const next = path.join(resolved, segment)
    try {
      resolved = realpathSync(next)
    } catch {
      // Missing (or unreadable): keep the segment as written
      resolved = next
    }
  }

  return resolved
}

/**
 * True when `target` is `root` itself or lies below it.
 * Both paths must already be absolute and canonical.
 */
export function isWithin(root: string, target: string): boolean {
  const rel = path.relative(root, target)
  if (rel === '') {
    return true
  }
  return !path.isAbsolute(rel) && rel.split(path.sep)[0] !== '..'
}

/**
 * True when any directory above the file (not the file name itself)
 * is one of the excluded names.
 */
export function inExcludedDir(relPath: string, excludeDirs: ReadonlySet<string>): boolean {
  const parts = toPosix(relPath).split('/')
  parts.pop()
  return parts.some((part) => excludeDirs.has(part))
}
