import { mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { canonicalize, inExcludedDir, isWithin, toPosix } from './paths.js'

describe('canonicalize', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = realpathSync(mkdtempSync(path.join(tmpdir(), 'paths-test-')))
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('normalizes dot segments of paths that do not exist', () => {
    expect(canonicalize(path.join(tempDir, 'a', '..', 'b', 'c.md'))).toBe(
      path.join(tempDir, 'b', 'c.md'),
    )
  })

  it('follows symlinks in the existing prefix of a missing path', () => {
    const target = path.join(tempDir, 'real')
    mkdirSync(target)
    symlinkSync(target, path.join(tempDir, 'link'), 'dir')

    expect(canonicalize(path.join(tempDir, 'link', 'missing.md'))).toBe(
      path.join(target, 'missing.md'),
    )
  })

  it('steps up from the target of a symlink, not from the link', () => {
    const target = path.join(tempDir, 'elsewhere', 'sub')
    mkdirSync(target, { recursive: true })
    mkdirSync(path.join(tempDir, 'repo'))
    symlinkSync(target, path.join(tempDir, 'repo', 'link'), 'dir')

    expect(canonicalize(`repo${path.sep}link${path.sep}..${path.sep}secret.md`, tempDir)).toBe(
      path.join(tempDir, 'elsewhere', 'secret.md'),
    )
  })

  it('resolves relative targets against the given base', () => {
    expect(canonicalize('docs/a.md', tempDir)).toBe(path.join(tempDir, 'docs', 'a.md'))
    expect(canonicalize(path.join(tempDir, 'x.md'), '/unused')).toBe(path.join(tempDir, 'x.md'))
  })
})

describe('isWithin', () => {
  const root = path.join(path.sep, 'repo')

  it('accepts the root and paths below it', () => {
    expect(isWithin(root, root)).toBe(true)
    expect(isWithin(root, path.join(root, 'docs', 'a.md'))).toBe(true)
    expect(isWithin(root, path.join(root, '..file.md'))).toBe(true)
  })

  it('rejects siblings and parents', () => {
    expect(isWithin(root, path.join(path.sep, 'repo-other', 'a.md'))).toBe(false)
    expect(isWithin(root, path.sep)).toBe(false)
  })
})

describe('inExcludedDir', () => {
  const excluded = new Set(['node_modules', '.git'])

  it('checks directory parts only', () => {
    expect(inExcludedDir('packages/node_modules/x.md', excluded)).toBe(true)
    expect(inExcludedDir('.git/HEAD', excluded)).toBe(true)
    expect(inExcludedDir('docs/node_modules', excluded)).toBe(false)
  })

  it('handles backslash separators', () => {
    expect(toPosix('docs\\a.md')).toBe('docs/a.md')
    expect(inExcludedDir('node_modules\\x.md', excluded)).toBe(true)
  })
})
