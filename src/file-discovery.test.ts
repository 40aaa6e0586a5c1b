import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { createDefaultConfig, DEFAULT_DISCOVERY } from './defaults.js'
import { discover, FileDiscovery } from './file-discovery.js'
import type { ContextLintConfig } from './types.js'

describe('FileDiscovery', () => {
  let root: string

  beforeEach(() => {
    root = realpathSync(mkdtempSync(path.join(tmpdir(), 'file-discovery-test-')))
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  function write(relPath: string, content = 'content\n'): void {
    const absPath = path.join(root, relPath)
    mkdirSync(path.dirname(absPath), { recursive: true })
    writeFileSync(absPath, content)
  }

  function relative(files: string[]): string[] {
    return files.map((file) => path.relative(root, file))
  }

  function configWith(overrides: Partial<ContextLintConfig>): ContextLintConfig {
    return { ...createDefaultConfig(), ...overrides }
  }

  test('finds hot root files, hot rule directories and docs, sorted by relative path', () => {
    write('AGENTS.md')
    write('CLAUDE.md')
    write('.cursorrules')
    write('.claude/rules/style.md')
    write('.cursor/rules/a.mdc')
    write('docs/guide.md')
    write('docs/deep/more.md')
    write('README.md')
    write('notes/todo.md')

    const { files, hot } = discover(root, createDefaultConfig())

    expect(relative(files)).toEqual([
      '.claude/rules/style.md',
      '.cursor/rules/a.mdc',
      '.cursorrules',
      'AGENTS.md',
      'CLAUDE.md',
      'docs/deep/more.md',
      'docs/guide.md',
    ])
    expect(hot).toEqual(
      new Set(['.claude/rules/style.md', '.cursor/rules/a.mdc', '.cursorrules', 'AGENTS.md', 'CLAUDE.md']),
    )
  })

  test('returns absolute paths under the root', () => {
    write('AGENTS.md')

    const { files } = discover(root, createDefaultConfig())

    expect(files).toEqual([path.join(root, 'AGENTS.md')])
  })

  test('skips excluded directories anywhere in the path', () => {
    write('docs/node_modules/pkg.md')
    write('docs/build/out.md')
    write('docs/kept.md')
    write('node_modules/lib/README.md')

    const { files } = discover(root, configWith({ extra_globs: ['**/*.md'] }))

    expect(relative(files)).toEqual(['docs/kept.md'])
  })

  test('overlapping globs never produce duplicates and hot files stay hot', () => {
    write('AGENTS.md')
    write('docs/a.md')

    const { files, hot } = discover(root, configWith({ extra_globs: ['*.md', '**/*.md', 'docs/*.md'] }))

    expect(relative(files)).toEqual(['AGENTS.md', 'docs/a.md'])
    expect(hot).toEqual(new Set(['AGENTS.md']))
  })

  test('disable_default_discovery leaves only extra globs, none of them hot', () => {
    write('AGENTS.md')
    write('docs/a.md')
    write('prompts/system.md')

    const { files, hot } = discover(
      root,
      configWith({ disable_default_discovery: true, extra_globs: ['prompts/**/*.md'] }),
    )

    expect(relative(files)).toEqual(['prompts/system.md'])
    expect(hot.size).toBe(0)
  })

  test('ignore_paths drops files from both the list and the hot set', () => {
    write('AGENTS.md')
    write('CLAUDE.md')
    write('docs/a.md')
    write('docs/archive/old.md')

    const { files, hot } = discover(root, configWith({ ignore_paths: ['docs/archive/**', 'CLAUDE.md'] }))

    expect(relative(files)).toEqual(['AGENTS.md', 'docs/a.md'])
    expect(hot).toEqual(new Set(['AGENTS.md']))
  })

  test('a single-star ignore pattern reaches files in subdirectories', () => {
    write('AGENTS.md')
    write('docs/guide.md')
    write('.cursorrules')

    const { files, hot } = discover(root, configWith({ ignore_paths: ['*.md'] }))

    expect(relative(files)).toEqual(['.cursorrules'])
    expect(hot).toEqual(new Set(['.cursorrules']))
  })

  test('directories matching a pattern are skipped, files inside them are not', () => {
    write('docs/folder.md/inner.md')

    const { files } = discover(root, createDefaultConfig())

    expect(relative(files)).toEqual(['docs/folder.md/inner.md'])
  })

  test('patterns matching nothing contribute nothing', () => {
    const { files, hot } = discover(root, configWith({ extra_globs: ['missing/**/*.md'] }))

    expect(files).toEqual([])
    expect(hot.size).toBe(0)
  })

  test('a hot root name that is a directory is not a file', () => {
    mkdirSync(path.join(root, 'AGENTS.md'))

    const { files } = discover(root, createDefaultConfig())

    expect(files).toEqual([])
  })

  test('accepts injected discovery defaults', () => {
    write('RULES.md')
    write('AGENTS.md')

    const discovery = new FileDiscovery(root, createDefaultConfig(), {
      ...DEFAULT_DISCOVERY,
      hotFiles: ['RULES.md'],
      hotGlobs: [],
    })
    const { files, hot } = discovery.discover()

    expect(relative(files)).toEqual(['RULES.md'])
    expect(hot).toEqual(new Set(['RULES.md']))
  })

  test('loads the config from the root when none is given', () => {
    write('AGENTS.md')
    write('docs/a.md')
    write('.contextlintrc.json', JSON.stringify({ ignore: { paths: ['docs/**'] } }))

    const { files } = discover(root)

    expect(relative(files)).toEqual(['AGENTS.md'])
  })
})
