import { describe, expect, it } from 'vitest'
import { PathMatcher } from './path-matcher.js'

describe('PathMatcher', () => {
  describe('matches', () => {
    it('matches recursive directory globs', () => {
      const matcher = new PathMatcher(['docs/archive/**'])

      expect(matcher.matches('docs/archive/old.md')).toBe(true)
      expect(matcher.matches('docs/archive/2023/q1.md')).toBe(true)
      expect(matcher.matches('docs/current.md')).toBe(false)
    })

    it('lets a single star cross directories', () => {
      const matcher = new PathMatcher(['*.md'])

      expect(matcher.matches('AGENTS.md')).toBe(true)
      expect(matcher.matches('docs/guide.md')).toBe(true)
      expect(matcher.matches('docs/deep/guide.md')).toBe(true)
      expect(matcher.matches('.cursorrules')).toBe(false)
    })

    it('matches a star in the middle of a pattern across directories', () => {
      const matcher = new PathMatcher(['docs/*.md'])

      expect(matcher.matches('docs/archive/old.md')).toBe(true)
      expect(matcher.matches('notes/docs.md')).toBe(false)
    })

    it('matches dotfiles and dot directories', () => {
      const matcher = new PathMatcher(['.cursor/**', '.*rules'])

      expect(matcher.matches('.cursor/rules/style.mdc')).toBe(true)
      expect(matcher.matches('.cursorrules')).toBe(true)
      expect(matcher.matches('.windsurfrules')).toBe(true)
    })

    it('normalizes backslashes before matching', () => {
      const matcher = new PathMatcher(['docs/*.md'])

      expect(matcher.matches('docs\\guide.md')).toBe(true)
    })

    it('matches nothing without patterns', () => {
      const matcher = new PathMatcher([])

      expect(matcher.isEmpty).toBe(true)
      expect(matcher.matches('AGENTS.md')).toBe(false)
    })
  })

  describe('reject', () => {
    it('keeps unmatched paths in their original order', () => {
      const matcher = new PathMatcher(['CLAUDE.md', 'docs/tmp/**'])

      expect(
        matcher.reject(['docs/tmp/a.md', 'GEMINI.md', 'CLAUDE.md', 'AGENTS.md', 'docs/a.md']),
      ).toEqual(['GEMINI.md', 'AGENTS.md', 'docs/a.md'])
    })

    it('accepts any iterable', () => {
      const matcher = new PathMatcher(['b.md'])

      expect(matcher.reject(new Set(['a.md', 'b.md']))).toEqual(['a.md'])
    })
  })
})
