/**
 * Reference extraction from a single line of a context file.
 *
 * Context files point at other files in three ways: Markdown links,
 * tool-style `@path` imports, and paths on a line of their own. Each
 * extractor is a pure function returning raw candidates in the order
 * they appear; validation and resolution happen in ReferenceChecker.
 */

export type RefExtractor = (line: string) => string[]

const MD_LINK = /\[.*?\]\(([^)]+)\)/g
// Whitespace-separated quoted link title after the target: [a](b.md "Title")
const LINK_TITLE = /^(\S+)\s+["'(]/
// @token, not inside a longer word such as an e-mail address
const AT_IMPORT = /(?<![A-Za-z0-9])@([\w./-]+)/g
const STANDALONE_PATH = /^[\s\-*_>`]*[`*_]*(\.{0,2}\/?[A-Za-z0-9_\-./]+)[`*_]*\s*$/
const FILE_EXTENSION = /\.\w{1,6}$/

/**
 * Heuristic: has a slash or ends with a short file extension.
 * Keeps `@username` mentions and plain words out of the candidates.
 */
export function looksLikePath(candidate: string): boolean {
  return candidate.includes('/') || FILE_EXTENSION.test(candidate)
}

/**
 * Targets of `[label](target)`, with any link title removed.
 */
export function extractMarkdownLinks(line: string): string[] {
  const refs: string[] = []
  for (const match of line.matchAll(MD_LINK)) {
    const target = match[1].trim()
    const titled = LINK_TITLE.exec(target)
    refs.push(titled ? titled[1] : target)
  }
  return refs
}

export function extractAtImports(line: string): string[] {
  const refs: string[] = []
  for (const match of line.matchAll(AT_IMPORT)) {
    if (looksLikePath(match[1])) {
      refs.push(match[1])
    }
  }
  return refs
}

/**
 * A line holding nothing but a path, optionally behind list or quote
 * markup and wrapped in emphasis or backticks:
 *
 *   - `docs/ARCHITECTURE.md`
 *   > **scripts/setup.sh**
 */
export function extractStandalonePath(line: string): string[] {
  const match = STANDALONE_PATH.exec(line)
  if (match && looksLikePath(match[1])) {
    return [match[1]]
  }
  return []
}

export const REF_EXTRACTORS: readonly RefExtractor[] = [
  extractMarkdownLinks,
  extractAtImports,
  extractStandalonePath,
]

export function extractRefs(line: string): string[] {
  return REF_EXTRACTORS.flatMap((extract) => extract(line))
}
