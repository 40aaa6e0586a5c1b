import { readFileSync, statSync } from 'node:fs'

const LINE_BREAK = /\r\n|\r|\n/

/**
 * Split text into lines without keeping a trailing empty line,
 * so "a\nb\n" and "a\nb" both count as two lines.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return []
  }
  const lines = text.split(LINE_BREAK)
  if (lines[lines.length - 1] === '') {
    lines.pop()
  }
  return lines
}

/**
 * Read a file as UTF-8. Invalid byte sequences decode to U+FFFD.
 * Returns null when the file cannot be read at all.
 */
export function readText(filePath: string): string | null {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch {
    // Unreadable files are treated as absent
    return null
  }
}

export function isFile(filePath: string): boolean {
  try {
    return statSync(filePath).isFile()
  } catch {
    return false
  }
}

export function isDirectory(filePath: string): boolean {
  try {
    return statSync(filePath).isDirectory()
  } catch {
    return false
  }
}

/**
 * Code-unit order, independent of locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) {
    return -1
  }
  return a > b ? 1 : 0
}
