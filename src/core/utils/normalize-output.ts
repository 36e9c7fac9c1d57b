import type { LineMismatch } from '../types/execution'

/**
 * The single normalisation applied to both expected and captured stdout:
 * line endings become LF, trailing whitespace is stripped from every line
 * and trailing empty lines are dropped.
 */
export function normalizeOutput(text: string): string {
  const lines = text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/\s+$/, ''))

  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop()
  }

  return lines.join('\n')
}

/**
 * Compare normalised outputs; returns the first differing line, or undefined when equal
 */
export function compareOutput(expected: string, actual: string): LineMismatch | undefined {
  const normalizedExpected = normalizeOutput(expected)
  const normalizedActual = normalizeOutput(actual)

  if (normalizedExpected === normalizedActual) {
    return undefined
  }

  const expectedLines = normalizedExpected === '' ? [] : normalizedExpected.split('\n')
  const actualLines = normalizedActual === '' ? [] : normalizedActual.split('\n')
  const length = Math.max(expectedLines.length, actualLines.length)

  let index = 0
  while (index < length && expectedLines[index] === actualLines[index]) {
    index++
  }

  return { line: index + 1, expected: expectedLines[index], actual: actualLines[index] }
}
