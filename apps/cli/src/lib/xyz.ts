import type { Atom, XyzDocument } from '@sandwich-geometry/shared/types'

import { createAnalysisError } from '@/analysis/errors'

const COUNT_RE = /^\d+$/

const malformed = (message: string, details?: Record<string, unknown>) =>
  createAnalysisError('MALFORMED_STRUCTURE', message, details)

const parseCoordinate = (value: string, lineNumber: number): number => {
  const parsed = Number(value)
  if (value === '' || !Number.isFinite(parsed)) {
    throw malformed(`Invalid coordinate "${value}" on line ${lineNumber}.`, {
      line: lineNumber,
    })
  }
  return parsed
}

/** Parses one `symbol x y z` line; columns past the fourth are ignored. */
export function parseAtomLine(line: string, lineNumber: number): Atom {
  const parts = line.trim().split(/\s+/)
  if (parts.length < 4) {
    throw malformed(`Invalid XYZ format on line ${lineNumber}.`, {
      line: lineNumber,
    })
  }
  const [symbol, x, y, z] = parts
  return {
    symbol,
    x: parseCoordinate(x, lineNumber),
    y: parseCoordinate(y, lineNumber),
    z: parseCoordinate(z, lineNumber),
  }
}

/**
 * Parses an XYZ document: atom count, comment, then that many atom lines.
 * Anything after the declared atoms is ignored.
 */
export function parseXyz(text: string): XyzDocument {
  const lines = text.split(/\r?\n/)
  const countLine = (lines[0] ?? '').trim()
  if (!COUNT_RE.test(countLine)) {
    throw malformed(`Invalid atom count "${countLine}" on line 1.`)
  }
  const count = Number(countLine)
  const atomLines = lines.slice(2, 2 + count)
  if (atomLines.length < count) {
    throw malformed(
      `Expected ${count} atoms but found ${atomLines.length}.`,
      { expected: count, found: atomLines.length },
    )
  }
  return {
    comment: lines[1] ?? '',
    atoms: atomLines.map((line, index) => parseAtomLine(line, index + 3)),
  }
}

export function atomsToXyz(atoms: Array<Atom>): string {
  return atoms
    .map(
      (atom) =>
        `${atom.symbol} ${atom.x.toFixed(6)} ${atom.y.toFixed(6)} ${atom.z.toFixed(6)}`,
    )
    .join('\n')
}

export function formatXyz(document: XyzDocument): string {
  const comment = document.comment.replace(/\r?\n/g, ' ')
  const header = `${document.atoms.length}\n${comment}\n`
  if (document.atoms.length === 0) return header
  return `${header}${atomsToXyz(document.atoms)}\n`
}
