import { readFile, writeFile } from 'node:fs/promises'

import type { XyzDocument } from '@sandwich-geometry/shared/types'

import { formatXyz, parseXyz } from './xyz'
import { createAnalysisError } from '@/analysis/errors'

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error &&
  'code' in error &&
  (error.code === 'ENOENT' || error.code === 'EISDIR')

export async function readStructureFile(path: string): Promise<XyzDocument> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      throw createAnalysisError('FILE_NOT_FOUND', `File '${path}' not found.`, {
        path,
      })
    }
    throw error
  }
  return parseXyz(text)
}

export async function writeStructureFile(
  path: string,
  document: XyzDocument,
): Promise<void> {
  await writeFile(path, formatXyz(document), 'utf8')
}
