export type AnalyzerConfig = {
  /** Second line of every XYZ file written. */
  xyzComment: string
  /** Suppresses diagnostic lines; errors are still printed. */
  quiet: boolean
}

const DEFAULT_XYZ_COMMENT = 'Generated by sandwich-geometry'

const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on'])

const normalizeFlag = (value: string | undefined): boolean =>
  TRUTHY_VALUES.has(value?.trim().toLowerCase() ?? '')

export const resolveConfig = (
  env: Record<string, string | undefined> = process.env,
): AnalyzerConfig => {
  const comment = env.SANDWICH_XYZ_COMMENT?.trim() ?? ''
  return {
    xyzComment: comment || DEFAULT_XYZ_COMMENT,
    quiet: normalizeFlag(env.SANDWICH_QUIET),
  }
}
