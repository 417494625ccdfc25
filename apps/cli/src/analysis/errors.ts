export type AnalysisErrorCode =
  | 'FILE_NOT_FOUND'
  | 'MALFORMED_STRUCTURE'
  | 'INDEX_OUT_OF_RANGE'
  | 'INVALID_RING_SIZE'
  | 'MISSING_METAL2'
  | 'EXTRA_METAL2'
  | 'DEGENERATE_GEOMETRY'
  | 'INVALID_ARGUMENTS'
  | 'UNKNOWN'

export type AnalysisErrorEnvelope = {
  error: {
    code: AnalysisErrorCode
    message: string
    details?: Record<string, unknown>
  }
}

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode
  readonly envelope: AnalysisErrorEnvelope

  constructor(
    code: AnalysisErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'AnalysisError'
    this.code = code
    this.envelope = {
      error: {
        code,
        message,
        details,
      },
    }
  }
}

export const createAnalysisError = (
  code: AnalysisErrorCode,
  message: string,
  details?: Record<string, unknown>,
): AnalysisError => {
  return new AnalysisError(code, message, details)
}

export const toAnalysisErrorEnvelope = (
  error: unknown,
): AnalysisErrorEnvelope => {
  if (error instanceof AnalysisError) {
    return error.envelope
  }
  if (error instanceof Error) {
    return {
      error: {
        code: 'UNKNOWN',
        message: error.message,
      },
    }
  }
  return {
    error: {
      code: 'UNKNOWN',
      message: 'Unknown analysis error',
    },
  }
}
