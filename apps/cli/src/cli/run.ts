import type { XyzDocument } from '@sandwich-geometry/shared/types'

import { USAGE, parseCommandLine } from './options'
import { formatAnalysisReport } from './report'
import { toAnalysisErrorEnvelope } from '@/analysis/errors'
import { analyzeSandwich, assertRingConfiguration } from '@/analysis/ring-analyzer'
import { resolveConfig } from '@/config'
import type { AnalyzerConfig } from '@/config'
import { readStructureFile, writeStructureFile } from '@/lib/structure-file'
import { StructureStore } from '@/lib/structure-store'

export type CliDependencies = {
  readStructure: (path: string) => Promise<XyzDocument>
  writeStructure: (path: string, document: XyzDocument) => Promise<void>
  log: (line: string) => void
  logError: (message: string, details: Record<string, unknown>) => void
  config: AnalyzerConfig
}

const defaultDependencies = (): CliDependencies => ({
  readStructure: readStructureFile,
  writeStructure: writeStructureFile,
  log: (line) => console.log(line),
  logError: (message, details) => console.error(message, details),
  config: resolveConfig(),
})

/**
 * Runs one analysis from argv and returns the process exit code. Every
 * failure is reported here; nothing is written when any step fails.
 */
export async function runCli(
  argv: Array<string>,
  overrides: Partial<CliDependencies> = {},
): Promise<number> {
  const deps = { ...defaultDependencies(), ...overrides }
  const report = (line: string) => {
    if (!deps.config.quiet) deps.log(line)
  }

  try {
    const command = parseCommandLine(argv)
    if (command.kind === 'help') {
      deps.log(USAGE)
      return 0
    }
    const { options } = command

    assertRingConfiguration(options)
    const document = await deps.readStructure(options.input)
    const store = new StructureStore(document.atoms)
    const analysis = analyzeSandwich(store, options)

    formatAnalysisReport(store, analysis).forEach(report)

    await deps.writeStructure(options.output, {
      comment: deps.config.xyzComment,
      atoms: store.toAtoms(),
    })
    report(
      `Modified structure with ${analysis.markers.length} dummy atoms saved to '${options.output}'.`,
    )
    return 0
  } catch (error: unknown) {
    const { error: failure } = toAnalysisErrorEnvelope(error)
    deps.logError(`[analyze] ${failure.message}`, {
      code: failure.code,
      ...(failure.details ? { details: failure.details } : {}),
    })
    return 1
  }
}
