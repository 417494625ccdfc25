import { extname } from 'node:path'
import { parseArgs } from 'node:util'

import { RING_LABELS } from '@sandwich-geometry/shared/ring-topology'
import type { RingLabel } from '@sandwich-geometry/shared/ring-topology'
import type { SandwichInput } from '@sandwich-geometry/shared/types'
import { z } from 'zod'

import { createAnalysisError } from '@/analysis/errors'

export const USAGE = `Usage: sandwich-geometry <structure.xyz> --ring1 <atoms...> --ring2 <atoms...> [--ring3 <atoms...>] --metal1 <atom> [--metal2 <atom>] [--output <path>]

Adds dummy atoms ('X') at ring centroids of a metallocene or inverse sandwich
and reports metal-centroid distances and angles. With three rings, the middle
ring's bond distances and dihedral angles and the metal-metal distance are
reported too.

Options:
  --ring1, --ring2   atom numbers (1-based) of a 5- or 6-membered ring
  --ring3            atom numbers of an optional third ring
  --metal1           atom number of the first metal
  --metal2           atom number of the second metal (required with --ring3)
  -o, --output       output XYZ path (default: <input>_analyzed.<ext>)
  -h, --help         show this message

Atom numbers follow the option as separate arguments or comma-separated.
The middle ring (ring2) must be listed in ring order when three rings are given.
Environment: SANDWICH_XYZ_COMMENT sets the output comment line; SANDWICH_QUIET=1
suppresses progress output.`

const atomIndex = z.coerce
  .number({ invalid_type_error: 'must be an atom number' })
  .int('must be a whole atom number')
  .positive('must be 1 or greater')

const ringSchema = z.array(atomIndex).min(1, 'needs at least one atom number')

export const commandOptionsSchema = z.object({
  input: z.string().min(1, 'an input XYZ file is required'),
  ring1: ringSchema,
  ring2: ringSchema,
  ring3: ringSchema.optional(),
  metal1: atomIndex,
  metal2: atomIndex.optional(),
  output: z.string().min(1).optional(),
})

export type CommandOptions = SandwichInput & {
  input: string
  output: string
}

export type ParsedCommand =
  | { kind: 'help' }
  | { kind: 'analyze'; options: CommandOptions }

/** `m.xyz` becomes `m_analyzed.xyz`; a path without extension just gains the suffix. */
export const defaultOutputPath = (input: string): string => {
  const extension = extname(input)
  return `${input.slice(0, input.length - extension.length)}_analyzed${extension}`
}

const isRingLabel = (name: string): name is RingLabel =>
  RING_LABELS.some((label) => label === name)

const splitValues = (value: string) =>
  value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)

const invalidArguments = (message: string, details?: Record<string, unknown>) =>
  createAnalysisError('INVALID_ARGUMENTS', message, details)

const tokenize = (argv: Array<string>) => {
  try {
    return parseArgs({
      args: argv,
      options: {
        ring1: { type: 'string', multiple: true },
        ring2: { type: 'string', multiple: true },
        ring3: { type: 'string', multiple: true },
        metal1: { type: 'string' },
        metal2: { type: 'string' },
        output: { type: 'string', short: 'o' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
      strict: true,
      tokens: true,
    })
  } catch (error: unknown) {
    throw invalidArguments(error instanceof Error ? error.message : String(error))
  }
}

/**
 * Parses argv (without the node and script entries). Ring options take every
 * following bare argument up to the next option.
 */
export function parseCommandLine(argv: Array<string>): ParsedCommand {
  const { values, tokens } = tokenize(argv)
  if (values.help) {
    return { kind: 'help' }
  }

  const rings: Partial<Record<RingLabel, Array<string>>> = {}
  const positionals: Array<string> = []
  let currentRing: RingLabel | null = null

  for (const token of tokens) {
    if (token.kind === 'option') {
      currentRing = isRingLabel(token.name) ? token.name : null
      if (currentRing && token.value !== undefined) {
        rings[currentRing] = [...(rings[currentRing] ?? []), ...splitValues(token.value)]
      }
    } else if (token.kind === 'positional') {
      if (currentRing) {
        rings[currentRing] = [...(rings[currentRing] ?? []), ...splitValues(token.value)]
      } else {
        positionals.push(token.value)
      }
    } else {
      currentRing = null
    }
  }

  if (positionals.length > 1) {
    throw invalidArguments(
      `Expected one input file but got ${positionals.length}: ${positionals.join(' ')}`,
      { positionals },
    )
  }

  const parsed = commandOptionsSchema.safeParse({
    input: positionals[0] ?? '',
    ring1: rings.ring1 ?? [],
    ring2: rings.ring2 ?? [],
    ring3: rings.ring3,
    metal1: values.metal1,
    metal2: values.metal2,
    output: values.output,
  })
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`,
    )
    throw invalidArguments(`Invalid arguments: ${issues.join('; ')}`, { issues })
  }

  const { output, ...rest } = parsed.data
  return {
    kind: 'analyze',
    options: {
      ...rest,
      ring3: rest.ring3 ?? null,
      metal2: rest.metal2 ?? null,
      output: output ?? defaultOutputPath(rest.input),
    },
  }
}
