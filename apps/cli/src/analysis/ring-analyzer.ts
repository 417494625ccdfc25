import {
  MARKER_SYMBOL,
  isRingSize,
  markerLabelFor,
} from '@sandwich-geometry/shared/ring-topology'
import type { RingLabel, RingSize } from '@sandwich-geometry/shared/ring-topology'
import type {
  AngleMeasurement,
  CentroidMarker,
  DihedralMeasurement,
  DistanceMeasurement,
  RingSequence,
  SandwichAnalysis,
  SandwichInput,
  ThreeRingAnalysis,
  TwoRingAnalysis,
} from '@sandwich-geometry/shared/types'

import { createAnalysisError } from './errors'
import { angle, centroid, dihedral, distance } from '@/lib/geometry'
import type { PositionLookup, StructureStore } from '@/lib/structure-store'

export type LabelledRing = { label: RingLabel; atoms: RingSequence }

export type RingConfiguration =
  | {
      topology: 'two-ring'
      rings: [LabelledRing, LabelledRing]
      metal1: number
    }
  | {
      topology: 'three-ring'
      rings: [LabelledRing, LabelledRing, LabelledRing]
      metal1: number
      metal2: number
    }

const ringSizeOf = (ring: LabelledRing): RingSize => {
  const size = ring.atoms.length
  if (!isRingSize(size)) {
    throw createAnalysisError(
      'INVALID_RING_SIZE',
      `${ring.label} must have 5 or 6 atoms.`,
      { ring: ring.label, size },
    )
  }
  return size
}

/**
 * Checks ring sizes (in ring order) and the metal2 rule. Needs no structure,
 * so it can run before any file is read.
 */
export function assertRingConfiguration(input: SandwichInput): RingConfiguration {
  const ring1: LabelledRing = { label: 'ring1', atoms: input.ring1 }
  const ring2: LabelledRing = { label: 'ring2', atoms: input.ring2 }
  const ring3: LabelledRing | null =
    input.ring3 != null ? { label: 'ring3', atoms: input.ring3 } : null

  ringSizeOf(ring1)
  ringSizeOf(ring2)
  if (ring3) ringSizeOf(ring3)

  const metal2 = input.metal2 ?? null
  if (ring3) {
    if (metal2 === null) {
      throw createAnalysisError(
        'MISSING_METAL2',
        '--metal2 required for 3-ring structure.',
      )
    }
    return {
      topology: 'three-ring',
      rings: [ring1, ring2, ring3],
      metal1: input.metal1,
      metal2,
    }
  }
  if (metal2 !== null) {
    throw createAnalysisError(
      'EXTRA_METAL2',
      '--metal2 specified but only 2 rings provided.',
    )
  }
  return { topology: 'two-ring', rings: [ring1, ring2], metal1: input.metal1 }
}

/** Every ring and metal index must name an atom of the input structure. */
export function assertIndicesInRange(
  config: RingConfiguration,
  atomCount: number,
): void {
  const check = (owner: string, index: number) => {
    if (!Number.isInteger(index) || index < 1 || index > atomCount) {
      throw createAnalysisError(
        'INDEX_OUT_OF_RANGE',
        `${owner} atom index ${index} is out of range (1-${atomCount}).`,
        { owner, index, atomCount },
      )
    }
  }
  for (const ring of config.rings) {
    ring.atoms.forEach((index) => check(ring.label, index))
  }
  check('metal1', config.metal1)
  if (config.topology === 'three-ring') {
    check('metal2', config.metal2)
  }
}

/** Appends one `X` marker per ring, in ring order, at the ring centroid. */
export function appendCentroidMarkers(
  store: StructureStore,
  rings: ReadonlyArray<LabelledRing>,
): Array<CentroidMarker> {
  const markers: Array<CentroidMarker> = []
  for (const ring of rings) {
    const ringSize = ringSizeOf(ring)
    const position = centroid(store, ring.atoms)
    const index = store.append(MARKER_SYMBOL, position)
    markers.push({
      label: markerLabelFor(ring.label),
      ring: ring.label,
      ringSize,
      index,
      position,
    })
  }
  return markers
}

export type MetalAssignment = {
  metal1: number
  metal2: number
  swapped: boolean
}

/**
 * Relabels the metals once so that metal1 sits nearer ring1 and metal2 nearer
 * ring3. Only the case where both metals are strictly nearer the opposite ring
 * is swapped; ties and "both nearer the same ring" are left as given.
 */
export function correlateMetals(
  view: PositionLookup,
  metal1: number,
  metal2: number,
  com1: number,
  com3: number,
): MetalAssignment {
  const m1ToRing1 = distance(view, metal1, com1)
  const m1ToRing3 = distance(view, metal1, com3)
  const m2ToRing1 = distance(view, metal2, com1)
  const m2ToRing3 = distance(view, metal2, com3)

  if (m1ToRing3 < m1ToRing1 && m2ToRing1 < m2ToRing3) {
    return { metal1: metal2, metal2: metal1, swapped: true }
  }
  return { metal1, metal2, swapped: false }
}

const measureDistance = (
  view: PositionLookup,
  a: number,
  b: number,
): DistanceMeasurement => ({
  kind: 'distance',
  atoms: [a, b],
  value: distance(view, a, b),
})

const measureAngle = (
  view: PositionLookup,
  a: number,
  b: number,
  c: number,
): AngleMeasurement => ({
  kind: 'angle',
  atoms: [a, b, c],
  value: angle(view, a, b, c),
})

/** Bond i-(i+1) for every ring position, closing last to first. */
export function middleRingBonds(
  view: PositionLookup,
  ring: RingSequence,
): Array<DistanceMeasurement> {
  const n = ring.length
  return ring.map((atom, i) => measureDistance(view, atom, ring[(i + 1) % n]))
}

/** Dihedral over the window i..i+3 for every ring position, wrapping around. */
export function middleRingDihedrals(
  view: PositionLookup,
  ring: RingSequence,
): Array<DihedralMeasurement> {
  const n = ring.length
  return ring.map((atom, i) => {
    const atoms: DihedralMeasurement['atoms'] = [
      atom,
      ring[(i + 1) % n],
      ring[(i + 2) % n],
      ring[(i + 3) % n],
    ]
    return {
      kind: 'dihedral',
      atoms,
      value: dihedral(view, ...atoms),
    }
  })
}

const analyzeTwoRings = (
  view: PositionLookup,
  [com1, com2]: [CentroidMarker, CentroidMarker],
  metal1: number,
): TwoRingAnalysis => ({
  topology: 'two-ring',
  markers: [com1, com2],
  metal1,
  distances: [measureDistance(view, metal1, com2.index)],
  angles: [measureAngle(view, com1.index, metal1, com2.index)],
})

const analyzeThreeRings = (
  view: PositionLookup,
  markers: [CentroidMarker, CentroidMarker, CentroidMarker],
  ring2: RingSequence,
  givenMetal1: number,
  givenMetal2: number,
): ThreeRingAnalysis => {
  const [c1, c2, c3] = markers.map((marker) => marker.index)
  const { metal1, metal2, swapped } = correlateMetals(
    view,
    givenMetal1,
    givenMetal2,
    c1,
    c3,
  )

  return {
    topology: 'three-ring',
    markers,
    metal1,
    metal2,
    swapped,
    distances: [
      measureDistance(view, metal1, c1),
      measureDistance(view, metal1, c2),
      measureDistance(view, metal2, c2),
      measureDistance(view, metal2, c3),
      measureDistance(view, metal1, metal2),
    ],
    bonds: middleRingBonds(view, ring2),
    dihedrals: middleRingDihedrals(view, ring2),
    angles: [
      measureAngle(view, c1, metal1, c2),
      measureAngle(view, c1, c2, c3),
      measureAngle(view, c2, metal2, c3),
      measureAngle(view, metal1, c2, metal2),
    ],
  }
}

/**
 * Validates the ring/metal configuration, appends one centroid marker per
 * ring to `store`, and measures the descriptor set for the topology.
 * Nothing is appended when validation fails.
 */
export function analyzeSandwich(
  store: StructureStore,
  input: SandwichInput,
): SandwichAnalysis {
  const config = assertRingConfiguration(input)
  assertIndicesInRange(config, store.size)

  const view = store.view()
  if (config.topology === 'two-ring') {
    const [com1, com2] = appendCentroidMarkers(store, config.rings)
    return analyzeTwoRings(view, [com1, com2], config.metal1)
  }
  const [com1, com2, com3] = appendCentroidMarkers(store, config.rings)
  return analyzeThreeRings(
    view,
    [com1, com2, com3],
    config.rings[1].atoms,
    config.metal1,
    config.metal2,
  )
}
