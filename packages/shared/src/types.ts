import type { MarkerLabel, RingLabel, RingSize } from './ring-topology'

export type Atom = {
  symbol: string
  x: number
  y: number
  z: number
}

export type Vector3 = {
  x: number
  y: number
  z: number
}

/** Parsed XYZ file: the atom block plus the free-text second line. */
export type XyzDocument = {
  atoms: Atom[]
  comment: string
}

/** One-based atom indices, in ring order. */
export type RingSequence = number[]

export type SandwichInput = {
  ring1: RingSequence
  ring2: RingSequence
  ring3?: RingSequence | null
  metal1: number
  metal2?: number | null
}

export type CentroidMarker = {
  label: MarkerLabel
  ring: RingLabel
  ringSize: RingSize
  /** One-based index of the appended `X` atom. */
  index: number
  position: Vector3
}

export type DistanceMeasurement = {
  kind: 'distance'
  atoms: [number, number]
  value: number
}

export type AngleMeasurement = {
  kind: 'angle'
  atoms: [number, number, number]
  value: number
}

export type DihedralMeasurement = {
  kind: 'dihedral'
  atoms: [number, number, number, number]
  value: number
}

export type TwoRingAnalysis = {
  topology: 'two-ring'
  markers: [CentroidMarker, CentroidMarker]
  metal1: number
  /** metal1 to com2. */
  distances: [DistanceMeasurement]
  /** com1-metal1-com2. */
  angles: [AngleMeasurement]
}

export type ThreeRingAnalysis = {
  topology: 'three-ring'
  markers: [CentroidMarker, CentroidMarker, CentroidMarker]
  metal1: number
  metal2: number
  swapped: boolean
  /** m1-com1, m1-com2, m2-com2, m2-com3, m1-m2. */
  distances: [
    DistanceMeasurement,
    DistanceMeasurement,
    DistanceMeasurement,
    DistanceMeasurement,
    DistanceMeasurement,
  ]
  bonds: DistanceMeasurement[]
  dihedrals: DihedralMeasurement[]
  /** com1-m1-com2, com1-com2-com3, com2-m2-com3, m1-com2-m2. */
  angles: [AngleMeasurement, AngleMeasurement, AngleMeasurement, AngleMeasurement]
}

export type SandwichAnalysis = TwoRingAnalysis | ThreeRingAnalysis
