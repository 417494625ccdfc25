import type {
  AngleMeasurement,
  CentroidMarker,
  DihedralMeasurement,
  DistanceMeasurement,
  SandwichAnalysis,
} from '@sandwich-geometry/shared/types'

import type { StructureStore } from '@/lib/structure-store'

type AtomNamer = (index: number) => string

const fixed = (value: number, digits: number) => value.toFixed(digits)

const ringNumber = (marker: CentroidMarker) => marker.label.slice('com'.length)

/** Markers read as `CoM<n>`, everything else as `<symbol><index>`. */
export const createAtomNamer = (
  store: StructureStore,
  markers: ReadonlyArray<CentroidMarker>,
): AtomNamer => {
  const markerNames = new Map(
    markers.map((marker) => [marker.index, `CoM${ringNumber(marker)}`]),
  )
  return (index) => markerNames.get(index) ?? `${store.symbol(index)}${index}`
}

const distanceLine = (name: AtomNamer, { atoms: [a, b], value }: DistanceMeasurement) =>
  `Distance ${name(a)}--${name(b)}: ${fixed(value, 4)} Å`

const angleLine = (name: AtomNamer, { atoms, value }: AngleMeasurement) =>
  `Angle ${atoms.map(name).join('-')}: ${fixed(value, 2)} degrees`

const dihedralLine = (name: AtomNamer, { atoms, value }: DihedralMeasurement) =>
  `Dihedral ${atoms.map(name).join('-')}: ${fixed(value, 2)} degrees`

/** Human-readable progress and result lines for a finished analysis. */
export function formatAnalysisReport(
  store: StructureStore,
  analysis: SandwichAnalysis,
): Array<string> {
  const name = createAtomNamer(store, analysis.markers)
  const lines: Array<string> = []

  for (const marker of analysis.markers) {
    lines.push(`${marker.ring} detected as a ${marker.ringSize}-membered ring.`)
  }
  for (const marker of analysis.markers) {
    const { x, y, z } = marker.position
    lines.push(
      `Ring ${ringNumber(marker)} centroid: ${fixed(x, 4)}, ${fixed(y, 4)}, ${fixed(z, 4)}`,
    )
  }
  lines.push(`Added ${analysis.markers.length} dummy atoms ('X') at ring centroids.`)

  if (analysis.topology === 'two-ring') {
    lines.push(...analysis.distances.map((d) => distanceLine(name, d)))
    lines.push(...analysis.angles.map((a) => angleLine(name, a)))
    return lines
  }

  if (analysis.swapped) {
    lines.push('Note: Swapped metal1 and metal2 based on proximity to ring1 and ring3.')
  }
  lines.push(...analysis.distances.map((d) => distanceLine(name, d)))
  lines.push('', 'Bond distances in middle ring (ring2):')
  lines.push(...analysis.bonds.map((d) => distanceLine(name, d)))
  lines.push('', 'Dihedral angles in middle ring (ring2):')
  lines.push(...analysis.dihedrals.map((d) => dihedralLine(name, d)))
  lines.push('')
  lines.push(...analysis.angles.map((a) => angleLine(name, a)))
  return lines
}
