import type { Vector3 } from '@sandwich-geometry/shared/types'

import type { PositionLookup } from './structure-store'
import { createAnalysisError } from '@/analysis/errors'

/** Normals shorter than this are treated as an undefined plane. */
const DEGENERATE_NORM = 1e-10

const RAD_TO_DEG = 180 / Math.PI

export const subtract = (a: Vector3, b: Vector3): Vector3 => ({
  x: a.x - b.x,
  y: a.y - b.y,
  z: a.z - b.z,
})

export const dot = (a: Vector3, b: Vector3): number =>
  a.x * b.x + a.y * b.y + a.z * b.z

export const cross = (a: Vector3, b: Vector3): Vector3 => ({
  x: a.y * b.z - a.z * b.y,
  y: a.z * b.x - a.x * b.z,
  z: a.x * b.y - a.y * b.x,
})

export const norm = (v: Vector3): number => Math.sqrt(dot(v, v))

const scale = (v: Vector3, factor: number): Vector3 => ({
  x: v.x * factor,
  y: v.y * factor,
  z: v.z * factor,
})

const clampCosine = (value: number) => Math.min(1, Math.max(-1, value))

const assertInRange = (view: PositionLookup, indices: ReadonlyArray<number>) => {
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 1 || index > view.size) {
      throw createAnalysisError(
        'INDEX_OUT_OF_RANGE',
        `Atom index ${index} is out of range (1-${view.size}).`,
        { index, atomCount: view.size },
      )
    }
  }
}

/** Arithmetic mean of the referenced positions; order of `ring` does not matter. */
export function centroid(
  view: PositionLookup,
  ring: ReadonlyArray<number>,
): Vector3 {
  assertInRange(view, ring)
  const sum = ring.reduce<Vector3>(
    (acc, index) => {
      const p = view.position(index)
      return { x: acc.x + p.x, y: acc.y + p.y, z: acc.z + p.z }
    },
    { x: 0, y: 0, z: 0 },
  )
  return scale(sum, 1 / ring.length)
}

export function distance(view: PositionLookup, i: number, j: number): number {
  return norm(subtract(view.position(i), view.position(j)))
}

/** Angle i-j-k in degrees, vertex at j. */
export function angle(
  view: PositionLookup,
  i: number,
  j: number,
  k: number,
): number {
  const vertex = view.position(j)
  const v1 = subtract(view.position(i), vertex)
  const v2 = subtract(view.position(k), vertex)
  const lengths = norm(v1) * norm(v2)
  if (lengths === 0) {
    throw createAnalysisError(
      'DEGENERATE_GEOMETRY',
      `Angle ${i}-${j}-${k} is undefined: coincident atoms.`,
      { atoms: [i, j, k] },
    )
  }
  return Math.acos(clampCosine(dot(v1, v2) / lengths)) * RAD_TO_DEG
}

const unitNormal = (a: Vector3, b: Vector3, atoms: Array<number>): Vector3 => {
  const n = cross(a, b)
  const length = norm(n)
  if (length < DEGENERATE_NORM) {
    throw createAnalysisError(
      'DEGENERATE_GEOMETRY',
      `Dihedral ${atoms.join('-')} is undefined: three consecutive atoms are collinear.`,
      { atoms },
    )
  }
  return scale(n, 1 / length)
}

/**
 * Signed dihedral i-j-k-l in degrees. Negative when the central bond points
 * against n1 × n2.
 */
export function dihedral(
  view: PositionLookup,
  i: number,
  j: number,
  k: number,
  l: number,
): number {
  const p0 = view.position(i)
  const p1 = view.position(j)
  const p2 = view.position(k)
  const p3 = view.position(l)

  const b0 = subtract(p1, p0)
  const b1 = subtract(p2, p1)
  const b2 = subtract(p3, p2)

  const atoms = [i, j, k, l]
  const n1 = unitNormal(b0, b1, atoms)
  const n2 = unitNormal(b1, b2, atoms)

  const value = Math.acos(clampCosine(dot(n1, n2))) * RAD_TO_DEG
  return dot(b1, cross(n1, n2)) < 0 ? -value : value
}
