import fc from 'fast-check'
import { describe, expect, it } from 'vitest'

import { angle, centroid, cross, dihedral, distance, norm, subtract } from './geometry'
import { StructureStore } from './structure-store'

import type { Atom, Vector3 } from '@sandwich-geometry/shared/types'

/** Coordinates on a 0.01 Å grid in [-10, 10]. */
const coordinate = fc.integer({ min: -1000, max: 1000 }).map((v) => v / 100)

const pointArb = fc.record({ x: coordinate, y: coordinate, z: coordinate }) satisfies fc.Arbitrary<Vector3>

const toStore = (points: Array<Vector3>) =>
  new StructureStore(points.map((p): Atom => ({ symbol: 'C', ...p })))

const normalLength = (a: Vector3, b: Vector3, c: Vector3) =>
  norm(cross(subtract(b, a), subtract(c, b)))

describe('geometry kernel properties', () => {
  it('computes the same centroid for any ordering of a ring', () => {
    fc.assert(
      fc.property(
        fc.array(pointArb, { minLength: 5, maxLength: 6 }).chain((points) =>
          fc.tuple(
            fc.constant(points),
            fc.shuffledSubarray(
              points.map((_, index) => index + 1),
              { minLength: points.length, maxLength: points.length },
            ),
          ),
        ),
        ([points, permuted]) => {
          const store = toStore(points)
          const ordered = points.map((_, index) => index + 1)
          const expected = centroid(store, ordered)
          const actual = centroid(store, permuted)

          expect(actual.x).toBeCloseTo(expected.x, 9)
          expect(actual.y).toBeCloseTo(expected.y, 9)
          expect(actual.z).toBeCloseTo(expected.z, 9)
        },
      ),
      { numRuns: 150 },
    )
  })

  it('measures symmetric distances and zero self-distance', () => {
    fc.assert(
      fc.property(pointArb, pointArb, (a, b) => {
        const store = toStore([a, b])

        expect(distance(store, 1, 2)).toBe(distance(store, 2, 1))
        expect(distance(store, 1, 1)).toBe(0)
      }),
      { numRuns: 150 },
    )
  })

  it('keeps angles within [0, 180] degrees', () => {
    fc.assert(
      fc.property(pointArb, pointArb, pointArb, (a, b, c) => {
        fc.pre(norm(subtract(a, b)) > 0 && norm(subtract(c, b)) > 0)
        const value = angle(toStore([a, b, c]), 1, 2, 3)

        expect(value).toBeGreaterThanOrEqual(0)
        expect(value).toBeLessThanOrEqual(180)
      }),
      { numRuns: 200 },
    )
  })

  it('keeps angles defined for collinear points along a shared direction', () => {
    fc.assert(
      fc.property(
        pointArb,
        fc.double({ min: 0.1, max: 10, noNaN: true }),
        fc.double({ min: 0.1, max: 10, noNaN: true }),
        (direction, s, t) => {
          fc.pre(norm(direction) > 0.1)
          const origin = { x: 0, y: 0, z: 0 }
          const a = { x: direction.x * s, y: direction.y * s, z: direction.z * s }
          const c = { x: direction.x * t, y: direction.y * t, z: direction.z * t }
          const value = angle(toStore([a, origin, c]), 1, 2, 3)

          expect(Number.isNaN(value)).toBe(false)
          expect(value).toBeCloseTo(0, 4)
        },
      ),
      { numRuns: 150 },
    )
  })

  it('gives the same dihedral when the four atoms are read backwards', () => {
    fc.assert(
      fc.property(pointArb, pointArb, pointArb, pointArb, (a, b, c, d) => {
        fc.pre(normalLength(a, b, c) > 0.1 && normalLength(b, c, d) > 0.1)
        const store = toStore([a, b, c, d])
        const forward = dihedral(store, 1, 2, 3, 4)
        fc.pre(Math.abs(forward) > 1 && Math.abs(forward) < 179)

        expect(dihedral(store, 4, 3, 2, 1)).toBeCloseTo(forward, 6)
      }),
      { numRuns: 200 },
    )
  })

  it('flips the dihedral sign for the mirror image', () => {
    fc.assert(
      fc.property(pointArb, pointArb, pointArb, pointArb, (a, b, c, d) => {
        fc.pre(normalLength(a, b, c) > 0.1 && normalLength(b, c, d) > 0.1)
        const points = [a, b, c, d]
        const forward = dihedral(toStore(points), 1, 2, 3, 4)
        fc.pre(Math.abs(forward) > 1 && Math.abs(forward) < 179)
        const mirrored = toStore(points.map((p) => ({ ...p, z: -p.z })))

        expect(dihedral(mirrored, 1, 2, 3, 4)).toBeCloseTo(-forward, 9)
      }),
      { numRuns: 200 },
    )
  })

  it('returns 0 or 180 degrees for four coplanar atoms', () => {
    const planar = fc.record({ x: coordinate, y: coordinate, z: fc.constant(0) })
    fc.assert(
      fc.property(planar, planar, planar, planar, (a, b, c, d) => {
        fc.pre(normalLength(a, b, c) > 1e-3 && normalLength(b, c, d) > 1e-3)
        const magnitude = Math.abs(dihedral(toStore([a, b, c, d]), 1, 2, 3, 4))

        expect(magnitude < 1e-4 || Math.abs(magnitude - 180) < 1e-4).toBe(true)
      }),
      { numRuns: 200 },
    )
  })
})
