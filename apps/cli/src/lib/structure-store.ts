import type { Atom, Vector3 } from '@sandwich-geometry/shared/types'

import { createAnalysisError } from '@/analysis/errors'

/** Read-only, one-based view of atom positions handed to the geometry kernel. */
export type PositionLookup = {
  readonly size: number
  position: (index: number) => Vector3
}

const freezeAtom = (atom: Atom): Readonly<Atom> =>
  Object.freeze({ symbol: atom.symbol, x: atom.x, y: atom.y, z: atom.z })

/**
 * Ordered, append-only atom list. Indices are one-based at the boundary;
 * atoms are never removed or reordered once stored.
 */
export class StructureStore implements PositionLookup {
  private readonly atoms: Array<Readonly<Atom>>

  constructor(atoms: ReadonlyArray<Atom> = []) {
    this.atoms = atoms.map(freezeAtom)
  }

  get size(): number {
    return this.atoms.length
  }

  has(index: number): boolean {
    return Number.isInteger(index) && index >= 1 && index <= this.atoms.length
  }

  atom(index: number): Readonly<Atom> {
    if (!this.has(index)) {
      throw createAnalysisError(
        'INDEX_OUT_OF_RANGE',
        `Atom index ${index} is out of range (1-${this.atoms.length}).`,
        { index, atomCount: this.atoms.length },
      )
    }
    return this.atoms[index - 1]
  }

  symbol(index: number): string {
    return this.atom(index).symbol
  }

  position(index: number): Vector3 {
    const { x, y, z } = this.atom(index)
    return { x, y, z }
  }

  /** Appends an atom and returns its one-based index. */
  append(symbol: string, position: Vector3): number {
    this.atoms.push(freezeAtom({ symbol, ...position }))
    return this.atoms.length
  }

  view(): PositionLookup {
    const currentSize = () => this.size
    return {
      get size() {
        return currentSize()
      },
      position: (index) => this.position(index),
    }
  }

  toAtoms(): Array<Atom> {
    return this.atoms.map((atom) => ({ ...atom }))
  }
}
