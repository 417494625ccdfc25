export const RING_SIZES = [5, 6] as const

export type RingSize = (typeof RING_SIZES)[number]

export const RING_LABELS = ['ring1', 'ring2', 'ring3'] as const

export type RingLabel = (typeof RING_LABELS)[number]

export const MARKER_LABELS = ['com1', 'com2', 'com3'] as const

export type MarkerLabel = (typeof MARKER_LABELS)[number]

export const MARKER_SYMBOL = 'X'

export const isRingSize = (size: number): size is RingSize => {
  switch (size) {
    case 5:
    case 6:
      return true
    default:
      return false
  }
}

export const markerLabelFor = (ring: RingLabel): MarkerLabel => {
  switch (ring) {
    case 'ring1':
      return 'com1'
    case 'ring2':
      return 'com2'
    case 'ring3':
      return 'com3'
  }
}
