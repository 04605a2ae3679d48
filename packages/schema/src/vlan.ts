/**
 * VLAN range expressions as used in STP labels and port definitions.
 *
 * Accepted text: comma-separated single VLANs or inclusive ranges, e.g.
 * `"100"`, `"1-10"`, `"2, 5-7, 9"`. Whitespace around items is ignored.
 */

export const MIN_VLAN = 1
export const MAX_VLAN = 4094

export type VlanRange = {
  readonly lower: number
  readonly upper: number
}

function parseVlan(text: string, source: string): number {
  if (!/^\d+$/.test(text)) {
    throw new Error(`Invalid VLAN "${text}" in "${source}"`)
  }
  const vlan = Number(text)
  if (vlan < MIN_VLAN || vlan > MAX_VLAN) {
    throw new Error(`VLAN ${vlan} outside ${MIN_VLAN}-${MAX_VLAN} in "${source}"`)
  }
  return vlan
}

export class VlanRanges {
  /** Sorted, non-overlapping, non-adjacent ranges. */
  readonly ranges: readonly VlanRange[]

  private constructor(ranges: VlanRange[]) {
    this.ranges = ranges
  }

  static parse(text: string): VlanRanges {
    const ranges: VlanRange[] = []
    for (const raw of text.split(',')) {
      const item = raw.trim()
      if (!item) {
        throw new Error(`Empty VLAN item in "${text}"`)
      }
      const [lowerText, upperText, ...rest] = item.split('-').map((part) => part.trim())
      if (rest.length > 0 || lowerText === undefined) {
        throw new Error(`Invalid VLAN range "${item}" in "${text}"`)
      }
      const lower = parseVlan(lowerText, text)
      const upper = upperText === undefined ? lower : parseVlan(upperText, text)
      if (upper < lower) {
        throw new Error(`Descending VLAN range "${item}" in "${text}"`)
      }
      ranges.push({ lower, upper })
    }
    return new VlanRanges(VlanRanges.merge(ranges))
  }

  private static merge(ranges: VlanRange[]): VlanRange[] {
    const sorted = [...ranges].sort((a, b) => a.lower - b.lower)
    const merged: VlanRange[] = []
    for (const range of sorted) {
      const last = merged[merged.length - 1]
      if (last && range.lower <= last.upper + 1) {
        merged[merged.length - 1] = { lower: last.lower, upper: Math.max(last.upper, range.upper) }
      } else {
        merged.push(range)
      }
    }
    return merged
  }

  contains(vlan: number): boolean {
    return this.ranges.some((range) => vlan >= range.lower && vlan <= range.upper)
  }

  get size(): number {
    return this.ranges.reduce((total, range) => total + range.upper - range.lower + 1, 0)
  }

  /** The single VLAN when the expression denotes exactly one, otherwise null. */
  get single(): number | null {
    const [only] = this.ranges
    return this.ranges.length === 1 && only && only.lower === only.upper ? only.lower : null
  }

  toString(): string {
    return this.ranges
      .map((range) => (range.lower === range.upper ? `${range.lower}` : `${range.lower}-${range.upper}`))
      .join(',')
  }
}
