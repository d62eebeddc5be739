/**
 * Panel Module - Zone Bitset
 *
 * Fixed-size set of 64 zone slots stored as 8 groups of 8 bits.
 * Zone number = group * 8 + bit + 1.
 */
import { MAX_ZONES, ZONE_GROUPS, ZONES_PER_GROUP } from "./schema.js";

export class ZoneBitset {
  private readonly groups = new Uint8Array(ZONE_GROUPS);

  /**
   * Zone number for a group/bit address.
   */
  static zoneNumber(group: number, bit: number): number {
    return group * ZONES_PER_GROUP + bit + 1;
  }

  get(zone: number): boolean {
    const [group, bit] = locate(zone);
    return ((this.groups[group] ?? 0) & (1 << bit)) !== 0;
  }

  set(zone: number, value = true): void {
    const [group, bit] = locate(zone);
    const current = this.groups[group] ?? 0;
    this.groups[group] = value ? current | (1 << bit) : current & ~(1 << bit);
  }

  clear(zone: number): void {
    this.set(zone, false);
  }

  /**
   * Raw bits of one group (bit 0 = lowest zone of the group).
   */
  getGroup(group: number): number {
    assertGroup(group);
    return this.groups[group] ?? 0;
  }

  setGroup(group: number, bits: number): void {
    assertGroup(group);
    this.groups[group] = bits & 0xff;
  }

  /** Set every slot. */
  fill(): void {
    this.groups.fill(0xff);
  }

  /** Clear every slot. */
  reset(): void {
    this.groups.fill(0);
  }

  isEmpty(): boolean {
    return this.groups.every((bits) => bits === 0);
  }

  /**
   * Set zones in ascending order.
   */
  *zones(): Generator<number> {
    for (let group = 0; group < ZONE_GROUPS; group++) {
      const bits = this.groups[group] ?? 0;
      if (bits === 0) continue;
      for (let bit = 0; bit < ZONES_PER_GROUP; bit++) {
        if (bits & (1 << bit)) {
          yield ZoneBitset.zoneNumber(group, bit);
        }
      }
    }
  }
}

function assertGroup(group: number): void {
  if (!Number.isInteger(group) || group < 0 || group >= ZONE_GROUPS) {
    throw new RangeError(`Zone group out of range: ${group}`);
  }
}

function locate(zone: number): [group: number, bit: number] {
  if (!Number.isInteger(zone) || zone < 1 || zone > MAX_ZONES) {
    throw new RangeError(`Zone out of range: ${zone}`);
  }
  const index = zone - 1;
  return [Math.floor(index / ZONES_PER_GROUP), index % ZONES_PER_GROUP];
}
