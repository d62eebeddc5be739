/**
 * Zone Bitset Tests
 */
import { describe, expect, it } from "vitest";

import { ZoneBitset } from "../bitset.js";

describe("ZoneBitset", () => {
  it("maps group/bit addresses to zone numbers", () => {
    expect(ZoneBitset.zoneNumber(0, 0)).toBe(1);
    expect(ZoneBitset.zoneNumber(0, 7)).toBe(8);
    expect(ZoneBitset.zoneNumber(1, 0)).toBe(9);
    expect(ZoneBitset.zoneNumber(7, 7)).toBe(64);
  });

  it("stores a zone in its group and bit", () => {
    const bits = new ZoneBitset();

    bits.set(5);
    bits.set(9);

    expect(bits.get(5)).toBe(true);
    expect(bits.get(6)).toBe(false);
    expect(bits.getGroup(0)).toBe(0b0001_0000);
    expect(bits.getGroup(1)).toBe(0b0000_0001);
  });

  it("clears a single zone", () => {
    const bits = new ZoneBitset();
    bits.set(3);
    bits.set(4);

    bits.clear(3);

    expect(bits.get(3)).toBe(false);
    expect(bits.get(4)).toBe(true);
  });

  it("lists set zones in ascending order", () => {
    const bits = new ZoneBitset();
    bits.set(64);
    bits.set(10);
    bits.set(3);

    expect([...bits.zones()]).toEqual([3, 10, 64]);
  });

  it("reports every slot after fill and none after reset", () => {
    const bits = new ZoneBitset();

    bits.fill();
    expect([...bits.zones()]).toHaveLength(64);
    expect(bits.isEmpty()).toBe(false);

    bits.reset();
    expect(bits.isEmpty()).toBe(true);
  });

  it("masks group writes to 8 bits", () => {
    const bits = new ZoneBitset();

    bits.setGroup(2, 0x1ff);

    expect(bits.getGroup(2)).toBe(0xff);
  });

  it("rejects zones outside 1-64", () => {
    const bits = new ZoneBitset();

    expect(() => bits.get(0)).toThrow(RangeError);
    expect(() => bits.set(65)).toThrow(RangeError);
    expect(() => bits.getGroup(8)).toThrow(RangeError);
  });
});
