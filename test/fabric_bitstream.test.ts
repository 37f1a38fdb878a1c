import { describe, expect, it } from "vitest";
import {
  FabricBitstream,
  buildAddressGroups,
  buildRegionalBitstreams,
  collectAddressKeys,
  findRegionalBitstreamMaxSize,
  padRegionalBitstreams,
} from "../src/fabric_bitstream.js";

describe("buildRegionalBitstreams", () => {
  it("keeps regions in first-seen order and bits in source order", () => {
    const bitstream: FabricBitstream = {
      bits: [
        { value: true, region: 2 },
        { value: false, region: 0 },
        { value: false, region: 2 },
        { value: true },
        { value: true, region: 2 },
      ],
    };
    const regions = buildRegionalBitstreams(bitstream);
    expect(Array.from(regions.keys())).toEqual([2, 0]);
    expect(regions.get(2)).toEqual([true, false, true]);
    expect(regions.get(0)).toEqual([false, true]);
  });

  it("finds the longest region and pads the others at the tail", () => {
    const regions = new Map<number, boolean[]>([
      [0, [true, false, true]],
      [1, [false, true]],
      [2, []],
    ]);
    const maxSize = findRegionalBitstreamMaxSize(regions);
    expect(maxSize).toBe(3);
    expect(padRegionalBitstreams(regions, maxSize, false)).toEqual([
      [true, false, true],
      [false, true, false],
      [false, false, false],
    ]);
    expect(padRegionalBitstreams(regions, maxSize, true)[1]).toEqual([false, true, true]);
  });

  it("reports zero length when there are no bits", () => {
    expect(findRegionalBitstreamMaxSize(buildRegionalBitstreams({ bits: [] }))).toBe(0);
  });
});

describe("buildAddressGroups", () => {
  it("merges bits sharing a BL/WL pair without reordering them", () => {
    const grouped = buildAddressGroups(
      {
        bits: [
          { value: true, bl: "01", wl: "10" },
          { value: true, bl: "00", wl: "10" },
          { value: false, bl: "01", wl: "10" },
        ],
      },
      "bl_wl",
    );
    expect(grouped).toEqual({
      ok: true,
      value: [
        { key: ["01", "10"], din: [true, false] },
        { key: ["00", "10"], din: [true] },
      ],
    });
  });

  it("keeps BL and WL as separate key parts", () => {
    const grouped = buildAddressGroups(
      {
        bits: [
          { value: true, bl: "01", wl: "10" },
          { value: false, bl: "10", wl: "01" },
        ],
      },
      "bl_wl",
    );
    expect(grouped.ok && grouped.value.length).toBe(2);
  });

  it("fails on a bit without an address", () => {
    const grouped = buildAddressGroups({ bits: [{ value: true, address: "1" }, { value: false }] }, "frame");
    expect(grouped).toEqual({ ok: false, error: "bit 1 has no frame address" });
  });

  it("fails when address widths differ", () => {
    const grouped = buildAddressGroups(
      {
        bits: [
          { value: true, bl: "01", wl: "10" },
          { value: true, bl: "01", wl: "100" },
        ],
      },
      "bl_wl",
    );
    expect(grouped).toEqual({ ok: false, error: "bit 1 address '100' is 3 bits wide, expected 2" });
  });
});

describe("collectAddressKeys", () => {
  it("returns one key per bit, repeats included", () => {
    const keys = collectAddressKeys(
      { bits: [{ value: true, address: "10" }, { value: false, address: "10" }, { value: true, address: "01" }] },
      "frame",
    );
    expect(keys).toEqual({ ok: true, value: [["10"], ["10"], ["01"]] });
  });

  it("checks BL and WL widths separately", () => {
    const keys = collectAddressKeys(
      {
        bits: [
          { value: true, bl: "001", wl: "1" },
          { value: true, bl: "010", wl: "10" },
        ],
      },
      "bl_wl",
    );
    expect(keys).toEqual({ ok: false, error: "bit 1 address '10' is 2 bits wide, expected 1" });
  });
});
