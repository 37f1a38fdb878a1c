import { Result } from "./util.js";

export type ConfigBit = {
  value: boolean;
  /** scan-chain region id; bits without one sit in region 0 */
  region?: number;
  /** frame address, MSB first */
  address?: string;
  bl?: string;
  wl?: string;
  path?: string;
};

export type FabricBitstream = {
  bits: ConfigBit[];
};

export type AddressKeyShape = "frame" | "bl_wl";

export type AddressGroup = {
  key: string[];
  din: boolean[];
};

export const DEFAULT_REGION = 0;

export function countBits(bitstream: FabricBitstream): number {
  return bitstream.bits.length;
}

export function bitRegion(bit: ConfigBit): number {
  return bit.region ?? DEFAULT_REGION;
}

/** Splits the bits into per-region chains, regions in the order they are first met. */
export function buildRegionalBitstreams(bitstream: FabricBitstream): Map<number, boolean[]> {
  const regions = new Map<number, boolean[]>();
  for (const bit of bitstream.bits) {
    const id = bitRegion(bit);
    let chain = regions.get(id);
    if (!chain) {
      chain = [];
      regions.set(id, chain);
    }
    chain.push(bit.value);
  }
  return regions;
}

export function findRegionalBitstreamMaxSize(regions: ReadonlyMap<number, readonly boolean[]>): number {
  let best = 0;
  for (const chain of regions.values()) best = Math.max(best, chain.length);
  return best;
}

export function padRegionalBitstreams(
  regions: ReadonlyMap<number, readonly boolean[]>,
  maxSize: number,
  padBit: boolean,
): boolean[][] {
  const padded: boolean[][] = [];
  for (const chain of regions.values()) {
    const fill = Math.max(0, maxSize - chain.length);
    padded.push([...chain, ...new Array<boolean>(fill).fill(padBit)]);
  }
  return padded;
}

function addressKeyOf(bit: ConfigBit, shape: AddressKeyShape): string[] | undefined {
  switch (shape) {
    case "frame":
      return bit.address === undefined ? undefined : [bit.address];
    case "bl_wl":
      return bit.bl === undefined || bit.wl === undefined ? undefined : [bit.bl, bit.wl];
  }
}

function describeKey(shape: AddressKeyShape): string {
  return shape === "frame" ? "frame address" : "BL/WL address pair";
}

/**
 * Returns each bit's address key in source order. Every key component must have
 * the width of the first one seen for it; a missing or wider/narrower address fails.
 */
export function collectAddressKeys(bitstream: FabricBitstream, shape: AddressKeyShape): Result<string[][]> {
  const keys: string[][] = [];
  const widths: number[] = [];
  for (const [index, bit] of bitstream.bits.entries()) {
    const key = addressKeyOf(bit, shape);
    if (!key) {
      return { ok: false, error: `bit ${index} has no ${describeKey(shape)}` };
    }
    for (const [i, part] of key.entries()) {
      const expected = widths[i];
      if (expected === undefined) {
        widths[i] = part.length;
      } else if (expected !== part.length) {
        return {
          ok: false,
          error: `bit ${index} address '${part}' is ${part.length} bits wide, expected ${expected}`,
        };
      }
    }
    keys.push(key);
  }
  return { ok: true, value: keys };
}

/**
 * Collects the values of every bit sharing one address key into a single data vector.
 * Groups come out in first-encounter order and each vector keeps source order.
 */
export function buildAddressGroups(bitstream: FabricBitstream, shape: AddressKeyShape): Result<AddressGroup[]> {
  const keys = collectAddressKeys(bitstream, shape);
  if (!keys.ok) return keys;
  const groups = new Map<string, AddressGroup>();
  for (const [index, key] of keys.value.entries()) {
    const mapKey = key.join(" ");
    let group = groups.get(mapKey);
    if (!group) {
      group = { key, din: [] };
      groups.set(mapKey, group);
    }
    group.din.push(bitstream.bits[index].value);
  }
  return { ok: true, value: Array.from(groups.values()) };
}
