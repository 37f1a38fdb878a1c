import {
  AddressKeyShape,
  FabricBitstream,
  buildAddressGroups,
  buildRegionalBitstreams,
  collectAddressKeys,
  findRegionalBitstreamMaxSize,
  padRegionalBitstreams,
} from "./fabric_bitstream.js";
import { ProtocolKind, TextOutputOptions, defaultOutputOptions, parseProtocolKind } from "./protocol.js";
import { StringSink, TextSink, bitDigit, bitDigits, writeLine, writeSpace } from "./text_sink.js";
import { Status } from "./util.js";

// Standalone: one unbroken digit string.
export function writeFlattenBitstream(sink: TextSink, bitstream: FabricBitstream): Status {
  sink.write(bitDigits(bitstream.bits.map((b) => b.value)));
  return 0;
}

/**
 * Scan chain: all regions shift in lock-step, so line i holds the i-th bit of every region.
 * Regions shorter than the longest are padded at the tail with `padBit`.
 */
export function writeConfigChainBitstream(sink: TextSink, bitstream: FabricBitstream, padBit: boolean): Status {
  const regions = buildRegionalBitstreams(bitstream);
  const maxSize = findRegionalBitstreamMaxSize(regions);
  const chains = padRegionalBitstreams(regions, maxSize, padBit);
  for (let ibit = 0; ibit < maxSize; ibit++) {
    writeLine(sink, chains.map((chain) => bitDigit(chain[ibit])).join(""));
  }
  return 0;
}

// Memory bank `<BL> <WL> <din>` or frame `<addr> <din>`, one line per distinct address.
export function writeAddressKeyedBitstream(sink: TextSink, bitstream: FabricBitstream, shape: AddressKeyShape): Status {
  const grouped = buildAddressGroups(bitstream, shape);
  if (!grouped.ok) {
    console.error(`encode_text: ${grouped.error}`);
    return 1;
  }
  for (const group of grouped.value) {
    for (const part of group.key) {
      sink.write(part);
      writeSpace(sink);
    }
    writeLine(sink, bitDigits(group.din));
  }
  return 0;
}

/** One entry per bit, no grouping: bare digits for unaddressed protocols, one line per bit otherwise. */
export function writePerBitBitstream(sink: TextSink, bitstream: FabricBitstream, kind: ProtocolKind): Status {
  if (kind === "standalone" || kind === "scan_chain") {
    return writeFlattenBitstream(sink, bitstream);
  }
  const keys = collectAddressKeys(bitstream, kind === "memory_bank" ? "bl_wl" : "frame");
  if (!keys.ok) {
    console.error(`encode_text: ${keys.error}`);
    return 1;
  }
  for (const [index, key] of keys.value.entries()) {
    for (const part of key) {
      sink.write(part);
      writeSpace(sink);
    }
    writeLine(sink, bitDigit(bitstream.bits[index].value));
  }
  return 0;
}

/** Picks the encoder for `kind`. An unknown kind is reported and nothing is written. */
export function encodeFabricBitstream(
  sink: TextSink,
  bitstream: FabricBitstream,
  kind: string,
  options: Partial<TextOutputOptions> = {},
): Status {
  const protocol = parseProtocolKind(kind);
  if (!protocol) {
    console.error(`encode_text: Invalid configuration protocol type '${kind}'!`);
    return 1;
  }
  const opts: TextOutputOptions = { ...defaultOutputOptions, ...options };
  if (opts.layout === "per_bit") {
    return writePerBitBitstream(sink, bitstream, protocol);
  }
  switch (protocol) {
    case "standalone":
      return writeFlattenBitstream(sink, bitstream);
    case "scan_chain":
      return writeConfigChainBitstream(sink, bitstream, opts.pad_bit === 1);
    case "memory_bank":
      return writeAddressKeyedBitstream(sink, bitstream, "bl_wl");
    case "frame_based":
      return writeAddressKeyedBitstream(sink, bitstream, "frame");
    default: {
      const unhandled: never = protocol;
      console.error(`encode_text: Invalid configuration protocol type '${String(unhandled)}'!`);
      return 1;
    }
  }
}

/** Builds the whole file body in memory, trailing line terminator included. */
export function renderFabricBitstreamText(
  bitstream: FabricBitstream,
  kind: string,
  options: Partial<TextOutputOptions> = {},
): { status: Status; text: string } {
  const sink = new StringSink();
  const status = encodeFabricBitstream(sink, bitstream, kind, options);
  writeLine(sink);
  return { status, text: sink.toString() };
}
