import { describe, expect, it } from "vitest";
import { loadWriterConfig, parseProtocolKind } from "../src/protocol.js";

describe("parseProtocolKind", () => {
  it("narrows the four configuration protocols", () => {
    expect(parseProtocolKind("standalone")).toBe("standalone");
    expect(parseProtocolKind(" MEMORY_BANK ")).toBe("memory_bank");
    expect(parseProtocolKind("frame_based")).toBe("frame_based");
  });

  it("returns undefined for anything else", () => {
    expect(parseProtocolKind("ql_memory_bank")).toBeUndefined();
    expect(parseProtocolKind("")).toBeUndefined();
  });
});

describe("loadWriterConfig", () => {
  it("reads the protocol and output options", () => {
    const cfg = loadWriterConfig(`
protocol:
  type: scan_chain
output:
  layout: per_bit
  pad_bit: 1
  verbose: true
`);
    expect(cfg).toEqual({
      protocol: "scan_chain",
      output: { layout: "per_bit", pad_bit: 1, verbose: true },
    });
  });

  it("falls back to defaults for missing or invalid options", () => {
    const cfg = loadWriterConfig(`
protocol:
  type: frame_based
output:
  layout: compressed
  pad_bit: 2
`);
    expect(cfg.output).toEqual({ layout: "grouped", pad_bit: 0, verbose: false });
  });

  it("keeps an unknown protocol type for the router to reject", () => {
    expect(loadWriterConfig("protocol:\n  type: jtag\n").protocol).toBe("jtag");
  });

  it("treats an empty document as an empty configuration", () => {
    expect(loadWriterConfig("")).toEqual({
      protocol: "",
      output: { layout: "grouped", pad_bit: 0, verbose: false },
    });
  });
});
