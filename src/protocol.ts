import fs from "fs";
import yaml from "js-yaml";
import { pathToFileURL } from "url";
import { isRecord, asInt, asStr } from "./util.js";

export const PROTOCOL_KINDS = ["standalone", "scan_chain", "memory_bank", "frame_based"] as const;

export type ProtocolKind = (typeof PROTOCOL_KINDS)[number];

export type OutputLayout = "grouped" | "per_bit";

export type TextOutputOptions = {
  layout: OutputLayout;
  pad_bit: 0 | 1;
};

export type WriterConfig = {
  /** raw protocol type; narrowed by the router */
  protocol: string;
  output: TextOutputOptions & { verbose: boolean };
};

export const defaultOutputOptions: TextOutputOptions = {
  layout: "grouped",
  pad_bit: 0,
};

export function parseProtocolKind(raw: string): ProtocolKind | undefined {
  return PROTOCOL_KINDS.find((k) => k === raw.trim().toLowerCase());
}

function asLayout(v: unknown): OutputLayout | undefined {
  return v === "grouped" || v === "per_bit" ? v : undefined;
}

function asPadBit(v: unknown): 0 | 1 | undefined {
  const n = asInt(v);
  return n === 0 || n === 1 ? n : undefined;
}

export function mergeWriterConfig(doc: unknown): WriterConfig {
  const root = isRecord(doc) ? doc : {};
  const protocol = isRecord(root.protocol) ? root.protocol : {};
  const output = isRecord(root.output) ? root.output : {};
  return {
    protocol: asStr(protocol.type) ?? "",
    output: {
      layout: asLayout(output.layout) ?? defaultOutputOptions.layout,
      pad_bit: asPadBit(output.pad_bit) ?? defaultOutputOptions.pad_bit,
      verbose: output.verbose === true,
    },
  };
}

export function loadWriterConfig(text: string): WriterConfig {
  return mergeWriterConfig(yaml.load(text));
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const cfg = loadWriterConfig(fs.readFileSync(process.argv[2], "utf8"));
  const kind = parseProtocolKind(cfg.protocol);
  process.stdout.write(JSON.stringify({ ...cfg, protocol: kind ?? null }, null, 2));
  if (!kind) {
    console.error(`protocol: unknown configuration protocol type '${cfg.protocol}'`);
    process.exit(1);
  }
}
