import fs from "fs";
import { pathToFileURL } from "url";
import { XMLParser } from "fast-xml-parser";
import { ConfigBit, DEFAULT_REGION, FabricBitstream } from "./fabric_bitstream.js";
import { Result, asArray, asInt, asStr, errorMessage, isRecord } from "./util.js";

function parseBitValue(v: unknown): boolean | undefined {
  const s = asStr(v)?.trim();
  if (s === "1" || s === "true") return true;
  if (s === "0" || s === "false") return false;
  return undefined;
}

// preserveOrder output: one key naming the element, its children, and attributes under ":@"
type XmlElement = {
  tag: string;
  attrs: Record<string, unknown>;
  children: XmlElement[];
};

function toElements(raws: unknown): XmlElement[] {
  const out: XmlElement[] = [];
  for (const raw of asArray(raws)) {
    if (!isRecord(raw)) continue;
    const tag = Object.keys(raw).find((k) => k !== ":@" && k !== "#text");
    if (tag === undefined) continue;
    const attrs = raw[":@"];
    out.push({ tag, attrs: isRecord(attrs) ? attrs : {}, children: toElements(raw[tag]) });
  }
  return out;
}

function childAddress(bit: XmlElement, tag: string): string | undefined {
  const child = bit.children.find((c) => c.tag === tag);
  return child === undefined ? undefined : asStr(child.attrs["@_address"]);
}

function parseBit(el: XmlElement, region: number, where: string): Result<ConfigBit> {
  const value = parseBitValue(el.attrs["@_value"]);
  if (value === undefined) {
    return { ok: false, error: `${where}: invalid bit value '${String(el.attrs["@_value"])}'` };
  }
  const bit: ConfigBit = { value, region };
  const path = asStr(el.attrs["@_path"]);
  if (path !== undefined) bit.path = path;
  const bl = childAddress(el, "bl");
  const wl = childAddress(el, "wl");
  const frame = childAddress(el, "frame");
  if (bl !== undefined) bit.bl = bl;
  if (wl !== undefined) bit.wl = wl;
  if (frame !== undefined) bit.address = frame;
  return { ok: true, value: bit };
}

function collectBit(el: XmlElement, region: number, out: ConfigBit[]): string | undefined {
  const id = asStr(el.attrs["@_id"]);
  const parsed = parseBit(el, region, `region ${region} bit ${id ?? out.length}`);
  if (!parsed.ok) return parsed.error;
  out.push(parsed.value);
  return undefined;
}

/**
 * Reads a `<fabric_bitstream>` document. Bits come out in document order; bits
 * placed directly under the root belong to region 0.
 */
export function parseFabricBitstreamXml(text: string): Result<FabricBitstream> {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    preserveOrder: true,
  });
  let doc: unknown;
  try {
    doc = parser.parse(text, true);
  } catch (e) {
    return { ok: false, error: `malformed XML: ${errorMessage(e)}` };
  }
  const root = toElements(doc).find((el) => el.tag === "fabric_bitstream");
  if (root === undefined) {
    return { ok: false, error: "missing <fabric_bitstream> root element" };
  }

  const bits: ConfigBit[] = [];
  for (const el of root.children) {
    if (el.tag === "bit") {
      const err = collectBit(el, DEFAULT_REGION, bits);
      if (err) return { ok: false, error: err };
    } else if (el.tag === "region") {
      const id = asInt(el.attrs["@_id"]);
      if (id === undefined) {
        return { ok: false, error: `<region> without a numeric id` };
      }
      for (const child of el.children) {
        if (child.tag !== "bit") continue;
        const err = collectBit(child, id, bits);
        if (err) return { ok: false, error: err };
      }
    }
  }
  return { ok: true, value: { bits } };
}

function parseJsonBit(raw: unknown, index: number): Result<ConfigBit> {
  if (!isRecord(raw)) return { ok: false, error: `bit ${index}: not an object` };
  const value = typeof raw.value === "boolean" ? raw.value : parseBitValue(raw.value);
  if (value === undefined) return { ok: false, error: `bit ${index}: invalid bit value` };
  const bit: ConfigBit = { value };
  const region = asInt(raw.region);
  if (region !== undefined) bit.region = region;
  for (const key of ["address", "bl", "wl", "path"] as const) {
    const field = raw[key];
    if (field === undefined) continue;
    if (typeof field !== "string") {
      return { ok: false, error: `bit ${index}: '${key}' must be a string` };
    }
    bit[key] = field;
  }
  return { ok: true, value: bit };
}

export function parseFabricBitstreamJson(text: string): Result<FabricBitstream> {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (e) {
    return { ok: false, error: `malformed JSON: ${errorMessage(e)}` };
  }
  if (!isRecord(doc) || !Array.isArray(doc.bits)) {
    return { ok: false, error: "expected an object with a 'bits' array" };
  }
  const bits: ConfigBit[] = [];
  for (const [i, raw] of doc.bits.entries()) {
    const parsed = parseJsonBit(raw, i);
    if (!parsed.ok) return parsed;
    bits.push(parsed.value);
  }
  return { ok: true, value: { bits } };
}

export function loadFabricBitstream(path: string): Result<FabricBitstream> {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (e) {
    return { ok: false, error: `cannot read '${path}': ${errorMessage(e)}` };
  }
  return path.toLowerCase().endsWith(".json") ? parseFabricBitstreamJson(text) : parseFabricBitstreamXml(text);
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const input = process.argv[2];
  const output = process.argv[3] ?? "-";
  const loaded = loadFabricBitstream(input);
  if (!loaded.ok) {
    console.error(`fabric_xml_parse: ${loaded.error}`);
    process.exit(1);
  }
  const data = JSON.stringify(loaded.value, null, 2);
  if (output === "-") {
    process.stdout.write(data);
  } else {
    fs.writeFileSync(output, data, "utf8");
  }
  console.error(`fabric_xml_parse: bits=${loaded.value.bits.length}`);
}
