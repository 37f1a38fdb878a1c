#!/usr/bin/env node
import fs from "fs";
import { pathToFileURL } from "url";
import { countBits } from "./fabric_bitstream.js";
import { loadFabricBitstream } from "./fabric_xml_parse.js";
import { loadWriterConfig } from "./protocol.js";
import { renderFabricBitstreamText } from "./encode_text.js";
import { writeFabricBitstreamToTextFile } from "./write_text_bitstream.js";
import { Status, readText } from "./util.js";

export function main(args: string[]): Status {
  const verboseFlag = args.includes("--verbose");
  const [bitstreamPath, configPath, outText] = args.filter((a) => a !== "--verbose");
  if (!bitstreamPath || !configPath || !outText) {
    console.error("Usage: node dist/main.js <bitstream.xml|json> <writer.yaml> <out.txt|-> [--verbose]");
    return 1;
  }
  const cfg = loadWriterConfig(readText(configPath));
  const loaded = loadFabricBitstream(bitstreamPath);
  if (!loaded.ok) {
    console.error(`main: cannot read fabric bitstream: ${loaded.error}`);
    return 1;
  }
  const verbose = verboseFlag || cfg.output.verbose;
  if (outText === "-") {
    const { status, text } = renderFabricBitstreamText(loaded.value, cfg.protocol, cfg.output);
    process.stdout.write(text);
    if (verbose) {
      console.error(`Outputted ${countBits(loaded.value)} configuration bits to standard output`);
    }
    return status;
  }
  return writeFabricBitstreamToTextFile(loaded.value, cfg.protocol, outText, verbose, cfg.output);
}

// resolve the npm bin symlink before comparing
const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href;
if (isMain) {
  try {
    process.exitCode = main(process.argv.slice(2));
  } catch (e) {
    console.error(e);
    process.exitCode = 1;
  }
}
