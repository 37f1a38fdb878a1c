import { FabricBitstream, countBits } from "./fabric_bitstream.js";
import { encodeFabricBitstream } from "./encode_text.js";
import { TextOutputOptions } from "./protocol.js";
import { ClosableSink, OpenSink, openFileSink, writeLine } from "./text_sink.js";
import { Status, errorMessage, startFinishTimer } from "./util.js";

/**
 * Writes the fabric bitstream as plain text, the format loaded directly by the
 * configuration tooling. The file holds nothing but address and 0|1 content.
 *
 * Returns 0 on success, 1 on any critical error. When the write fails part way
 * the file is left truncated and must not be used.
 */
export function writeFabricBitstreamToTextFile(
  bitstream: FabricBitstream,
  kind: string,
  fname: string,
  verbose = false,
  options: Partial<TextOutputOptions> = {},
  open: OpenSink = openFileSink,
): Status {
  if (fname.length === 0) {
    console.error("write_text_bitstream: received empty file name to output bitstream; please specify a valid file name");
    return 1;
  }

  const numBits = countBits(bitstream);
  const timer = startFinishTimer(`Write ${numBits} fabric bitstream into plain text file '${fname}'`);

  let sink: ClosableSink;
  try {
    sink = open(fname);
  } catch (e) {
    console.error(`write_text_bitstream: cannot open '${fname}' for writing: ${errorMessage(e)}`);
    timer.finish();
    return 1;
  }

  let status: Status;
  try {
    status = encodeFabricBitstream(sink, bitstream, kind, options);
    writeLine(sink);
  } catch (e) {
    console.error(`write_text_bitstream: failed writing '${fname}': ${errorMessage(e)}`);
    status = 1;
  } finally {
    sink.close();
    timer.finish();
  }

  if (verbose) {
    console.error(`Outputted ${numBits} configuration bits to plain text file: ${fname}`);
  }
  return status;
}
