import fs from "fs";

export interface TextSink {
  write(text: string): void;
}

export class StringSink implements TextSink {
  private chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  toString(): string {
    return this.chunks.join("");
  }
}

export interface ClosableSink extends TextSink {
  close(): void;
}

export type OpenSink = (path: string) => ClosableSink;

export class FileSink implements ClosableSink {
  private closed = false;

  constructor(private readonly fd: number, readonly path: string) {}

  // writeSync may accept fewer bytes than offered (pipes, devices)
  write(text: string): void {
    const buf = Buffer.from(text, "utf8");
    let offset = 0;
    while (offset < buf.length) {
      offset += fs.writeSync(this.fd, buf, offset, buf.length - offset);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    fs.closeSync(this.fd);
  }
}

/** Opens `path` for writing, truncating whatever was there. Throws when it cannot be opened. */
export function openFileSink(path: string): FileSink {
  return new FileSink(fs.openSync(path, "w"), path);
}

export function writeSpace(sink: TextSink, count = 1): void {
  if (count <= 0) return;
  sink.write(" ".repeat(count));
}

export function writeLine(sink: TextSink, text = ""): void {
  sink.write(`${text}\n`);
}

export function bitDigit(value: boolean): string {
  return value ? "1" : "0";
}

export function bitDigits(values: readonly boolean[]): string {
  return values.map(bitDigit).join("");
}
