// framer.ts — newline framing shared by IRC and control connections
// Splits on LF; the trailing fragment stays buffered until its LF arrives.

const LF = 0x0a;
const TRAILING_WS = new Set([0x20, 0x09, 0x0d, 0x0b, 0x0c]);

export type LineHandler = (line: Buffer) => void;

export class LineFramer {
  // Unbounded: a peer that never sends LF grows this without limit.
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly onLine: LineHandler) {}

  /** Number of bytes waiting for a line terminator. */
  get pending(): number {
    return this.buffer.length;
  }

  push(chunk: Uint8Array): void {
    this.buffer = this.buffer.length === 0
      ? Buffer.from(chunk)
      : Buffer.concat([this.buffer, chunk]);

    const lines: Buffer[] = [];
    let start = 0;
    for (;;) {
      const idx = this.buffer.indexOf(LF, start);
      if (idx === -1) break;
      lines.push(stripTrailing(this.buffer.subarray(start, idx)));
      start = idx + 1;
    }
    if (start > 0) this.buffer = this.buffer.subarray(start);

    // Buffer is settled first so a throwing handler cannot replay lines.
    for (const line of lines) this.onLine(line);
  }
}

export function stripTrailing(segment: Buffer): Buffer {
  let end = segment.length;
  while (end > 0 && TRAILING_WS.has(segment[end - 1])) end--;
  return segment.subarray(0, end);
}
