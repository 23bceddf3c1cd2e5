/**
 * byte-writer.ts - Growable in-memory byte buffer
 *
 * The encoder writes the whole tree here before a single write to disk.
 */

const textEncoder = new TextEncoder();

export class ByteWriter {
  private buffer: Uint8Array;
  private offset = 0;

  constructor(initialCapacity = 4096) {
    this.buffer = new Uint8Array(Math.max(16, initialCapacity));
  }

  /** Number of bytes written so far. */
  get length(): number {
    return this.offset;
  }

  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.offset++] = value & 0xff;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
  }

  /** Writes a UTF-8 string followed by a single null byte. */
  writeNullTerminated(text: string): void {
    this.writeBytes(textEncoder.encode(text));
    this.writeByte(0);
  }

  /** Returns a copy of the written bytes. */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }

  private ensureCapacity(extra: number): void {
    const needed = this.offset + extra;
    if (needed <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length * 2;
    while (capacity < needed) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.offset));
    this.buffer = grown;
  }
}

