/**
 * tree-decoder.ts - Reads the binary value-tree layout back into nodes
 *
 * Only the string-valued subset the encoder produces is understood.
 * Used to verify a written blob and by the tests.
 */

import { DecodingError } from '../shared/errors.js';
import { AttributedNode } from '../tree/node.js';
import { readCompressedInt } from './compressed-int.js';
import { STRING_TYPE_MARKER } from './tree-encoder.js';

const textDecoder = new TextDecoder('utf-8', { fatal: true });

class TreeReader {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readInt(): number {
    const { value, bytesRead } = readCompressedInt(this.bytes, this.offset);
    this.offset += bytesRead;
    return value;
  }

  readByte(): number {
    if (this.offset >= this.bytes.length) {
      throw new DecodingError('Unexpected end of data', this.offset);
    }
    return this.bytes[this.offset++];
  }

  readNullTerminated(): string {
    const start = this.offset;
    const end = this.bytes.indexOf(0, start);
    if (end === -1) {
      throw new DecodingError('Unterminated string', start);
    }
    this.offset = end + 1;
    return this.decode(start, end);
  }

  decode(start: number, end: number): string {
    try {
      return textDecoder.decode(this.bytes.subarray(start, end));
    } catch {
      throw new DecodingError('Invalid UTF-8 in string', start);
    }
  }

  readNode(): AttributedNode {
    const tag = this.readNullTerminated();
    const attributeCount = this.readCount('attribute');
    const node = new AttributedNode(tag);

    for (let i = 0; i < attributeCount; i++) {
      const name = this.readNullTerminated();
      const lengthOffset = this.offset;
      const size = this.readInt();
      const marker = this.readByte();
      if (marker !== STRING_TYPE_MARKER) {
        throw new DecodingError(`Unsupported value type ${marker} for attribute "${name}"`, lengthOffset);
      }
      const valueStart = this.offset;
      const value = this.readNullTerminated();
      // size covers the type marker, the value bytes and the terminator
      if (size !== this.offset - valueStart + 1) {
        throw new DecodingError(`Length ${size} of attribute "${name}" does not match its value`, lengthOffset);
      }
      node.setAttribute(name, value);
    }

    const childCount = this.readCount('child');
    for (let i = 0; i < childCount; i++) {
      node.appendChild(this.readNode());
    }
    return node;
  }

  private readCount(what: string): number {
    const at = this.offset;
    const count = this.readInt();
    if (count < 0) {
      throw new DecodingError(`Negative ${what} count ${count}`, at);
    }
    return count;
  }
}

/**
 * Decodes one encoded tree. The whole buffer must be consumed.
 */
export function decodeTree(bytes: Uint8Array): AttributedNode {
  const reader = new TreeReader(bytes);
  const root = reader.readNode();
  if (reader.remaining !== 0) {
    throw new DecodingError(`${reader.remaining} trailing bytes after tree`, reader.position);
  }
  return root;
}
