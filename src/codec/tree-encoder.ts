/**
 * tree-encoder.ts - Serializes an attributed tree into the binary value-tree layout
 *
 * Per node, depth-first pre-order:
 *   tag (UTF-8) 0x00
 *   compressed-int  attribute count
 *   per attribute:
 *     name (UTF-8, trimmed) 0x00
 *     compressed-int  byteLength(value) + 2    (value + null, plus the type byte)
 *     0x05                                     (string type marker)
 *     value (UTF-8, trimmed) 0x00
 *   compressed-int  child count
 *   children
 */

import { EncodingError } from '../shared/errors.js';
import type { AttributedNode } from '../tree/node.js';
import { ByteWriter } from './byte-writer.js';
import { writeCompressedInt } from './compressed-int.js';

/** Type marker the downstream reader uses for string values. */
export const STRING_TYPE_MARKER = 0x05;

const textEncoder = new TextEncoder();

/**
 * Rejects text that would break null-terminated framing.
 */
export function assertNoNullByte(text: string, what: string, tag: string): void {
  if (text.includes('\0')) {
    throw new EncodingError(`${what} of <${tag}> contains a null byte`, { tag, what });
  }
}

/**
 * Appends one node and its subtree to a writer.
 */
export function writeNode(writer: ByteWriter, node: AttributedNode): void {
  assertNoNullByte(node.tag, 'Tag', node.tag);
  writer.writeNullTerminated(node.tag);

  writeCompressedInt(writer, node.attributes.size);

  for (const [rawName, rawValue] of node.attributes) {
    const name = rawName.trim();
    const value = rawValue.trim();
    assertNoNullByte(name, 'Attribute name', node.tag);
    assertNoNullByte(value, `Attribute "${name}"`, node.tag);

    writer.writeNullTerminated(name);

    const valueBytes = textEncoder.encode(value);
    writeCompressedInt(writer, valueBytes.length + 1 + 1);
    writer.writeByte(STRING_TYPE_MARKER);
    writer.writeBytes(valueBytes);
    writer.writeByte(0);
  }

  writeCompressedInt(writer, node.children.length);

  for (const child of node.children) {
    writeNode(writer, child);
  }
}

/**
 * Encodes a whole tree.
 */
export function encodeTree(node: AttributedNode): Uint8Array {
  const writer = new ByteWriter();
  writeNode(writer, node);
  return writer.toBytes();
}
