/**
 * compressed-int.ts - Variable-length signed integer encoding
 *
 * Layout: one length byte, then 0-4 little-endian magnitude bytes.
 *   bits 0-6 of the length byte: number of magnitude bytes that follow
 *   bit 7:                       set when the value is negative
 *
 * The magnitude is |value|, so -1 is [0x81, 0x01] and 0 is [0x00].
 */

import { EncodingError, DecodingError } from '../shared/errors.js';
import type { ByteWriter } from './byte-writer.js';

export const MIN_COMPRESSED_INT = -0x80000000;
export const MAX_COMPRESSED_INT = 0x7fffffff;
const MAX_MAGNITUDE_BYTES = 4;
const SIGN_BIT = 0x80;

function assertInRange(value: number): void {
  if (!Number.isInteger(value)) {
    throw new EncodingError(`Compressed integer must be an integer, got ${value}`, { value });
  }
  if (value < MIN_COMPRESSED_INT || value > MAX_COMPRESSED_INT) {
    throw new EncodingError(
      `Compressed integer ${value} is outside the 32-bit signed range`,
      { value },
    );
  }
}

/**
 * Number of bytes the encoding of `value` occupies, length byte included.
 */
export function compressedIntSize(value: number): number {
  assertInRange(value);
  let magnitude = Math.abs(value);
  let size = 1;
  while (magnitude > 0) {
    size++;
    magnitude = Math.floor(magnitude / 256);
  }
  return size;
}

/**
 * Encodes a signed 32-bit integer.
 */
export function encodeCompressedInt(value: number): Uint8Array {
  const out = new Uint8Array(compressedIntSize(value));

  // |MIN_COMPRESSED_INT| is 2^31, which still fits in four bytes, so plain
  // arithmetic is used instead of 32-bit bitwise ops.
  let magnitude = Math.abs(value);
  let count = 0;
  while (magnitude > 0) {
    count++;
    out[count] = magnitude % 256;
    magnitude = Math.floor(magnitude / 256);
  }

  out[0] = value < 0 ? count | SIGN_BIT : count;
  return out;
}

/**
 * Appends the encoding of `value` to a writer.
 */
export function writeCompressedInt(writer: ByteWriter, value: number): void {
  writer.writeBytes(encodeCompressedInt(value));
}

/**
 * Reads a compressed integer from a buffer at the given offset.
 * @returns The value and number of bytes read
 */
export function readCompressedInt(
  buffer: Uint8Array,
  offset: number,
): { value: number; bytesRead: number } {
  if (offset >= buffer.length) {
    throw new DecodingError('Unexpected end of data reading compressed integer', offset);
  }

  const header = buffer[offset];
  const count = header & 0x7f;
  if (count > MAX_MAGNITUDE_BYTES) {
    throw new DecodingError(`Compressed integer length ${count} exceeds ${MAX_MAGNITUDE_BYTES}`, offset);
  }
  if (offset + 1 + count > buffer.length) {
    throw new DecodingError('Compressed integer is truncated', offset);
  }

  let magnitude = 0;
  for (let i = count; i >= 1; i--) {
    magnitude = magnitude * 256 + buffer[offset + i];
  }

  const negative = (header & SIGN_BIT) !== 0;
  const value = negative && magnitude !== 0 ? -magnitude : magnitude;
  if (value < MIN_COMPRESSED_INT || value > MAX_COMPRESSED_INT) {
    throw new DecodingError(`Compressed integer ${value} is outside the 32-bit signed range`, offset);
  }
  return { value, bytesRead: count + 1 };
}
