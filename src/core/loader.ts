/**
 * Binary image reader/writer.
 *
 * An image starts with a NUL-terminated ASCII namespace tag. Only the "QT"
 * namespace is supported; its body is a stream of 4-byte records:
 *
 *   byte 0   bit 0 = memory-indirection flag
 *   byte 1-2 16-bit value, big-endian
 *   byte 3   opcode (bit 7 lands in the value field once imported)
 */
import { readFileSync } from 'fs';
import { NAMESPACE, QT_RECORD_SIZE, type Namespace } from './constants';
import { ImageLoadError } from './errors';
import type { InstructionRecord } from './types';

export interface LoadedImage {
  namespace: Namespace;
  records: InstructionRecord[];
}

function readNamespace(bytes: Uint8Array): { tag: string; bodyStart: number } {
  const nul = bytes.indexOf(0);
  if (nul < 0) {
    throw new ImageLoadError('Missing NUL-terminated namespace tag');
  }
  let tag = '';
  for (let i = 0; i < nul; i++) {
    tag += String.fromCharCode(bytes[i]);
  }
  return { tag, bodyStart: nul + 1 };
}

function parseQTRecords(bytes: Uint8Array, start: number): InstructionRecord[] {
  const length = bytes.length - start;
  if (length % QT_RECORD_SIZE !== 0) {
    throw new ImageLoadError(
      `Truncated record at offset ${start + length - (length % QT_RECORD_SIZE)}`,
    );
  }

  const records: InstructionRecord[] = [];
  for (let off = start; off < bytes.length; off += QT_RECORD_SIZE) {
    records.push({
      flag: bytes[off] & 1,
      value: (bytes[off + 1] << 8) | bytes[off + 2],
      opcode: bytes[off + 3],
    });
  }
  return records;
}

/**
 * Parse an image. `expected`, when given, must match the tag in the file.
 */
export function parseImage(bytes: Uint8Array, expected?: Namespace): LoadedImage {
  const { tag, bodyStart } = readNamespace(bytes);

  if (expected !== undefined && tag !== expected) {
    throw new ImageLoadError(`Expected namespace "${expected}", image declares "${tag}"`);
  }

  switch (tag) {
    case NAMESPACE.QT:
      return { namespace: NAMESPACE.QT, records: parseQTRecords(bytes, bodyStart) };
    case NAMESPACE.QM:
      throw new ImageLoadError('Namespace "QM" is not supported');
    default:
      throw new ImageLoadError(`Unknown namespace "${tag}"`);
  }
}

export function loadImage(path: string, expected?: Namespace): LoadedImage {
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ImageLoadError(`Cannot read '${path}': ${reason}`);
  }
  return parseImage(bytes, expected);
}

/** Serialize records as a "QT" image. */
export function encodeImage(records: readonly InstructionRecord[]): Uint8Array {
  const header = NAMESPACE.QT.length + 1;
  const out = new Uint8Array(header + records.length * QT_RECORD_SIZE);
  for (let i = 0; i < NAMESPACE.QT.length; i++) {
    out[i] = NAMESPACE.QT.charCodeAt(i);
  }
  out[header - 1] = 0;

  records.forEach((rec, i) => {
    const off = header + i * QT_RECORD_SIZE;
    out[off] = rec.flag & 1;
    out[off + 1] = (rec.value >> 8) & 0xFF;
    out[off + 2] = rec.value & 0xFF;
    out[off + 3] = rec.opcode & 0xFF;
  });
  return out;
}
