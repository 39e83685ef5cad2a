import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseImage, loadImage, encodeImage } from './loader';
import { ImageLoadError } from './errors';
import { OP } from './constants';
import { QTMemory } from './memory';
import { decodeWord } from './word';

const bytes = (...values: number[]): Uint8Array => new Uint8Array(values);

// "QT\0"
const QT_HEADER = [0x51, 0x54, 0x00];

describe('parseImage', () => {
  it('reads big-endian values and the flag bit', () => {
    const image = parseImage(bytes(
      ...QT_HEADER,
      0x01, 0x12, 0x34, OP.LOAD,
      0x00, 0x00, 0x05, OP.ADD,
      0xFE, 0xFF, 0xFF, OP.HALT,
    ));
    expect(image.namespace).toBe('QT');
    expect(image.records).toEqual([
      { flag: 1, value: 0x1234, opcode: OP.LOAD },
      { flag: 0, value: 5, opcode: OP.ADD },
      // only bit 0 of byte 0 is the flag
      { flag: 0, value: 0xFFFF, opcode: OP.HALT },
    ]);
  });

  it('accepts an image with no records', () => {
    expect(parseImage(bytes(...QT_HEADER)).records).toEqual([]);
  });

  it('rejects the QM namespace', () => {
    expect(() => parseImage(bytes(0x51, 0x4D, 0x00))).toThrow('Namespace "QM" is not supported');
  });

  it('rejects an unknown namespace', () => {
    expect(() => parseImage(bytes(0x58, 0x00, 1, 2, 3, 4))).toThrow('Unknown namespace "X"');
  });

  it('rejects a missing terminator', () => {
    expect(() => parseImage(bytes(0x51, 0x54))).toThrow(ImageLoadError);
  });

  it('rejects a truncated record', () => {
    expect(() => parseImage(bytes(...QT_HEADER, 0, 0, 1, OP.LOAD, 0, 0)))
      .toThrow('Truncated record at offset 7');
  });

  it('keeps an 8-bit opcode byte, whose top bit spills into the value on import', () => {
    const image = parseImage(bytes(...QT_HEADER, 0x00, 0x00, 0x02, 0x81));
    expect(image.records).toEqual([{ flag: 0, value: 2, opcode: 0x81 }]);

    const mem = new QTMemory();
    mem.importCode(image.records);
    expect(mem.rom[0]).toBe(0x181);
    expect(decodeWord(mem.rom[0])).toEqual({ flag: 0, value: 3, opcode: OP.LOAD });
  });

  it('checks the requested namespace against the file', () => {
    expect(() => parseImage(bytes(...QT_HEADER), 'QM'))
      .toThrow('Expected namespace "QM", image declares "QT"');
  });
});

describe('encodeImage', () => {
  it('writes the QT header and 4-byte records', () => {
    const out = encodeImage([
      { flag: 1, value: 0xBEEF, opcode: OP.STORE },
      { flag: 0, value: 0x80, opcode: OP.INT },
    ]);
    expect(Array.from(out)).toEqual([
      ...QT_HEADER,
      0x01, 0xBE, 0xEF, OP.STORE,
      0x00, 0x00, 0x80, OP.INT,
    ]);
  });

  it('is read back by parseImage', () => {
    const records = [
      { flag: 0, value: 1, opcode: OP.LOAD },
      { flag: 1, value: 0x20, opcode: OP.ADD },
      { flag: 0, value: 0, opcode: OP.HALT },
    ];
    expect(parseImage(encodeImage(records)).records).toEqual(records);
  });
});

describe('loadImage', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'qtemu-loader-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads an image from disk', () => {
    const path = join(dir, 'inc.bin');
    writeFileSync(path, encodeImage([{ flag: 0, value: 0, opcode: OP.INC }]));
    expect(loadImage(path).records).toEqual([{ flag: 0, value: 0, opcode: OP.INC }]);
  });

  it('wraps a missing file in ImageLoadError', () => {
    expect(() => loadImage(join(dir, 'missing.bin'))).toThrow(ImageLoadError);
  });
});
