/**
 * Memory banks of a QT machine: program ROM, data cache, the value and
 * address stacks, and the port array. Every bank spans the full 16-bit
 * address space.
 */
import { MEM_SIZE } from './constants';
import { RomOverflowError } from './errors';
import { WordStack } from './stack';
import { encodeWord } from './word';
import type { InstructionRecord, MemoryDump, PackedWord } from './types';

export class QTMemory {
  readonly rom = new Uint32Array(MEM_SIZE);
  readonly cache = new Uint16Array(MEM_SIZE);
  readonly ports = new Uint16Array(MEM_SIZE);
  readonly stack = new WordStack(MEM_SIZE);
  readonly addressStack = new WordStack(MEM_SIZE);

  reset(): void {
    this.rom.fill(0);
    this.cache.fill(0);
    this.ports.fill(0);
    this.stack.reset();
    this.addressStack.reset();
  }

  /**
   * Encode records into ROM starting at address 0. A program that does not
   * fit is rejected before anything is written.
   */
  importCode(records: readonly InstructionRecord[]): void {
    if (records.length > this.rom.length) {
      throw new RomOverflowError(records.length, this.rom.length);
    }
    for (let i = 0; i < records.length; i++) {
      const { flag, value, opcode } = records[i];
      // opcode keeps its 8th bit, which lands in the value field
      this.rom[i] = encodeWord(flag & 1, value & 0xFFFF, opcode & 0xFF);
    }
  }

  fetch(pc: number): PackedWord {
    return this.rom[pc];
  }

  dump(): MemoryDump {
    return {
      cache: this.cache.slice(),
      stack: this.stack.snapshot(),
      addressStack: this.addressStack.snapshot(),
      ports: this.ports.slice(),
    };
  }
}
