/**
 * Text memory dump: a register line followed by one section per bank.
 * Lines hold 8 words; lines that are all zero are left out.
 */
import { writeFileSync } from 'fs';
import { OutputError } from './errors';
import type { QTEmulator } from './qt';

const WORDS_PER_LINE = 8;

const hex = (n: number, digits = 4): string => n.toString(16).padStart(digits, '0');

export function formatBank(name: string, cells: Uint16Array): string[] {
  const lines = [`[${name}]`];
  for (let base = 0; base < cells.length; base += WORDS_PER_LINE) {
    const row = cells.subarray(base, base + WORDS_PER_LINE);
    if (row.every(v => v === 0)) continue;
    lines.push(`${hex(base)}: ${Array.from(row, v => hex(v)).join(' ')}`);
  }
  if (lines.length === 1) lines.push('(empty)');
  return lines;
}

export function formatDump(emu: QTEmulator): string {
  const r = emu.getRegisters();
  const dump = emu.getMemoryDump();
  const header =
    `ACC=${hex(r.ACC)} PR=${hex(r.PR)} PC=${hex(r.PC)} SP=${hex(r.SP)} ` +
    `ASP=${hex(r.ASP)} FLAGS=${hex(r.FLAGS)} EXIT=${emu.exitCode}`;

  return [
    header,
    '',
    ...formatBank('cache', dump.cache),
    '',
    ...formatBank('stack', dump.stack),
    '',
    ...formatBank('address_stack', dump.addressStack),
    '',
    ...formatBank('ports', dump.ports),
    '',
  ].join('\n');
}

export function writeDump(path: string, emu: QTEmulator): void {
  try {
    writeFileSync(path, formatDump(emu), 'utf-8');
  } catch (err) {
    throw new OutputError(path, err instanceof Error ? err.message : String(err));
  }
}
