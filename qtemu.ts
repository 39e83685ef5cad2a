/**
 * qtemu: QT emulator command-line front end
 *
 * Usage:
 *   npm run build && ./dist/qtemu.mjs -i <image.bin> [options]
 *
 * Options:
 *   -i, --input <file>   Binary image to run (required)
 *   --namespace <ns>     Image namespace: QT (default) or QM
 *   --dump <file>        Write a memory dump after the run
 *   --frames <dir>       Write every screen frame as a PPM file
 *   --max-steps <n>      Stop after n instructions
 *   --trace              Print every instruction as it executes
 *   --disasm             List the program and exit without running
 *   --quiet              Only show errors
 */
import { NAMESPACE, type Namespace } from './src/core/constants';
import { disassembleRom, formatDisassembly } from './src/core/disassembler';
import { writeDump } from './src/core/dump';
import { loadImage } from './src/core/loader';
import { QTEmulator } from './src/core/qt';
import { ExitCode } from './src/core/types';
import { ModuleHost, runWithModules } from './src/modules/host';
import type { RunOptions } from './src/modules/host';
import { createFrameWriter } from './src/modules/ppm';
import { ScreenModule } from './src/modules/screen';

// ---- Argument parsing ----

const VALUE_OPTIONS = new Set(['-i', '--input', '--namespace', '--dump', '--frames', '--max-steps']);

function usage(): never {
  console.error('qtemu — QT CPU emulator');
  console.error('');
  console.error('Usage: qtemu -i <image.bin> [options]');
  console.error('');
  console.error('Options:');
  console.error('  --namespace <ns>   Image namespace: QT (default) or QM');
  console.error('  --dump <file>      Write a memory dump after the run');
  console.error('  --frames <dir>     Write every screen frame as a PPM file');
  console.error('  --max-steps <n>    Stop after n instructions');
  console.error('  --trace            Print every instruction as it executes');
  console.error('  --disasm           List the program and exit without running');
  console.error('  --quiet            Only show errors');
  process.exit(1);
}

function fail(message: string): never {
  console.error(`\x1b[31m✗ ${message}\x1b[0m`);
  process.exit(1);
}

const args = process.argv.slice(2);
const values = new Map<string, string>();
const flags = new Set<string>();

for (let i = 0; i < args.length; i++) {
  const arg = args[i];
  if (VALUE_OPTIONS.has(arg)) {
    const value = args[i + 1];
    if (value === undefined) fail(`Option ${arg} needs a value`);
    values.set(arg === '-i' ? '--input' : arg, value);
    i++;
  } else if (arg.startsWith('-')) {
    flags.add(arg);
  } else {
    fail(`Unexpected argument '${arg}'`);
  }
}

const inputPath = values.get('--input');
if (inputPath === undefined || flags.has('--help') || flags.has('-h')) usage();

const namespaceArg = values.get('--namespace') ?? NAMESPACE.QT;
if (namespaceArg !== NAMESPACE.QT && namespaceArg !== NAMESPACE.QM) {
  fail(`Unknown namespace '${namespaceArg}' (expected QT or QM)`);
}
const namespace: Namespace = namespaceArg;

let maxSteps: number | undefined;
const maxStepsArg = values.get('--max-steps');
if (maxStepsArg !== undefined) {
  maxSteps = Number(maxStepsArg);
  if (!Number.isInteger(maxSteps) || maxSteps < 0) fail(`Invalid --max-steps '${maxStepsArg}'`);
}

const quiet = flags.has('--quiet');
const trace = flags.has('--trace');
const dumpPath = values.get('--dump');
const framesDir = values.get('--frames');

// ---- Load ----

const emu = new QTEmulator();
emu.initializeMemory();

try {
  const image = loadImage(inputPath, namespace);
  emu.importCode(image.records);

  if (flags.has('--disasm')) {
    for (const line of disassembleRom(emu.memory.rom, image.records.length)) {
      console.log(`  ${line}`);
    }
    process.exit(0);
  }

  if (!quiet) console.log(`  Loaded ${image.records.length} instructions from ${inputPath}`);
} catch (err) {
  fail(err instanceof Error ? err.message : String(err));
}

// ---- Modules ----

const screen = new ScreenModule();
if (framesDir !== undefined) {
  try {
    screen.onFrame(createFrameWriter(framesDir));
  } catch (err) {
    fail(err instanceof Error ? err.message : String(err));
  }
}
const host = new ModuleHost().register(screen);

// ---- Run ----

const hex4 = (n: number): string => n.toString(16).padStart(4, '0');

const options: RunOptions = { maxSteps };
if (trace) {
  options.trace = (e) => {
    const r = e.getRegisters();
    const word = e.memory.rom[r.PC];
    console.log(`  ${hex4(r.PC)}  ${formatDisassembly(word).padEnd(20)} ACC=${hex4(r.ACC)} FLAGS=${hex4(r.FLAGS)}`);
  };
}

let exitCode: number;
let stepLimitReached: boolean;
try {
  ({ exitCode, stepLimitReached } = runWithModules(emu, host, options));
} catch (err) {
  fail(err instanceof Error ? err.message : String(err));
}

if (dumpPath !== undefined) {
  try {
    writeDump(dumpPath, emu);
  } catch (err) {
    fail(err instanceof Error ? err.message : String(err));
  }
  if (!quiet) console.log(`  Memory dump written to ${dumpPath}`);
}

// ---- Summary ----

const summary = `Executed ${emu.totalInstructions} instructions`;
const frames = screen.framesPresented > 0 ? `, ${screen.framesPresented} frame(s)` : '';

if (stepLimitReached) {
  console.error(`\x1b[33m! ${summary}: step limit reached at PC=0x${hex4(emu.getRegisters().PC)}\x1b[0m`);
  process.exit(2);
}

switch (exitCode) {
  case ExitCode.HALT:
    if (!quiet) console.log(`\x1b[32m✓ ${summary}${frames}\x1b[0m — halted`);
    process.exit(0);
  case ExitCode.UNKNOWN_OPCODE:
    fail(`${summary}: unknown opcode at PC=0x${hex4((emu.getRegisters().PC - 1) & 0xFFFF)}`);
  case ExitCode.DIVIDE_BY_ZERO:
    fail(`${summary}: division by zero at PC=0x${hex4((emu.getRegisters().PC - 1) & 0xFFFF)}`);
  default:
    fail(`${summary}: program raised interrupt ${exitCode}`);
}
