export class ImageLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImageLoadError';
  }
}

export class RomOverflowError extends Error {
  constructor(recordCount: number, capacity: number) {
    super(`Program has ${recordCount} instructions, ROM holds ${capacity}`);
    this.name = 'RomOverflowError';
  }
}

export class ModuleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModuleError';
  }
}

export class OutputError extends Error {
  constructor(path: string, reason: string) {
    super(`Cannot write '${path}': ${reason}`);
    this.name = 'OutputError';
  }
}
