import { MEM_SIZE } from './constants';

/**
 * Full-address-space stack of 16-bit cells.
 * Push writes then increments the pointer, pop decrements then reads.
 * No overflow detection: the pointer wraps silently at 65536.
 */
export class WordStack {
  private sp = 0;
  private readonly body: Uint16Array;

  constructor(size: number = MEM_SIZE) {
    this.body = new Uint16Array(size);
  }

  get pointer(): number {
    return this.sp;
  }

  set pointer(value: number) {
    this.sp = value % this.body.length;
  }

  push(value: number): void {
    this.body[this.sp] = value;
    this.sp = (this.sp + 1) % this.body.length;
  }

  pop(): number {
    this.sp = (this.sp + this.body.length - 1) % this.body.length;
    return this.body[this.sp];
  }

  /** Value that the next pop would return, without moving the pointer. */
  peek(): number {
    return this.body[(this.sp + this.body.length - 1) % this.body.length];
  }

  reset(): void {
    this.sp = 0;
    this.body.fill(0);
  }

  snapshot(): Uint16Array {
    return this.body.slice();
  }
}
