/**
 * 8051 code memory: a flat 64K address space
 */

export const CODE_MEMORY_SIZE = 0x1_0000;

/** Value of unprogrammed flash / EPROM */
export const ERASED_BYTE = 0xff;

export interface Segment {
  address: number;
  size: number;
}

/**
 * Source of code bytes for disassembly. Async so that it can be backed by a live target.
 */
export interface CodeMemory {
  readMemory(address: number, count: number): Promise<Uint8Array>;
}

export class CodeImage implements CodeMemory {
  public readonly memory = new Uint8Array(CODE_MEMORY_SIZE).fill(ERASED_BYTE);
  private segments: Segment[] = [];

  constructor(public startAddress?: number) {}

  /**
   * Write bytes into the image and record the range as loaded
   */
  public write(address: number, data: ArrayLike<number>): void {
    if (address < 0 || address + data.length > CODE_MEMORY_SIZE) {
      throw new Error(
        `Address range 0x${address.toString(16)}-0x${(address + data.length - 1).toString(16)} is outside code memory`,
      );
    }
    if (data.length === 0) {
      return;
    }
    this.memory.set(Array.from(data), address);
    this.addSegment({ address, size: data.length });
  }

  /**
   * Contiguous loaded ranges, sorted by address
   */
  public getSegments(): Segment[] {
    return this.segments.map((s) => ({ ...s }));
  }

  public isLoaded(address: number): boolean {
    return this.segments.some((s) => s.address <= address && s.address + s.size > address);
  }

  public async readMemory(address: number, count: number): Promise<Uint8Array> {
    const start = Math.max(0, Math.min(address, CODE_MEMORY_SIZE));
    const end = Math.max(start, Math.min(address + count, CODE_MEMORY_SIZE));
    return this.memory.slice(start, end);
  }

  private addSegment(segment: Segment) {
    const all = [...this.segments, segment].sort((a, b) => a.address - b.address);
    const merged: Segment[] = [];
    for (const s of all) {
      const prev = merged[merged.length - 1];
      if (prev && s.address <= prev.address + prev.size) {
        prev.size = Math.max(prev.size, s.address + s.size - prev.address);
      } else {
        merged.push({ ...s });
      }
    }
    this.segments = merged;
  }
}
