import type { Segment } from "./codeImage";

export interface SymbolOffset {
  symbol: string;
  offset: number;
}

/**
 * Interrupt vectors of the 8051/8052. Timer 2 only exists on the 8052.
 */
export const MCS51_VECTOR_SYMBOLS: Readonly<Record<string, number>> = Object.freeze({
  reset: 0x0000,
  int0: 0x0003,
  timer0: 0x000b,
  int1: 0x0013,
  timer1: 0x001b,
  serial: 0x0023,
  timer2: 0x002b,
});

/**
 * Code labels by address, scoped to the loaded segments
 */
export class SymbolMap {
  private symbolsByAddress = new Map<number, string>();
  private sortedSymbols: [string, number][];

  constructor(
    private segments: Segment[],
    private symbols: Record<string, number>,
  ) {
    this.segments = segments.map((segment) => ({ ...segment }));
    this.symbols = { ...symbols };
    this.sortedSymbols = Object.entries(this.symbols).sort((a, b) => a[1] - b[1]);
    for (const [name, address] of this.sortedSymbols) {
      // First label wins when several share an address
      if (!this.symbolsByAddress.has(address)) {
        this.symbolsByAddress.set(address, name);
      }
    }
  }

  public getSegmentsInfo(): Segment[] {
    return this.segments.map((segment) => ({ ...segment }));
  }

  public getSymbols(): Record<string, number> {
    return { ...this.symbols };
  }

  public findSegmentForAddress(address: number): Segment | undefined {
    return this.segments.find(
      (segment) =>
        segment.address <= address && segment.address + segment.size > address,
    );
  }

  /**
   * Label exactly at an address
   */
  public lookupSymbol(address: number): string | undefined {
    return this.symbolsByAddress.get(address);
  }

  /**
   * Find the offset from the previous label for a given address
   */
  public findSymbolOffset(address: number): SymbolOffset | undefined {
    // Only care about addresses in loaded code
    const currentSegment = this.findSegmentForAddress(address);
    if (currentSegment === undefined) {
      return;
    }

    let ret: SymbolOffset | undefined;
    for (const [symbol, symAddr] of this.sortedSymbols) {
      const offset = address - symAddr;
      if (offset < 0) break;
      if (currentSegment === this.findSegmentForAddress(symAddr)) {
        // Keep the first name for an address, matching lookupSymbol
        if (!ret || ret.offset !== offset) {
          ret = { symbol, offset };
        }
      }
    }
    return ret;
  }
}
