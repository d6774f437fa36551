import { DebugProtocol } from "@vscode/debugprotocol";
import { CODE_MEMORY_SIZE, CodeMemory } from "./codeImage";
import {
  DecodedInstruction,
  MAX_INSTRUCTION_SIZE,
  decodeInstruction,
  instructionToString,
} from "./cpuDisassembler";
import { ILogger, defaultLogger } from "./logging";
import { formatBytes, formatHex, formatSymbolOffset, hex } from "./numbers";
import { SymbolMap } from "./symbolMap";

interface DecodedLine {
  address: number;
  bytes: Uint8Array;
  decoded: DecodedInstruction;
}

const MIN_BYTES_PER_INSTRUCTION = 1;
// Extra instructions decoded ahead of a backward request, so a stream that starts inside
// an operand has room to fall back into step with the real instruction boundaries
const SYNC_INSTRUCTIONS = 8;

/**
 * Manages instruction disassembly for debug adapter disassemble requests.
 *
 * Handles:
 * - Variable-length (1-3 byte) instructions
 * - Positive and negative instruction offsets
 * - Symbol labels for instructions and branch targets
 * - Padding for instructions outside code memory
 */
export class DisassemblyManager {
  /**
   * @param memory Code memory to disassemble from
   * @param symbolMap Optional labels for addresses
   * @param log Where request and warning messages go
   */
  constructor(
    private memory: CodeMemory,
    private symbolMap?: SymbolMap,
    private log: ILogger = defaultLogger,
  ) {}

  /**
   * Disassembles instructions at the specified address with offset support.
   *
   * - Negative offsets: Decodes forward from well before the base address and keeps
   *   the instructions of the first stream that lands exactly on it
   * - Positive offsets: Decodes extra instructions and trims to requested range
   * - Padding: Adds invalid instructions where the range extends beyond code memory
   *
   * @param baseAddress Base code address for disassembly
   * @param instructionOffset Instruction offset from base address (can be negative)
   * @param count Number of instructions to disassemble
   */
  public async disassemble(
    baseAddress: number,
    instructionOffset: number,
    count: number,
  ): Promise<DebugProtocol.DisassembledInstruction[]> {
    if (!Number.isInteger(count) || count <= 0) {
      throw new Error("Disassembly failed: Invalid count");
    }
    if (!Number.isInteger(baseAddress) || baseAddress < 0 || baseAddress >= CODE_MEMORY_SIZE) {
      throw new Error(`Disassembly failed: Address ${baseAddress} out of range`);
    }
    this.log.log(
      `Disassemble request: ${formatHex(baseAddress)} offset ${instructionOffset} count ${count}`,
    );

    const lines: (DecodedLine | undefined)[] = [];

    if (instructionOffset < 0) {
      const wanted = -instructionOffset;
      const previous = await this.decodePrevious(baseAddress, wanted);
      // Pad with filler instructions where there isn't enough code before the base address
      for (let i = previous.length; i < wanted; i++) {
        lines.push(undefined);
      }
      lines.push(...previous);
    }

    const forwardCount = instructionOffset + count;
    if (forwardCount > 0) {
      lines.push(...(await this.decodeForward(baseAddress, forwardCount)));
    }

    const start = Math.max(instructionOffset, 0);
    return lines.slice(start, start + count).map((line) => this.toDisassembledInstruction(line));
  }

  /**
   * Decode up to `count` instructions starting at `address`.
   * Entries past the end of code memory are undefined.
   */
  private async decodeForward(
    address: number,
    count: number,
  ): Promise<(DecodedLine | undefined)[]> {
    const bytes = await this.memory.readMemory(address, count * MAX_INSTRUCTION_SIZE);
    const lines: (DecodedLine | undefined)[] = [];
    let offset = 0;

    while (lines.length < count && offset < bytes.length) {
      const decoded = decodeInstruction(bytes, offset, address + offset);
      // Truncated by the end of memory: show the byte on its own
      const size = decoded.size || MIN_BYTES_PER_INSTRUCTION;
      lines.push({
        address: address + offset,
        bytes: bytes.slice(offset, offset + size),
        decoded,
      });
      offset += size;
    }
    while (lines.length < count) {
      lines.push(undefined);
    }
    return lines;
  }

  /**
   * Decode up to `count` instructions ending immediately before `baseAddress`.
   *
   * The start of the preceding instruction isn't known. Read back as if every instruction
   * were the maximum size, plus a run of extra instructions, then decode forward from the
   * earliest candidate start whose stream ends exactly on the base address. Starting that
   * far back, a stream that begins inside an operand re-aligns before it reaches the
   * requested instructions.
   */
  private async decodePrevious(baseAddress: number, count: number): Promise<DecodedLine[]> {
    const windowStart = Math.max(
      0,
      baseAddress - (count + SYNC_INSTRUCTIONS) * MAX_INSTRUCTION_SIZE,
    );
    const bytes = await this.memory.readMemory(windowStart, baseAddress - windowStart);

    for (let start = 0; start < bytes.length; start++) {
      const lines: DecodedLine[] = [];
      let offset = start;
      while (offset < bytes.length) {
        const decoded = decodeInstruction(bytes, offset, windowStart + offset);
        if (decoded.size === 0) {
          break;
        }
        lines.push({
          address: windowStart + offset,
          bytes: bytes.slice(offset, offset + decoded.size),
          decoded,
        });
        offset += decoded.size;
      }
      if (offset === bytes.length) {
        return lines.slice(-count);
      }
    }

    if (bytes.length > 0) {
      this.log.warn(`No instruction boundary found before ${formatHex(baseAddress)}`);
    }
    return [];
  }

  private toDisassembledInstruction(
    line: DecodedLine | undefined,
  ): DebugProtocol.DisassembledInstruction {
    if (!line) {
      return {
        address: formatHex(0),
        instruction: "invalid",
        presentationHint: "invalid",
      };
    }

    const { address, bytes, decoded } = line;
    let instruction = decoded.size ? instructionToString(decoded) : `db ${hex(bytes[0])}`;

    if (decoded.target !== undefined && this.symbolMap) {
      const targetSymbol = this.symbolMap.findSymbolOffset(decoded.target);
      if (targetSymbol) {
        instruction += " ; " + formatSymbolOffset(targetSymbol);
      }
    }

    const disasm: DebugProtocol.DisassembledInstruction = {
      address: formatHex(address),
      instruction,
      instructionBytes: formatBytes(bytes),
    };
    if (decoded.size === 0 || decoded.reserved) {
      disasm.presentationHint = "invalid";
    }

    const symbol = this.symbolMap?.lookupSymbol(address);
    if (symbol) {
      disasm.symbol = symbol;
    }
    return disasm;
  }
}
