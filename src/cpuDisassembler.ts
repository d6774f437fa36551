/**
 * CPU (MCS-51) instruction disassembler for the 8051/8052
 *
 * 8051 instructions are 1-3 bytes long. The high nibble of the opcode selects an
 * instruction family and the low nibble selects the variant or the addressing mode.
 * ajmp and acall are the exception: they are identified by the low five bits and
 * carry address bits 8-10 in the top three bits of the opcode.
 */

import { registerOperand, resolveOperand } from "./addressingModes";
import { hex, i8, u16 } from "./numbers";
import { resolveBit, resolveSfr } from "./sfrNames";

export interface DecodedInstruction {
  mnemonic: string;
  operands: string;
  /** Instruction length in bytes, 0 when the bytes could not be decoded */
  size: number;
  /** Jump or call target */
  target?: number;
  /** The architecturally undefined 0xA5 opcode */
  reserved?: boolean;
}

/** Longest 8051 instruction */
export const MAX_INSTRUCTION_SIZE = 3;

export const UNRECOGNIZED: Readonly<DecodedInstruction> = Object.freeze({
  mnemonic: "",
  operands: "",
  size: 0,
});

/**
 * Opcode families by high nibble
 */
export enum OpcodeFamily {
  Inc,
  Dec,
  Add,
  Addc,
  Orl,
  Anl,
  Xrl,
  MovImmediate,
  MovDirect,
  Subb,
  MovToRegister,
  Cjne,
  Xch,
  Djnz,
  MovToAccumulator,
  MovFromAccumulator,
}

const FAMILIES: readonly OpcodeFamily[] = [
  OpcodeFamily.Inc,
  OpcodeFamily.Dec,
  OpcodeFamily.Add,
  OpcodeFamily.Addc,
  OpcodeFamily.Orl,
  OpcodeFamily.Anl,
  OpcodeFamily.Xrl,
  OpcodeFamily.MovImmediate,
  OpcodeFamily.MovDirect,
  OpcodeFamily.Subb,
  OpcodeFamily.MovToRegister,
  OpcodeFamily.Cjne,
  OpcodeFamily.Xch,
  OpcodeFamily.Djnz,
  OpcodeFamily.MovToAccumulator,
  OpcodeFamily.MovFromAccumulator,
];

interface DecodeContext {
  /** Low nibble of the opcode */
  low: number;
  /** Address of the opcode */
  pc: number;
  /** Byte at the given position within the instruction */
  byte(index: number): number;
}

type FamilyDecoder = (ctx: DecodeContext) => DecodedInstruction;

function instruction(mnemonic: string, operands: string, size: number): DecodedInstruction {
  return { mnemonic, operands, size };
}

/**
 * Relative branch. The displacement is the last byte of the instruction and is
 * added to the address of the following instruction.
 */
function relative(
  ctx: DecodeContext,
  mnemonic: string,
  operands: string[],
  size: number,
): DecodedInstruction {
  const target = u16(ctx.pc + size + i8(ctx.byte(size - 1)));
  return {
    mnemonic,
    operands: [...operands, hex(target)].join(", "),
    size,
    target,
  };
}

/**
 * ljmp / lcall: big-endian 16-bit absolute address
 */
function long(ctx: DecodeContext, mnemonic: string): DecodedInstruction {
  const target = (ctx.byte(1) << 8) | ctx.byte(2);
  return { mnemonic, operands: hex(target), size: 3, target };
}

/**
 * ajmp / acall: 11-bit address within the 2K page of the next instruction
 */
function absolute(opcode: number, ctx: DecodeContext, mnemonic: string): DecodedInstruction {
  const next = u16(ctx.pc + 2);
  const target = (next & 0xf800) | ((opcode & 0xe0) << 3) | ctx.byte(1);
  return { mnemonic, operands: hex(target), size: 2, target };
}

/**
 * Instruction using the shared addressing mode table
 */
function withMode(
  ctx: DecodeContext,
  mnemonic: string,
  format: (operand: string) => string,
): DecodedInstruction {
  const { operand, size } = resolveOperand(ctx.low, [ctx.byte(0), ctx.byte(1)]);
  if (size === 0) {
    return UNRECOGNIZED;
  }
  return instruction(mnemonic, format(operand), size);
}

/**
 * Instruction using a register operand from low nibbles 0x6-0xF
 */
function withRegister(
  ctx: DecodeContext,
  build: (register: string) => DecodedInstruction,
): DecodedInstruction {
  const register = registerOperand(ctx.low);
  return register === undefined ? UNRECOGNIZED : build(register);
}

const bit = (ctx: DecodeContext) => resolveBit(ctx.byte(1));
const direct = (ctx: DecodeContext, index = 1) => resolveSfr(ctx.byte(index));
const immediate = (ctx: DecodeContext, index = 1) => "#" + hex(ctx.byte(index));

/**
 * orl, anl, xrl share one layout
 */
function logicFamily(mnemonic: string, branch: string): FamilyDecoder {
  return (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return relative(ctx, branch, [], 2);
      case 0x2:
        return instruction(mnemonic, `${direct(ctx)}, a`, 2);
      case 0x3:
        return instruction(mnemonic, `${direct(ctx)}, ${immediate(ctx, 2)}`, 3);
      default:
        return withMode(ctx, mnemonic, (op) => `a, ${op}`);
    }
  };
}

const FAMILY_DECODERS: Record<OpcodeFamily, FamilyDecoder> = {
  [OpcodeFamily.Inc]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return instruction("nop", "", 1);
      case 0x2:
        return long(ctx, "ljmp");
      case 0x3:
        return instruction("rr", "a", 1);
      case 0x4:
        return instruction("inc", "a", 1);
      default:
        return withMode(ctx, "inc", (op) => op);
    }
  },

  [OpcodeFamily.Dec]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return relative(ctx, "jbc", [bit(ctx)], 3);
      case 0x2:
        return long(ctx, "lcall");
      case 0x3:
        return instruction("rrc", "a", 1);
      case 0x4:
        return instruction("dec", "a", 1);
      default:
        return withMode(ctx, "dec", (op) => op);
    }
  },

  [OpcodeFamily.Add]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return relative(ctx, "jb", [bit(ctx)], 3);
      case 0x2:
        return instruction("ret", "", 1);
      case 0x3:
        return instruction("rl", "a", 1);
      default:
        return withMode(ctx, "add", (op) => `a, ${op}`);
    }
  },

  [OpcodeFamily.Addc]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return relative(ctx, "jnb", [bit(ctx)], 3);
      case 0x2:
        return instruction("reti", "", 1);
      case 0x3:
        return instruction("rlc", "a", 1);
      default:
        return withMode(ctx, "addc", (op) => `a, ${op}`);
    }
  },

  [OpcodeFamily.Orl]: logicFamily("orl", "jc"),
  [OpcodeFamily.Anl]: logicFamily("anl", "jnc"),
  [OpcodeFamily.Xrl]: logicFamily("xrl", "jz"),

  [OpcodeFamily.MovImmediate]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return relative(ctx, "jnz", [], 2);
      case 0x2:
        return instruction("orl", `c, ${bit(ctx)}`, 2);
      case 0x3:
        return instruction("jmp", "@a+dptr", 1);
      case 0x4:
        return instruction("mov", `a, ${immediate(ctx)}`, 2);
      case 0x5:
        return instruction("mov", `${direct(ctx)}, ${immediate(ctx, 2)}`, 3);
      default:
        return withRegister(ctx, (reg) => instruction("mov", `${reg}, ${immediate(ctx)}`, 2));
    }
  },

  [OpcodeFamily.MovDirect]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return relative(ctx, "sjmp", [], 2);
      case 0x2:
        return instruction("anl", `c, ${bit(ctx)}`, 2);
      case 0x3:
        return instruction("movc", "a, @a+pc", 1);
      case 0x4:
        return instruction("div", "ab", 1);
      case 0x5:
        // Source comes first in the encoding
        return instruction("mov", `${direct(ctx, 2)}, ${direct(ctx, 1)}`, 3);
      default:
        return withRegister(ctx, (reg) => instruction("mov", `${direct(ctx)}, ${reg}`, 2));
    }
  },

  [OpcodeFamily.Subb]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return instruction("mov", `dptr, #${hex((ctx.byte(1) << 8) | ctx.byte(2))}`, 3);
      case 0x2:
        return instruction("mov", `${bit(ctx)}, c`, 2);
      case 0x3:
        return instruction("movc", "a, @a+dptr", 1);
      default:
        return withMode(ctx, "subb", (op) => `a, ${op}`);
    }
  },

  [OpcodeFamily.MovToRegister]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return instruction("orl", `c, /${bit(ctx)}`, 2);
      case 0x2:
        return instruction("mov", `c, ${bit(ctx)}`, 2);
      case 0x3:
        return instruction("inc", "dptr", 1);
      case 0x4:
        return instruction("mul", "ab", 1);
      case 0x5:
        // Undefined by the architecture, so is its length
        return { ...instruction("reserved", "", 1), reserved: true };
      default:
        return withRegister(ctx, (reg) => instruction("mov", `${reg}, ${direct(ctx)}`, 2));
    }
  },

  [OpcodeFamily.Cjne]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return instruction("anl", `c, /${bit(ctx)}`, 2);
      case 0x2:
        return instruction("cpl", bit(ctx), 2);
      case 0x3:
        return instruction("cpl", "c", 1);
      case 0x4:
        return relative(ctx, "cjne", ["a", immediate(ctx)], 3);
      case 0x5:
        return relative(ctx, "cjne", ["a", direct(ctx)], 3);
      default:
        return withRegister(ctx, (reg) => relative(ctx, "cjne", [reg, immediate(ctx)], 3));
    }
  },

  [OpcodeFamily.Xch]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return instruction("push", direct(ctx), 2);
      case 0x2:
        return instruction("clr", bit(ctx), 2);
      case 0x3:
        return instruction("clr", "c", 1);
      case 0x4:
        return instruction("swap", "a", 1);
      default:
        return withMode(ctx, "xch", (op) => `a, ${op}`);
    }
  },

  [OpcodeFamily.Djnz]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return instruction("pop", direct(ctx), 2);
      case 0x2:
        return instruction("setb", bit(ctx), 2);
      case 0x3:
        return instruction("setb", "c", 1);
      case 0x4:
        return instruction("da", "a", 1);
      case 0x5:
        return relative(ctx, "djnz", [direct(ctx)], 3);
      case 0x6:
        return instruction("xchd", "a, @r0", 1);
      case 0x7:
        return instruction("xchd", "a, @r1", 1);
      default:
        return withRegister(ctx, (reg) => relative(ctx, "djnz", [reg], 2));
    }
  },

  [OpcodeFamily.MovToAccumulator]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return instruction("movx", "a, @dptr", 1);
      case 0x2:
        return instruction("movx", "a, @r0", 1);
      case 0x3:
        return instruction("movx", "a, @r1", 1);
      case 0x4:
        return instruction("clr", "a", 1);
      default:
        return withMode(ctx, "mov", (op) => `a, ${op}`);
    }
  },

  [OpcodeFamily.MovFromAccumulator]: (ctx) => {
    switch (ctx.low) {
      case 0x0:
        return instruction("movx", "@dptr, a", 1);
      case 0x2:
        return instruction("movx", "@r0, a", 1);
      case 0x3:
        return instruction("movx", "@r1, a", 1);
      case 0x4:
        return instruction("cpl", "a", 1);
      default:
        return withMode(ctx, "mov", (op) => `${op}, a`);
    }
  },
};

/**
 * Decode a single instruction
 *
 * Never throws: bytes that run out before the end of the instruction give UNRECOGNIZED.
 *
 * @param bytes Code bytes
 * @param offset Position of the opcode in `bytes`
 * @param pc Address of the opcode, used for jump and call targets
 */
export function decodeInstruction(
  bytes: ArrayLike<number>,
  offset = 0,
  pc = 0,
): DecodedInstruction {
  if (offset < 0 || offset >= bytes.length) {
    return UNRECOGNIZED;
  }

  const opcode = bytes[offset] & 0xff;
  const ctx: DecodeContext = {
    low: opcode & 0x0f,
    pc: u16(pc),
    // Reads past the end are caught by the length check below
    byte: (index) => (bytes[offset + index] ?? 0) & 0xff,
  };

  let decoded: DecodedInstruction;
  if ((opcode & 0x1f) === 0x01) {
    decoded = absolute(opcode, ctx, "ajmp");
  } else if ((opcode & 0x1f) === 0x11) {
    decoded = absolute(opcode, ctx, "acall");
  } else {
    decoded = FAMILY_DECODERS[FAMILIES[opcode >> 4]](ctx);
  }

  if (offset + decoded.size > bytes.length) {
    return UNRECOGNIZED;
  }
  return decoded;
}

/**
 * Full assembly text, e.g. "mov a, #0x2a"
 */
export function instructionToString(decoded: DecodedInstruction): string {
  return decoded.operands ? `${decoded.mnemonic} ${decoded.operands}` : decoded.mnemonic;
}

export interface CPUInstruction {
  address: number;
  bytes: Uint8Array;
  mnemonic: string;
  operands: string;
  target?: number;
  comment?: string;
}

/**
 * Result of disassembling a chunk of memory
 */
export interface DisassemblyChunk {
  instructions: CPUInstruction[];
  /** The address of the last byte processed (may be incomplete instruction) */
  lastAddress: number;
  /** Number of incomplete bytes at the end (instruction spanning chunk boundary) */
  incompleteBytesAtEnd: number;
}

/**
 * Disassemble a single instruction at the given offset in the byte array
 * Returns the instruction and number of bytes consumed, or null if insufficient data
 */
function disassembleSingleInstruction(
  bytes: Uint8Array,
  offset: number,
  address: number,
): { instruction: CPUInstruction; bytesUsed: number } | null {
  const decoded = decodeInstruction(bytes, offset, address);
  if (decoded.size === 0) {
    return null;
  }

  const cpuInstruction: CPUInstruction = {
    address,
    bytes: bytes.slice(offset, offset + decoded.size),
    mnemonic: decoded.mnemonic,
    operands: decoded.operands,
  };
  if (decoded.target !== undefined) {
    cpuInstruction.target = decoded.target;
  }
  if (decoded.reserved) {
    cpuInstruction.comment = "Reserved opcode";
  }

  return { instruction: cpuInstruction, bytesUsed: decoded.size };
}

/**
 * Disassemble instructions from a byte array, handling variable-length instructions
 * Returns instructions and information about incomplete bytes at the end
 */
export function disassembleBytes(startAddress: number, bytes: Uint8Array): DisassemblyChunk {
  const instructions: CPUInstruction[] = [];
  let offset = 0;

  while (offset < bytes.length) {
    const result = disassembleSingleInstruction(bytes, offset, u16(startAddress + offset));

    if (!result) {
      // Incomplete instruction at end - not enough bytes to decode
      return {
        instructions,
        lastAddress: startAddress + offset - 1,
        incompleteBytesAtEnd: bytes.length - offset,
      };
    }

    instructions.push(result.instruction);
    offset += result.bytesUsed;
  }

  return {
    instructions,
    lastAddress: startAddress + offset - 1,
    incompleteBytesAtEnd: 0,
  };
}

/**
 * Helper to concatenate Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((acc, arr) => acc + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}
