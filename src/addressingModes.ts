import { hex } from "./numbers";
import { resolveSfr } from "./sfrNames";

/**
 * Register operands selected by low nibbles 0x6-0xF, indexed by `lowNibble - 6`.
 * Shared by the mov, cjne and djnz families which only have register forms there.
 */
export const REGISTER_OPERANDS: readonly string[] = Object.freeze([
  "@r0",
  "@r1",
  "r0",
  "r1",
  "r2",
  "r3",
  "r4",
  "r5",
  "r6",
  "r7",
]);

export interface AddressingModeOperand {
  operand: string;
  /** Bytes consumed including the opcode, 0 when the nibble is not an addressing mode */
  size: number;
}

export const NO_OPERAND: AddressingModeOperand = Object.freeze({ operand: "", size: 0 });

/**
 * Register operand for a low nibble in the 0x6-0xF range
 */
export function registerOperand(lowNibble: number): string | undefined {
  if (lowNibble < 0x6 || lowNibble > 0xf) {
    return undefined;
  }
  return REGISTER_OPERANDS[lowNibble - 6];
}

/**
 * Decode the addressing mode encoded in an opcode's low nibble.
 *
 * Used by inc, dec, add, addc, orl, anl, xrl, subb, xch and the accumulator mov forms:
 * - 0x4: immediate `#data`
 * - 0x5: direct address
 * - 0x6-0x7: register indirect `@r0`, `@r1`
 * - 0x8-0xF: register `r0`-`r7`
 *
 * Any other nibble returns NO_OPERAND.
 */
export function resolveOperand(
  lowNibble: number,
  bytes: ArrayLike<number>,
  offset = 0,
): AddressingModeOperand {
  switch (lowNibble) {
    case 0x4:
      return { operand: "#" + hex(bytes[offset + 1] ?? 0), size: 2 };
    case 0x5:
      return { operand: resolveSfr(bytes[offset + 1] ?? 0), size: 2 };
    case 0x6:
    case 0x7:
    case 0x8:
    case 0x9:
    case 0xa:
    case 0xb:
    case 0xc:
    case 0xd:
    case 0xe:
    case 0xf:
      return { operand: REGISTER_OPERANDS[lowNibble - 6], size: 1 };
    default:
      return NO_OPERAND;
  }
}
