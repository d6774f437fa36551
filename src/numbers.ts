import type { SymbolMap, SymbolOffset } from "./symbolMap";

/**
 * Formats a number as a hexadecimal string with optional zero-padding.
 *
 * @param value The number to format
 * @param length The minimum number of hex digits (default: 4, one 8051 code address)
 * @returns Formatted hex string like "0x1234" or "NaN" for invalid numbers
 */
export function formatHex(value: number, length = 4): string {
  if (isNaN(value)) {
    return "NaN";
  }
  if (value < 0) {
    return "-0x" + (-value).toString(16).padStart(length, "0");
  }
  return "0x" + value.toString(16).padStart(length, "0");
}

/**
 * Formats a value the way the 8051 assembly output prints it: lowercase, no padding.
 */
export function hex(value: number): string {
  return formatHex(value, 0);
}

/**
 * Formats bytes as space separated two digit hex pairs, e.g. "74 2a"
 */
export function formatBytes(bytes: ArrayLike<number>): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

/**
 * Formats a code address with optional symbol information.
 *
 * @param address Code address to format
 * @returns Formatted string like "0x0123" or "0x0123 = main+16"
 */
export function formatAddress(address: number, symbolMap?: SymbolMap): string {
  let out = formatHex(address);
  const symbolOffset = symbolMap?.findSymbolOffset(address);
  if (symbolOffset) {
    out += " = " + formatSymbolOffset(symbolOffset);
  }
  return out;
}

/**
 * Formats a label and offset, e.g. "main+16", or just "main" at offset 0
 */
export function formatSymbolOffset({ symbol, offset }: SymbolOffset): string {
  return offset ? symbol + "+" + offset : symbol;
}

/**
 * Converts a number to an unsigned 16-bit integer.
 *
 * Handles negative values by wrapping them into the valid 16-bit range.
 *
 * @param value The number to convert
 * @returns Unsigned 16-bit integer (0 to 0xFFFF)
 */
export function u16(value: number): number {
  while (value < 0) {
    value += 0x1_0000;
  }
  return value & 0xffff;
}

/**
 * Converts a number to an unsigned 8-bit integer.
 *
 * @param value The number to convert
 * @returns Unsigned 8-bit integer (0 to 0xFF)
 */
export function u8(value: number): number {
  while (value < 0) {
    value += 0x100;
  }
  return value & 0xff;
}

/**
 * Converts a number to a signed 8-bit integer.
 *
 * Used for relative branch displacements.
 *
 * @param value The number to convert
 * @returns Signed 8-bit integer (-0x80 to 0x7F)
 */
export function i8(value: number): number {
  const v = value & 0xff;
  return v >= 0x80 ? -(0x100 - v) : v;
}
