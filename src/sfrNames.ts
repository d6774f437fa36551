/**
 * Special function register and bit address names for the 8051/8052
 *
 * Both tables cover the SFR space 0x80-0xFF and are indexed by `address - 0x80`.
 * Empty entries have no assigned name and are printed as hex.
 */

import sfrNameData from "./data/sfrNames.json";
import sfrBitNameData from "./data/sfrBitNames.json";
import { hex } from "./numbers";

export const SFR_BASE = 0x80;

/** Start of the bit addressable RAM area (0x20-0x2F) */
export const BIT_RAM_BASE = 0x20;

function freezeTable(names: string[]): readonly string[] {
  if (names.length !== 0x100 - SFR_BASE) {
    throw new Error(`SFR table must have ${0x100 - SFR_BASE} entries, got ${names.length}`);
  }
  return Object.freeze([...names]);
}

export const SFR_NAMES = freezeTable(sfrNameData);
export const SFR_BIT_NAMES = freezeTable(sfrBitNameData);

function lookup(table: readonly string[], address: number): string | undefined {
  if (address < SFR_BASE) {
    return undefined;
  }
  return table[address - SFR_BASE] || undefined;
}

/**
 * Name of a direct address: the register name in SFR space, hex otherwise
 */
export function resolveSfr(address: number): string {
  return lookup(SFR_NAMES, address) ?? hex(address);
}

/**
 * Name of a bit address
 *
 * Bits 0x00-0x7F live in RAM bytes 0x20-0x2F and print as "byte.bit",
 * bits 0x80-0xFF belong to the bit addressable SFRs.
 */
export function resolveBit(address: number): string {
  if (address >= SFR_BASE) {
    return lookup(SFR_BIT_NAMES, address) ?? hex(address);
  }
  return `${hex(Math.floor(address / 8) + BIT_RAM_BASE)}.${address % 8}`;
}
