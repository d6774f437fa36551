export {
  AddressingModeOperand,
  NO_OPERAND,
  REGISTER_OPERANDS,
  registerOperand,
  resolveOperand,
} from "./addressingModes";
export {
  CODE_MEMORY_SIZE,
  CodeImage,
  CodeMemory,
  ERASED_BYTE,
  Segment,
} from "./codeImage";
export {
  CPUInstruction,
  DecodedInstruction,
  DisassemblyChunk,
  MAX_INSTRUCTION_SIZE,
  OpcodeFamily,
  UNRECOGNIZED,
  concatBytes,
  decodeInstruction,
  disassembleBytes,
  instructionToString,
} from "./cpuDisassembler";
export { DisassemblyManager } from "./disassemblyManager";
export { HexRecord, RecordType, loadIntelHex, parseRecord } from "./intelHexLoader";
export { ILogger, LogLevel, createLogger, defaultLogger } from "./logging";
export {
  formatAddress,
  formatBytes,
  formatHex,
  formatSymbolOffset,
  hex,
  i8,
  u16,
  u8,
} from "./numbers";
export {
  BIT_RAM_BASE,
  SFR_BASE,
  SFR_BIT_NAMES,
  SFR_NAMES,
  resolveBit,
  resolveSfr,
} from "./sfrNames";
export { MCS51_VECTOR_SYMBOLS, SymbolMap, SymbolOffset } from "./symbolMap";
