/**
 * Intel HEX loader
 * Builds an 8051 code image from the output of an assembler or compiler (e.g. SDCC's .ihx)
 */

import { CODE_MEMORY_SIZE, CodeImage } from "./codeImage";
import { ILogger, defaultLogger } from "./logging";
import { formatHex } from "./numbers";

export enum RecordType {
  Data = 0x00,
  EndOfFile = 0x01,
  ExtendedSegmentAddress = 0x02,
  StartSegmentAddress = 0x03,
  ExtendedLinearAddress = 0x04,
  StartLinearAddress = 0x05,
}

export interface HexRecord {
  type: RecordType;
  address: number;
  data: Uint8Array;
  line: number;
}

function parseError(line: number, message: string): Error {
  return new Error(`Intel HEX parse error: ${message} on line ${line}`);
}

const RECORD_TYPES: readonly RecordType[] = [
  RecordType.Data,
  RecordType.EndOfFile,
  RecordType.ExtendedSegmentAddress,
  RecordType.StartSegmentAddress,
  RecordType.ExtendedLinearAddress,
  RecordType.StartLinearAddress,
];

function toRecordType(value: number, line: number): RecordType {
  const type = RECORD_TYPES.find((t) => t === value);
  if (type === undefined) {
    throw parseError(line, `Unknown record type ${formatHex(value, 2)}`);
  }
  return type;
}

/**
 * Parse a single record line ":LLAAAATT<data>CC"
 */
export function parseRecord(text: string, line: number): HexRecord {
  if (!text.startsWith(":")) {
    throw parseError(line, "Missing start code");
  }
  const digits = text.slice(1);
  if (digits.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(digits)) {
    throw parseError(line, "Invalid hex digits");
  }

  const bytes = Buffer.from(digits, "hex");
  if (bytes.length < 5) {
    throw parseError(line, "Record too short");
  }
  const length = bytes[0];
  if (bytes.length !== length + 5) {
    throw parseError(line, `Length mismatch: expected ${length} data bytes`);
  }

  const sum = bytes.reduce((acc, b) => (acc + b) & 0xff, 0);
  if (sum !== 0) {
    throw parseError(line, "Checksum mismatch");
  }

  return {
    type: toRecordType(bytes[3], line),
    address: bytes.readUInt16BE(1),
    data: new Uint8Array(bytes.subarray(4, 4 + length)),
    line,
  };
}

function readWord(record: HexRecord): number {
  if (record.data.length !== 2) {
    throw parseError(record.line, "Address record must have 2 data bytes");
  }
  return (record.data[0] << 8) | record.data[1];
}

/**
 * Load Intel HEX text into a 64K code image
 */
export function loadIntelHex(text: string, log: ILogger = defaultLogger): CodeImage {
  const image = new CodeImage();
  let base = 0;
  let dataRecords = 0;
  let ended = false;
  let lastLine = 1;

  const lines = text.split("\n");
  for (let i = 0; i < lines.length && !ended; i++) {
    const content = lines[i].trim();
    if (!content) {
      continue;
    }
    lastLine = i + 1;
    const record = parseRecord(content, lastLine);

    switch (record.type) {
      case RecordType.Data: {
        const address = base + record.address;
        if (address + record.data.length > CODE_MEMORY_SIZE) {
          throw parseError(record.line, `Address ${formatHex(address, 4)} out of range`);
        }
        image.write(address, record.data);
        dataRecords++;
        break;
      }
      case RecordType.EndOfFile:
        ended = true;
        break;
      case RecordType.ExtendedSegmentAddress:
        base = readWord(record) << 4;
        break;
      case RecordType.ExtendedLinearAddress:
        base = readWord(record) * 0x1_0000;
        break;
      case RecordType.StartSegmentAddress:
      case RecordType.StartLinearAddress: {
        if (record.data.length !== 4) {
          throw parseError(record.line, "Start address record must have 4 data bytes");
        }
        // Code space is 16 bits, only IP / the low word is meaningful
        image.startAddress = (record.data[2] << 8) | record.data[3];
        break;
      }
    }
  }

  if (!ended) {
    throw parseError(lastLine, "Missing end of file record");
  }

  log.log(
    `Loaded ${dataRecords} data records into ${image.getSegments().length} segments`,
  );
  return image;
}
