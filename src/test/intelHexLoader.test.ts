import * as assert from 'assert';
import * as sinon from 'sinon';
import { ILogger } from '../logging';
import { RecordType, loadIntelHex, parseRecord } from '../intelHexLoader';

const PROGRAM = [
  ':03000000020030CB', // ljmp 0x30
  ':06003000742AF59080FE29',
  ':0100360022A7',
  ':00000001FF',
].join('\n');

describe('Intel HEX Loader', () => {
  describe('parseRecord', () => {
    it('should parse a data record', () => {
      const record = parseRecord(':03000000020030CB', 1);
      assert.strictEqual(record.type, RecordType.Data);
      assert.strictEqual(record.address, 0);
      assert.deepStrictEqual(Array.from(record.data), [0x02, 0x00, 0x30]);
      assert.strictEqual(record.line, 1);
    });

    it('should parse an end of file record', () => {
      const record = parseRecord(':00000001FF', 4);
      assert.strictEqual(record.type, RecordType.EndOfFile);
      assert.strictEqual(record.data.length, 0);
    });

    it('should accept lowercase digits', () => {
      const record = parseRecord(':06003000742af59080fe29', 1);
      assert.strictEqual(record.address, 0x30);
      assert.strictEqual(record.data[5], 0xfe);
    });

    it('should reject a missing start code', () => {
      assert.throws(
        () => parseRecord('03000000020030CB', 3),
        /^Error: Intel HEX parse error: Missing start code on line 3$/,
      );
    });

    it('should reject invalid digits', () => {
      assert.throws(() => parseRecord(':01003G0022A7', 1), /Invalid hex digits on line 1/);
      assert.throws(() => parseRecord(':0100360022A', 1), /Invalid hex digits on line 1/);
    });

    it('should reject a length mismatch', () => {
      assert.throws(
        () => parseRecord(':0200360022A7', 1),
        /Length mismatch: expected 2 data bytes on line 1/,
      );
    });

    it('should reject a checksum mismatch', () => {
      assert.throws(() => parseRecord(':0100360022A8', 2), /Checksum mismatch on line 2/);
    });

    it('should reject an unknown record type', () => {
      assert.throws(() => parseRecord(':00000006FA', 1), /Unknown record type 0x06 on line 1/);
    });
  });

  describe('loadIntelHex', () => {
    it('should load data records into code memory', () => {
      const image = loadIntelHex(PROGRAM);

      assert.deepStrictEqual(Array.from(image.memory.slice(0, 3)), [0x02, 0x00, 0x30]);
      assert.deepStrictEqual(
        Array.from(image.memory.slice(0x30, 0x37)),
        [0x74, 0x2a, 0xf5, 0x90, 0x80, 0xfe, 0x22],
      );
    });

    it('should leave unloaded memory erased', () => {
      const image = loadIntelHex(PROGRAM);
      assert.strictEqual(image.memory[0x10], 0xff);
      assert.strictEqual(image.memory.length, 0x10000);
    });

    it('should merge adjacent records into segments', () => {
      const image = loadIntelHex(PROGRAM);
      assert.deepStrictEqual(image.getSegments(), [
        { address: 0x00, size: 3 },
        { address: 0x30, size: 7 },
      ]);
    });

    it('should handle CRLF line endings and blank lines', () => {
      const image = loadIntelHex(PROGRAM.split('\n').join('\r\n\r\n'));
      assert.strictEqual(image.memory[0x36], 0x22);
    });

    it('should ignore anything after the end of file record', () => {
      const image = loadIntelHex(PROGRAM + '\nnot a record');
      assert.strictEqual(image.memory[0x30], 0x74);
    });

    it('should apply extended segment addresses', () => {
      const image = loadIntelHex([':020000020100FB', ':0100100000EF', ':00000001FF'].join('\n'));
      assert.strictEqual(image.memory[0x1010], 0x00);
      assert.deepStrictEqual(image.getSegments(), [{ address: 0x1010, size: 1 }]);
    });

    it('should accept a zero extended linear address', () => {
      const image = loadIntelHex([':020000040000FA', ':01000000E41B', ':00000001FF'].join('\n'));
      assert.strictEqual(image.memory[0], 0xe4);
    });

    it('should reject data beyond 64K', () => {
      assert.throws(
        () => loadIntelHex([':020000040001F9', ':0100100000EF', ':00000001FF'].join('\n')),
        /Address 0x10010 out of range on line 2/,
      );
      assert.throws(
        () => loadIntelHex([':03FFFE0000000000', ':00000001FF'].join('\n')),
        /Address 0xfffe out of range on line 1/,
      );
    });

    it('should record start addresses', () => {
      const linear = loadIntelHex([':0400000500000030C7', ':00000001FF'].join('\n'));
      assert.strictEqual(linear.startAddress, 0x30);

      const segment = loadIntelHex([':0400000300000100F8', ':00000001FF'].join('\n'));
      assert.strictEqual(segment.startAddress, 0x100);
    });

    it('should leave start address undefined when not present', () => {
      assert.strictEqual(loadIntelHex(PROGRAM).startAddress, undefined);
    });

    it('should require an end of file record', () => {
      assert.throws(
        () => loadIntelHex(':03000000020030CB\n'),
        /^Error: Intel HEX parse error: Missing end of file record on line 1$/,
      );
      assert.throws(
        () => loadIntelHex([':03000000020030CB', ':01000B0032C2', '', ''].join('\n')),
        /^Error: Intel HEX parse error: Missing end of file record on line 2$/,
      );
    });

    it('should log to the logger it is given', () => {
      const spy = sinon.spy();
      const log: ILogger = {
        log: spy,
        verbose: sinon.spy(),
        warn: sinon.spy(),
        error: sinon.spy(),
      };

      loadIntelHex([':03000000020030CB', ':00000001FF'].join('\n'), log);

      assert.ok(spy.calledOnceWithExactly('Loaded 1 data records into 1 segments'));
    });
  });
});
