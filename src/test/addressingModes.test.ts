import * as assert from 'assert';
import { NO_OPERAND, registerOperand, resolveOperand } from '../addressingModes';

describe('Addressing modes', () => {
  describe('resolveOperand', () => {
    it('should decode immediate data', () => {
      assert.deepStrictEqual(resolveOperand(0x4, [0x24, 0x2a]), { operand: '#0x2a', size: 2 });
    });

    it('should decode direct addresses through the SFR table', () => {
      assert.deepStrictEqual(resolveOperand(0x5, [0x25, 0x81]), { operand: 'SP', size: 2 });
      assert.deepStrictEqual(resolveOperand(0x5, [0x25, 0x30]), { operand: '0x30', size: 2 });
    });

    it('should decode register indirect', () => {
      assert.deepStrictEqual(resolveOperand(0x6, [0x26]), { operand: '@r0', size: 1 });
      assert.deepStrictEqual(resolveOperand(0x7, [0x27]), { operand: '@r1', size: 1 });
    });

    it('should decode registers r0-r7', () => {
      for (let n = 0; n < 8; n++) {
        assert.deepStrictEqual(resolveOperand(0x8 + n, [0x28 + n]), { operand: `r${n}`, size: 1 });
      }
    });

    it('should read operands relative to the offset', () => {
      assert.deepStrictEqual(resolveOperand(0x4, [0xff, 0xff, 0x74, 0x10], 2), {
        operand: '#0x10',
        size: 2,
      });
    });

    it('should reject nibbles that are not addressing modes', () => {
      for (const low of [0x0, 0x1, 0x2, 0x3]) {
        assert.strictEqual(resolveOperand(low, [low, 0x00]), NO_OPERAND);
      }
    });
  });

  describe('registerOperand', () => {
    it('should map nibbles 0x6-0xf', () => {
      assert.strictEqual(registerOperand(0x6), '@r0');
      assert.strictEqual(registerOperand(0x7), '@r1');
      assert.strictEqual(registerOperand(0xd), 'r5');
      assert.strictEqual(registerOperand(0xf), 'r7');
    });

    it('should return undefined outside the register range', () => {
      assert.strictEqual(registerOperand(0x5), undefined);
      assert.strictEqual(registerOperand(0x10), undefined);
    });
  });
});
