import * as assert from 'assert';
import { CodeImage } from '../codeImage';

describe('CodeImage', () => {
  let image: CodeImage;

  beforeEach(() => {
    image = new CodeImage();
  });

  it('should start erased with no segments', () => {
    assert.strictEqual(image.memory[0], 0xff);
    assert.strictEqual(image.memory[0xffff], 0xff);
    assert.deepStrictEqual(image.getSegments(), []);
  });

  it('should write bytes and track segments', () => {
    image.write(0x10, [1, 2]);
    image.write(0x20, [3]);

    assert.deepStrictEqual(Array.from(image.memory.slice(0x10, 0x12)), [1, 2]);
    assert.deepStrictEqual(image.getSegments(), [
      { address: 0x10, size: 2 },
      { address: 0x20, size: 1 },
    ]);
  });

  it('should merge touching and overlapping writes', () => {
    image.write(0x10, [1, 2]);
    image.write(0x12, [3]);
    image.write(0x11, [9]);
    assert.deepStrictEqual(image.getSegments(), [{ address: 0x10, size: 3 }]);

    image.write(0x05, [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
    assert.deepStrictEqual(image.getSegments(), [{ address: 0x05, size: 14 }]);
  });

  it('should ignore empty writes', () => {
    image.write(0x10, []);
    assert.deepStrictEqual(image.getSegments(), []);
  });

  it('should reject writes outside code memory', () => {
    assert.throws(
      () => image.write(0xffff, [1, 2]),
      /Address range 0xffff-0x10000 is outside code memory/,
    );
  });

  it('should report loaded addresses', () => {
    image.write(0x100, [0, 0]);
    assert.strictEqual(image.isLoaded(0x100), true);
    assert.strictEqual(image.isLoaded(0x101), true);
    assert.strictEqual(image.isLoaded(0x102), false);
  });

  it('should return copies of segments', () => {
    image.write(0x10, [1]);
    image.getSegments()[0].size = 100;
    assert.deepStrictEqual(image.getSegments(), [{ address: 0x10, size: 1 }]);
  });

  describe('readMemory', () => {
    it('should read a range', async () => {
      image.write(0x30, [0x74, 0x2a]);
      const bytes = await image.readMemory(0x30, 3);
      assert.deepStrictEqual(Array.from(bytes), [0x74, 0x2a, 0xff]);
    });

    it('should truncate reads past the end of memory', async () => {
      const bytes = await image.readMemory(0xfffe, 4);
      assert.strictEqual(bytes.length, 2);
    });

    it('should return a copy', async () => {
      const bytes = await image.readMemory(0, 1);
      bytes[0] = 0;
      assert.strictEqual(image.memory[0], 0xff);
    });
  });
});
