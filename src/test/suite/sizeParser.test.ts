import * as assert from 'assert';
import { isSizeLike, parseSize, readSizeToken } from '../../backend/parser/SizeParser';

suite('SizeParser Test Suite', () => {

  suite('parseSize', () => {
    test('reads plain byte counts', () => {
      assert.strictEqual(parseSize('482'), 482);
      assert.strictEqual(parseSize('0'), 0);
      assert.strictEqual(parseSize('1,048,576'), 1048576);
    });

    test('multiplies unit suffixes by powers of 1024', () => {
      assert.strictEqual(parseSize('1K'), 1024);
      assert.strictEqual(parseSize('2M'), 2 * 1024 * 1024);
      assert.strictEqual(parseSize('1G'), 1073741824);
      assert.strictEqual(parseSize('482K'), 493568);
      assert.strictEqual(parseSize('1.5k'), 1536);
    });

    test('accepts byte suffixes after the unit', () => {
      assert.strictEqual(parseSize('12 KB'), 12288);
      assert.strictEqual(parseSize('3 KiB'), 3072);
      assert.strictEqual(parseSize('20 bytes'), 20);
      assert.strictEqual(parseSize('7B'), 7);
    });

    test('rounds fractional results to the nearest byte', () => {
      assert.strictEqual(parseSize('12.5'), 13);
      assert.strictEqual(parseSize('1.1K'), 1126);
    });

    test('uses powers of 1000 for decimal units', () => {
      assert.strictEqual(parseSize('1K', 'decimal'), 1000);
      assert.strictEqual(parseSize('2.5M', 'decimal'), 2500000);
    });

    test('returns null for placeholders and garbage', () => {
      assert.strictEqual(parseSize('-'), null);
      assert.strictEqual(parseSize(''), null);
      assert.strictEqual(parseSize('   '), null);
      assert.strictEqual(parseSize('n/a'), null);
      assert.strictEqual(parseSize('12 apples'), null);
    });
  });

  suite('isSizeLike', () => {
    test('recognises size cells including the dash placeholder', () => {
      assert.ok(isSizeLike('-'));
      assert.ok(isSizeLike(' 4096 '));
      assert.ok(isSizeLike('2.0M'));
      assert.ok(!isSizeLike('Directory'));
      assert.ok(!isSizeLike('2022-01-01'));
    });
  });

  suite('readSizeToken', () => {
    test('splits the size from the rest of a line', () => {
      assert.deepStrictEqual(readSizeToken('1.5K  Read this first'), { size: 1536, rest: '  Read this first' });
      assert.deepStrictEqual(readSizeToken('482'), { size: 482, rest: '' });
      assert.deepStrictEqual(readSizeToken('- '), { size: null, rest: ' ' });
    });

    test('allows a space before the unit letter', () => {
      assert.deepStrictEqual(readSizeToken('1.5 K notes'), { size: 1536, rest: ' notes' });
    });

    test('keeps a number followed by a word as a bare count', () => {
      assert.deepStrictEqual(readSizeToken('482 Beta build'), { size: 482, rest: ' Beta build' });
    });

    test('returns null when the line does not start with a size', () => {
      assert.strictEqual(readSizeToken('Read me'), null);
      assert.strictEqual(readSizeToken(''), null);
      assert.strictEqual(readSizeToken('12abc'), null);
    });
  });
});
