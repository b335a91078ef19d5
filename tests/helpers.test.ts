import {
  INT64_MAX,
  INT64_MIN,
  RANGE_MAX,
  UINT64_MAX,
  isAcceptableRange,
  literalToBigInt,
  parseInt64,
  parseInt64Prefix,
  parseSize,
  parseUint64,
  parseUint64Prefix,
} from '../src/helpers';

describe('helpers', () => {
  describe('limits', () => {
    it('match the 64-bit domains', () => {
      expect(INT64_MIN).toBe(-9223372036854775808n);
      expect(INT64_MAX).toBe(9223372036854775807n);
      expect(UINT64_MAX).toBe(18446744073709551615n);
      expect(RANGE_MAX).toBe(65536n);
    });
  });

  describe('literalToBigInt', () => {
    it('converts each radix', () => {
      expect(literalToBigInt({ negative: false, radix: 10, digits: '123' })).toBe(123n);
      expect(literalToBigInt({ negative: true, radix: 16, digits: 'fF' })).toBe(-255n);
      expect(literalToBigInt({ negative: false, radix: 8, digits: '017' })).toBe(15n);
      expect(literalToBigInt({ negative: false, radix: 8, digits: '0' })).toBe(0n);
    });
  });

  describe('parseInt64Prefix', () => {
    it('returns the leading value and the rest', () => {
      expect(parseInt64Prefix('3-7')).toEqual({ value: 3n, rest: '-7' });
      expect(parseInt64Prefix('-3--7')).toEqual({ value: -3n, rest: '--7' });
    });

    it('returns null without a leading integer', () => {
      expect(parseInt64Prefix('x1')).toBeNull();
      expect(parseInt64Prefix('')).toBeNull();
    });

    it('returns null on int64 overflow', () => {
      expect(parseInt64Prefix('9223372036854775808-1')).toBeNull();
      expect(parseInt64Prefix('-9223372036854775809')).toBeNull();
    });
  });

  describe('parseUint64Prefix', () => {
    it('does not take a sign', () => {
      expect(parseUint64Prefix('-3')).toBeNull();
      expect(parseUint64Prefix('3-4')).toEqual({ value: 3n, rest: '-4' });
    });

    it('returns null on uint64 overflow', () => {
      expect(parseUint64Prefix('0x10000000000000000')).toBeNull();
    });
  });

  describe('parseInt64 / parseUint64', () => {
    it('require the whole string', () => {
      expect(parseInt64('12')).toBe(12n);
      expect(parseInt64('12 ')).toBeNull();
      expect(parseUint64('0xffffffffffffffff')).toBe(UINT64_MAX);
      expect(parseUint64('1-2')).toBeNull();
    });
  });

  describe('isAcceptableRange', () => {
    it('requires ordered bounds', () => {
      expect(isAcceptableRange(3n, 7n)).toBe(true);
      expect(isAcceptableRange(7n, 7n)).toBe(true);
      expect(isAcceptableRange(7n, 3n)).toBe(false);
    });

    it('caps the span', () => {
      expect(isAcceptableRange(0n, RANGE_MAX - 1n)).toBe(true);
      expect(isAcceptableRange(0n, RANGE_MAX)).toBe(false);
      expect(isAcceptableRange(INT64_MIN, INT64_MAX)).toBe(false);
      expect(isAcceptableRange(INT64_MAX - 1n, INT64_MAX)).toBe(true);
    });
  });

  describe('parseSize', () => {
    it('scales by binary units', () => {
      expect(parseSize('1')).toBe(1n);
      expect(parseSize('1b')).toBe(1n);
      expect(parseSize('1K')).toBe(1024n);
      expect(parseSize('1m')).toBe(1048576n);
      expect(parseSize('1G')).toBe(1073741824n);
      expect(parseSize('1T')).toBe(1099511627776n);
      expect(parseSize('1P')).toBe(1125899906842624n);
      expect(parseSize('1E')).toBe(1152921504606846976n);
    });

    it('truncates fractional results', () => {
      expect(parseSize('0.001K')).toBe(1n);
      expect(parseSize('1.25K')).toBe(1280n);
    });

    it('requires a unit for fractional values', () => {
      expect(parseSize('2.5')).toBeNull();
      expect(parseSize('2.00')).toBe(2n);
    });

    it('accepts negative zero', () => {
      expect(parseSize('-0')).toBe(0n);
    });

    it('rejects values above int64', () => {
      expect(parseSize('9223372036854775807')).toBe(INT64_MAX);
      expect(parseSize('9223372036854775808')).toBeNull();
    });

    it('rejects trailing text', () => {
      expect(parseSize('1KB')).toBeNull();
      expect(parseSize('1 K')).toBeNull();
    });
  });
});
