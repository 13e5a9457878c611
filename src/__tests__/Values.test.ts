import { describe, it, expect } from 'vitest';
import { CalendarDate } from '../values/CalendarDate.js';
import { Region, parseRegion, regionFromCode, regionName } from '../values/Region.js';
import { parseDecimal, parseInteger } from '../values/scalars.js';

describe('CalendarDate', () => {
  describe('of()', () => {
    it('should zero-pad month and day', () => {
      expect(CalendarDate.of(2024, 2, 8).toString()).toBe('2024-02-08');
    });

    it('should accept a leap day', () => {
      expect(CalendarDate.of(2024, 2, 29).toString()).toBe('2024-02-29');
    });

    it('should reject a day the month does not have', () => {
      expect(() => CalendarDate.of(2023, 2, 29)).toThrow(RangeError);
      expect(() => CalendarDate.of(2024, 4, 31)).toThrow(RangeError);
    });

    it('should reject month 13 and fractional parts', () => {
      expect(() => CalendarDate.of(2024, 13, 1)).toThrow(RangeError);
      expect(() => CalendarDate.of(2024.5, 1, 1)).toThrow(RangeError);
    });
  });

  describe('parse()', () => {
    it('should parse YYYY-MM-DD', () => {
      const date = CalendarDate.parse('2024-02-28');
      expect(date).not.toBeNull();
      expect(date?.year).toBe(2024);
      expect(date?.month).toBe(2);
      expect(date?.day).toBe(28);
    });

    it.each(['2024-2-28', '2023-02-29', '2024-02-28T00:00', '28-02-2024', ' 2024-02-28', ''])(
      'should reject %j',
      (text) => {
        expect(CalendarDate.parse(text)).toBeNull();
      }
    );
  });

  it('should compare by value', () => {
    const parsed = CalendarDate.parse('2024-01-01');
    expect(parsed !== null && CalendarDate.of(2024, 1, 1).equals(parsed)).toBe(true);
    expect(CalendarDate.of(2024, 1, 1).equals(CalendarDate.of(2024, 1, 2))).toBe(false);
  });

  it('should serialize to JSON as a date string', () => {
    expect(JSON.stringify({ date: CalendarDate.of(2024, 3, 1) })).toBe('{"date":"2024-03-01"}');
  });
});

describe('Region', () => {
  it('should map names to codes', () => {
    expect(parseRegion('Middle Africa')).toBe(Region.MiddleAfrica);
    expect(parseRegion('Caucasus and Central Asia')).toBe(13);
  });

  it('should map codes to names', () => {
    expect(regionName(Region.SoutheastAsia)).toBe('Southeast Asia');
    expect(regionFromCode(20)).toBe(Region.Antarctica);
  });

  it('should return null for unknown names and unassigned codes', () => {
    expect(parseRegion('MiddleAfrica')).toBeNull();
    expect(regionFromCode(6)).toBeNull();
  });

  it('should name every region', () => {
    const codes = Object.values(Region).filter((value): value is Region => typeof value === 'number');
    expect(codes).toHaveLength(17);
    for (const code of codes) {
      expect(parseRegion(regionName(code))).toBe(code);
    }
  });
});

describe('scalar parsers', () => {
  it('should parse unsigned integers strictly', () => {
    expect(parseInteger('1710025200')).toBe(1710025200);
    expect(parseInteger('0')).toBe(0);
    expect(parseInteger('12abc')).toBeNull();
    expect(parseInteger('-1')).toBeNull();
    expect(parseInteger('1.0')).toBeNull();
    expect(parseInteger('')).toBeNull();
    expect(parseInteger('99999999999999999999')).toBeNull();
  });

  it('should parse decimals strictly', () => {
    expect(parseDecimal('-12.5')).toBe(-12.5);
    expect(parseDecimal('3')).toBe(3);
    expect(parseDecimal('1.2e-3')).toBe(0.0012);
    expect(parseDecimal('.5')).toBe(0.5);
    expect(parseDecimal('')).toBeNull();
    expect(parseDecimal('NaN')).toBeNull();
    expect(parseDecimal('Infinity')).toBeNull();
    expect(parseDecimal('1,5')).toBeNull();
  });
});
