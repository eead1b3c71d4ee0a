import { describe, it, expect } from 'vitest';
import {
  parseDuration,
  formatDuration,
  formatNumber,
  formatPercent,
  parseNumeric,
} from '../utils/parser.js';

describe('parseDuration', () => {
  it('should return the number directly when given a number', () => {
    expect(parseDuration(5000)).toBe(5000);
    expect(parseDuration(0)).toBe(0);
  });

  it('should parse seconds', () => {
    expect(parseDuration('5s')).toBe(5000);
    expect(parseDuration('30s')).toBe(30000);
  });

  it('should parse milliseconds', () => {
    expect(parseDuration('1500ms')).toBe(1500);
  });

  it('should parse minutes', () => {
    expect(parseDuration('1m')).toBe(60000);
  });

  it('should throw on an invalid duration string', () => {
    expect(() => parseDuration('soon')).toThrow('Invalid duration string: "soon"');
  });
});

describe('formatDuration', () => {
  it('should format values below a second as milliseconds', () => {
    expect(formatDuration(250)).toBe('250ms');
  });

  it('should format seconds', () => {
    expect(formatDuration(5000)).toBe('5s');
  });

  it('should format minutes', () => {
    expect(formatDuration(120000)).toBe('2m');
  });

  it('should format hours', () => {
    expect(formatDuration(7_200_000)).toBe('2h');
  });
});

describe('formatNumber', () => {
  it('should keep integers as they are', () => {
    expect(formatNumber(85)).toBe('85');
    expect(formatNumber(0)).toBe('0');
  });

  it('should round to two decimals', () => {
    expect(formatNumber(33.3333)).toBe('33.33');
    expect(formatNumber(66.666)).toBe('66.67');
  });

  it('should drop trailing zeros', () => {
    expect(formatNumber(12.5)).toBe('12.5');
  });
});

describe('formatPercent', () => {
  it('should always show two decimals', () => {
    expect(formatPercent(85)).toBe('85.00%');
    expect(formatPercent(12.346)).toBe('12.35%');
  });
});

describe('parseNumeric', () => {
  it('should accept finite numbers', () => {
    expect(parseNumeric(42)).toBe(42);
  });

  it('should reject non-finite numbers', () => {
    expect(parseNumeric(Number.NaN)).toBeUndefined();
    expect(parseNumeric(Number.POSITIVE_INFINITY)).toBeUndefined();
  });

  it('should parse numeric strings', () => {
    expect(parseNumeric('17')).toBe(17);
    expect(parseNumeric(' 3.5 ')).toBe(3.5);
  });

  it('should reject empty and non-numeric strings', () => {
    expect(parseNumeric('')).toBeUndefined();
    expect(parseNumeric('   ')).toBeUndefined();
    expect(parseNumeric('ge-0/0/1')).toBeUndefined();
  });
});
