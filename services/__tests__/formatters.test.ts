import { describe, it, expect } from 'vitest';
import { formatInr, formatInrCompact, formatKwh, formatNumber } from '../formatters';

describe('formatters', () => {
  it('formats whole numbers with thousands separators', () => {
    expect(formatNumber(1109143.75)).toBe('1,109,144');
    expect(formatNumber(467.5, 1)).toBe('467.5');
    expect(formatNumber(2, 2)).toBe('2.00');
  });

  it('groups thousands the same way with decimals', () => {
    expect(formatNumber(1234.56, 1)).toBe('1,234.6');
    expect(formatNumber(1109143.75, 2)).toBe('1,109,143.75');
  });

  it('prefixes rupees and kWh', () => {
    expect(formatInr(1234.4)).toBe('₹1,234');
    expect(formatInr(-5)).toBe('₹-5');
    expect(formatKwh(170637.5)).toBe('170,638 kWh');
  });

  it('abbreviates axis values', () => {
    expect(formatInrCompact(2_400_000)).toBe('₹2.4M');
    expect(formatInrCompact(850_000)).toBe('₹850K');
    expect(formatInrCompact(-9_986_293.75)).toBe('-₹10.0M');
    expect(formatInrCompact(420)).toBe('₹420');
  });
});
