import { describe, expect, it } from 'vitest';

import { humanBytes, percent, pickInt, pickNumber } from '../utils.js';

describe('humanBytes', () => {
  it('scales by 1024 with one decimal', () => {
    expect(humanBytes(0)).toBe('0.0B');
    expect(humanBytes(1023)).toBe('1023.0B');
    expect(humanBytes(1536)).toBe('1.5KB');
    expect(humanBytes(2 * 1024 ** 3)).toBe('2.0GB');
    expect(humanBytes(1024 ** 6)).toBe('1.0EB');
  });
});

describe('number helpers', () => {
  it('picks finite numbers from strings', () => {
    expect(pickNumber('12.5')).toBe(12.5);
    expect(pickNumber('')).toBeNull();
    expect(pickNumber('abc')).toBeNull();
    expect(pickNumber(undefined)).toBeNull();
  });

  it('clamps integers and falls back on junk', () => {
    expect(pickInt('7', 10, { min: 1, max: 100 })).toBe(7);
    expect(pickInt('500', 10, { min: 1, max: 100 })).toBe(100);
    expect(pickInt('0', 10, { min: 1 })).toBe(1);
    expect(pickInt('many', 10)).toBe(10);
  });

  it('rounds percentages to one decimal', () => {
    expect(percent(1, 3)).toBe(33.3);
    expect(percent(5, 0)).toBe(0);
  });
});
