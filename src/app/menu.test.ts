import { describe, it, expect } from 'vitest';
import { parseWordCount } from './menu';

describe('parseWordCount', () => {
  it('accepts counts from 15 to 50', () => {
    expect(parseWordCount('15')).toBe(15);
    expect(parseWordCount('32')).toBe(32);
    expect(parseWordCount('50')).toBe(50);
  });

  it('rejects counts outside the range', () => {
    expect(parseWordCount('14')).toBeNull();
    expect(parseWordCount('51')).toBeNull();
    expect(parseWordCount('0')).toBeNull();
  });

  it('rejects anything that is not a plain number', () => {
    expect(parseWordCount('')).toBeNull();
    expect(parseWordCount('20 ')).toBeNull();
    expect(parseWordCount('-20')).toBeNull();
    expect(parseWordCount('2e1')).toBeNull();
    expect(parseWordCount('twenty')).toBeNull();
  });
});
