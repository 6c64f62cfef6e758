import { describe, expect, it } from '@jest/globals';
import { readFiniteNumber, readString, safeJsonParse } from './safeJsonParse';

describe('safeJsonParse', () => {
  it('parses plain JSON', () => {
    expect(safeJsonParse('{"a":1}')).toEqual({ a: 1 });
  });

  it('strips a markdown fence around a model reply', () => {
    const reply = '```json\n{"importance_score": 7}\n```';
    expect(safeJsonParse(reply)).toEqual({ importance_score: 7 });
  });

  it('recovers the first object when two were concatenated', () => {
    expect(safeJsonParse('{"a":"}"}{"b":2}')).toEqual({ a: '}' });
  });

  it('throws on empty or non-JSON content', () => {
    expect(() => safeJsonParse('   ')).toThrow(SyntaxError);
    expect(() => safeJsonParse('hello')).toThrow(SyntaxError);
  });

  it('reads numbers and strings defensively', () => {
    expect(readFiniteNumber('8')).toBe(8);
    expect(readFiniteNumber('eight')).toBeNull();
    expect(readFiniteNumber(Number.NaN)).toBeNull();
    expect(readString('  hi ')).toBe('hi');
    expect(readString('   ')).toBeNull();
    expect(readString(3)).toBeNull();
  });
});
