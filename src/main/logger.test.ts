import { describe, expect, it } from '@jest/globals';
import { formatDuration } from './logger';

describe('formatDuration', () => {
  it('picks a unit by magnitude', () => {
    expect(formatDuration(850)).toBe('850ms');
    expect(formatDuration(12340)).toBe('12.3s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});
