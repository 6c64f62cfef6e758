import { describe, expect, it } from '@jest/globals';
import { imageFileName } from './imageGenerator';

describe('imageFileName', () => {
  it('slugifies event names', () => {
    expect(imageFileName('Event 3 @ 12.5s')).toBe('event_3_12_5s.png');
    expect(imageFileName('***')).toBe('image.png');
  });
});
