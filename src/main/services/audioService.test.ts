import { describe, expect, it } from '@jest/globals';
import { DEFAULT_PLANNER_CONFIG, planTimeline } from '../timeline/timelinePlanner';
import { groupPhrases, parseVerboseTranslation } from './audioService';

describe('parseVerboseTranslation', () => {
  it('keeps usable segments in order', () => {
    const result = parseVerboseTranslation({
      text: ' I studied for fourteen hours. ',
      language: 'english',
      segments: [
        { id: 0, start: 0, end: 2.5, text: ' I studied ' },
        { id: 1, start: 2.5, end: 2.5 },
        { id: 2, start: '2.5', end: 4, text: 'for fourteen hours.' },
        'noise',
      ],
    });

    expect(result).toEqual({
      text: 'I studied for fourteen hours.',
      language: 'en',
      segments: [
        { id: 0, start: 0, end: 2.5, text: 'I studied' },
        { id: 2, start: 2.5, end: 4, text: 'for fourteen hours.' },
      ],
    });
  });

  it('drops zero-length segments so the planner accepts the transcript', () => {
    const result = parseVerboseTranslation({
      text: 'The temple at sunrise. Thank you.',
      segments: [
        { id: 0, start: 0, end: 4, text: 'The temple at sunrise' },
        { id: 1, start: 29.98, end: 29.98, text: 'Thank you.' },
        { id: 2, start: 31, end: 30, text: 'Backwards' },
      ],
    });

    expect(result.segments).toEqual([
      { id: 0, start: 0, end: 4, text: 'The temple at sunrise' },
    ]);

    const events = planTimeline(
      result.segments.map((segment) => ({ ...segment, importance: 9 })),
      DEFAULT_PLANNER_CONFIG,
    );
    expect(events.map((event) => event.time)).toEqual([0]);
  });

  it('accepts a plain text body without segments', () => {
    expect(parseVerboseTranslation('Hello there\n')).toEqual({
      text: 'Hello there',
      language: 'en',
      segments: [],
    });
  });

  it('rejects bodies that are neither text nor objects', () => {
    expect(() => parseVerboseTranslation(42)).toThrow(
      'Translation response is not an object',
    );
  });
});

describe('groupPhrases', () => {
  it('closes a phrase at the start of the segment that overflows it', () => {
    const phrases = groupPhrases([
      { id: 0, start: 0, end: 2, text: 'a' },
      { id: 1, start: 2, end: 4, text: 'b' },
      { id: 2, start: 4, end: 6.5, text: 'c' },
      { id: 3, start: 6.5, end: 8, text: 'd' },
    ]);

    expect(phrases).toEqual([
      { text: 'a b', start: 0, end: 4, segmentIds: [0, 1] },
      { text: 'c d', start: 4, end: 8, segmentIds: [2, 3] },
    ]);
  });

  it('keeps a single long segment as its own phrase', () => {
    expect(groupPhrases([{ id: 7, start: 10, end: 17, text: 'long' }], 5)).toEqual([
      { text: 'long', start: 10, end: 17, segmentIds: [7] },
    ]);
  });

  it('returns nothing for no segments', () => {
    expect(groupPhrases([])).toEqual([]);
  });
});
