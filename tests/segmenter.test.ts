/**
 * Segmenter Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { ensureClosed, isClosed, joinContinuation, splitSegments } from '../src/services/router/segmenter.js';

describe('splitSegments', () => {
  it('should split on sentence terminators followed by whitespace', () => {
    const segments = splitSegments('First idea. Second idea! Third?');

    expect(segments.map((s) => s.text)).toEqual(['First idea.', 'Second idea!', 'Third?']);
    expect(segments.every((s) => s.complete)).toBe(true);
  });

  it('should not split inside decimal numbers', () => {
    const segments = splitSegments('Price is 3.5 today. Next');

    expect(segments.map((s) => s.text)).toEqual(['Price is 3.5 today.', 'Next']);
    expect(segments[1]?.complete).toBe(false);
  });

  it('should treat a newline as a boundary', () => {
    const segments = splitSegments('Line one\nLine two');

    expect(segments.map((s) => s.text)).toEqual(['Line one', 'Line two']);
    expect(segments[0]?.complete).toBe(true);
    expect(segments[1]?.complete).toBe(false);
  });

  it('should keep closing quotes with their sentence', () => {
    const segments = splitSegments('He said "stop." Then left.');

    expect(segments.map((s) => s.text)).toEqual(['He said "stop."', 'Then left.']);
  });

  it('should report offsets into the original text', () => {
    const segments = splitSegments('A b. C d.');

    expect(segments[0]).toMatchObject({ start: 0, end: 5, raw: 'A b. ' });
    expect(segments[1]).toMatchObject({ start: 5, end: 9, raw: 'C d.' });
  });

  it('should return nothing for blank text', () => {
    expect(splitSegments('   \n  ')).toEqual([]);
  });
});

describe('ensureClosed', () => {
  it('should drop a dangling connective and add a period', () => {
    expect(ensureClosed('We should buy because')).toBe('We should buy.');
  });

  it('should strip trailing punctuation left by a removed connective', () => {
    expect(ensureClosed('Risk is elevated, and')).toBe('Risk is elevated.');
  });

  it('should leave closed sentences untouched', () => {
    expect(ensureClosed('Done.')).toBe('Done.');
  });

  it('should return an empty string for blank input', () => {
    expect(ensureClosed('  ')).toBe('');
  });
});

describe('isClosed', () => {
  it('should accept terminators followed by closers', () => {
    expect(isClosed('Yes!)')).toBe(true);
    expect(isClosed('Not yet')).toBe(false);
  });
});

describe('joinContinuation', () => {
  it('should insert a single space only when neither side has one', () => {
    expect(joinContinuation('Hello.', 'World')).toBe('Hello. World');
    expect(joinContinuation('Hello. ', 'World')).toBe('Hello. World');
    expect(joinContinuation('', 'World')).toBe('World');
  });
});
