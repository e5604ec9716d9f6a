import { describe, it, expect } from 'vitest';
import {
  compareTimestamps,
  countChars,
  fromMilliseconds,
  toMilliseconds,
  totalChars,
  validateCue
} from '../server/cue.js';
import { SubtitleParseError } from '../server/errors.js';
import type { Cue, Timestamp } from '../server/types.js';

const ts = (hours: number, minutes: number, seconds: number, milliseconds: number): Timestamp => ({
  hours,
  minutes,
  seconds,
  milliseconds
});

const cue = (start: Timestamp, end: Timestamp, text = 'text'): Cue => ({ index: 1, start, end, text });

describe('Cue model', () => {
  describe('toMilliseconds / fromMilliseconds', () => {
    it('should convert timestamps to milliseconds since zero', () => {
      expect(toMilliseconds(ts(0, 0, 1, 0))).toBe(1000);
      expect(toMilliseconds(ts(1, 2, 3, 4))).toBe(3_723_004);
      expect(toMilliseconds(ts(100, 0, 0, 0))).toBe(360_000_000);
    });

    it('should split milliseconds back into fields', () => {
      expect(fromMilliseconds(3_723_004)).toEqual(ts(1, 2, 3, 4));
      expect(fromMilliseconds(0)).toEqual(ts(0, 0, 0, 0));
    });

    it('should clamp negative values to zero', () => {
      expect(fromMilliseconds(-50)).toEqual(ts(0, 0, 0, 0));
    });
  });

  describe('compareTimestamps', () => {
    it('should order field by field', () => {
      expect(compareTimestamps(ts(0, 0, 2, 0), ts(0, 0, 1, 999))).toBe(1);
      expect(compareTimestamps(ts(0, 1, 0, 0), ts(0, 1, 0, 0))).toBe(0);
      expect(compareTimestamps(ts(0, 0, 0, 1), ts(1, 0, 0, 0))).toBe(-1);
    });

    it('should stay exact for very large hour values', () => {
      expect(compareTimestamps(ts(3e9, 0, 0, 1), ts(3e9, 0, 0, 0))).toBe(1);
      expect(compareTimestamps(ts(Number.MAX_SAFE_INTEGER, 0, 0, 0), ts(Number.MAX_SAFE_INTEGER - 1, 59, 59, 999))).toBe(1);
    });
  });

  describe('validateCue', () => {
    it('should accept a cue whose start equals its end', () => {
      expect(() => validateCue(cue(ts(0, 0, 1, 0), ts(0, 0, 1, 0)))).not.toThrow();
    });

    it('should reject a backwards cue at very large hour values', () => {
      expect(() => validateCue(cue(ts(3e9, 0, 0, 1), ts(3e9, 0, 0, 0)))).toThrow('Cue 1 ends before it starts');
    });

    it('should reject a cue that ends before it starts', () => {
      try {
        validateCue(cue(ts(0, 0, 2, 0), ts(0, 0, 1, 0)), 7);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(SubtitleParseError);
        expect(err).toMatchObject({ kind: 'InvalidTimestamp', line: 7 });
      }
    });

    it('should reject out-of-range fields', () => {
      expect(() => validateCue(cue(ts(0, 60, 0, 0), ts(1, 0, 0, 0)))).toThrow('start minutes out of range: 60');
      expect(() => validateCue(cue(ts(0, 0, 0, 0), ts(0, 0, 60, 0)))).toThrow('end seconds out of range: 60');
      expect(() => validateCue(cue(ts(0, 0, 0, 1000), ts(0, 0, 5, 0)))).toThrow('start milliseconds out of range: 1000');
      expect(() => validateCue(cue(ts(-1, 0, 0, 0), ts(0, 0, 5, 0)))).toThrow('start hours out of range: -1');
    });

    it('should allow hours beyond 99', () => {
      expect(() => validateCue(cue(ts(120, 0, 0, 0), ts(120, 0, 1, 0)))).not.toThrow();
    });
  });

  describe('countChars / totalChars', () => {
    it('should count code points rather than UTF-16 units or bytes', () => {
      expect(countChars('Hello')).toBe(5);
      expect(countChars('héllo')).toBe(5);
      expect(countChars('😀')).toBe(1);
      expect(countChars('こんにちは')).toBe(5);
      expect(countChars('')).toBe(0);
    });

    it('should sum every cue text, newlines included', () => {
      const document = [
        cue(ts(0, 0, 1, 0), ts(0, 0, 2, 0), 'Hello'),
        cue(ts(0, 0, 3, 0), ts(0, 0, 4, 0), 'a\nb')
      ];
      expect(totalChars(document)).toBe(8);
      expect(totalChars([])).toBe(0);
    });
  });
});
