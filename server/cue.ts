import { Cue, CueDocument, Timestamp } from './types.js';
import { SubtitleParseError } from './errors.js';

export function toMilliseconds(ts: Timestamp): number {
  return ((ts.hours * 60 + ts.minutes) * 60 + ts.seconds) * 1000 + ts.milliseconds;
}

export function fromMilliseconds(total: number): Timestamp {
  const ms = Math.max(0, Math.round(total));
  return {
    hours: Math.floor(ms / 3_600_000),
    minutes: Math.floor(ms / 60_000) % 60,
    seconds: Math.floor(ms / 1000) % 60,
    milliseconds: ms % 1000
  };
}

// Field by field: hours may exceed what fits in a millisecond total.
export function compareTimestamps(a: Timestamp, b: Timestamp): number {
  return (
    Math.sign(a.hours - b.hours) ||
    Math.sign(a.minutes - b.minutes) ||
    Math.sign(a.seconds - b.seconds) ||
    Math.sign(a.milliseconds - b.milliseconds)
  );
}

const inRange = (value: number, max: number) => Number.isInteger(value) && value >= 0 && value <= max;

function checkTimestamp(ts: Timestamp, label: string, line?: number) {
  if (!inRange(ts.hours, Number.MAX_SAFE_INTEGER)) {
    throw new SubtitleParseError('InvalidTimestamp', `${label} hours out of range: ${ts.hours}`, line);
  }
  if (!inRange(ts.minutes, 59)) {
    throw new SubtitleParseError('InvalidTimestamp', `${label} minutes out of range: ${ts.minutes}`, line);
  }
  if (!inRange(ts.seconds, 59)) {
    throw new SubtitleParseError('InvalidTimestamp', `${label} seconds out of range: ${ts.seconds}`, line);
  }
  if (!inRange(ts.milliseconds, 999)) {
    throw new SubtitleParseError('InvalidTimestamp', `${label} milliseconds out of range: ${ts.milliseconds}`, line);
  }
}

/**
 * Throws a SubtitleParseError of kind InvalidTimestamp when a field is out of
 * range or the cue ends before it starts.
 */
export function validateCue(cue: Cue, line?: number): void {
  checkTimestamp(cue.start, 'start', line);
  checkTimestamp(cue.end, 'end', line);
  if (compareTimestamps(cue.start, cue.end) > 0) {
    throw new SubtitleParseError('InvalidTimestamp', `Cue ${cue.index} ends before it starts`, line);
  }
}

// Code points, not UTF-16 units or bytes.
export function countChars(text: string): number {
  return Array.from(text).length;
}

export function totalChars(document: CueDocument): number {
  return document.reduce((sum, cue) => sum + countChars(cue.text), 0);
}

export function cloneCue(cue: Cue): Cue {
  return { index: cue.index, start: { ...cue.start }, end: { ...cue.end }, text: cue.text };
}
