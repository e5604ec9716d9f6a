import { Cue, CueDocument, CueView, Timestamp } from './types.js';
import { SubtitleParseError } from './errors.js';
import { validateCue } from './cue.js';

// HH:MM:SS,mmm; hours may run past two digits, "." is accepted for the comma
const TIMESTAMP_PATTERN = /^(\d+):(\d{2}):(\d{2})[,.](\d{3})$/;

const pad = (value: number, width: number) => String(value).padStart(width, '0');

const isBlank = (line: string) => line.trim() === '';

// Convert a timestamp to SRT format: 00:00:00,000
export function formatSrtTime(ts: Timestamp): string {
  return `${pad(ts.hours, 2)}:${pad(ts.minutes, 2)}:${pad(ts.seconds, 2)},${pad(ts.milliseconds, 3)}`;
}

export function parseSrtTime(value: string, line?: number): Timestamp {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    throw new SubtitleParseError('MalformedSubtitle', `Invalid timestamp "${value.trim()}"`, line);
  }
  return {
    hours: parseInt(match[1], 10),
    minutes: parseInt(match[2], 10),
    seconds: parseInt(match[3], 10),
    milliseconds: parseInt(match[4], 10)
  };
}

function parseBlock(block: string[], firstLine: number, position: number): Cue {
  // Line 0: index (validated, not used for addressing)
  // Line 1: "00:00:01,000 --> 00:00:03,000", optionally followed by X1/Y1 coordinates
  // Line 2+: text
  const indexLine = block[0].trim();
  if (!/^\d+$/.test(indexLine) || parseInt(indexLine, 10) < 1) {
    throw new SubtitleParseError('MalformedSubtitle', `Expected a positive cue index, got "${indexLine}"`, firstLine);
  }

  const timingLineNo = firstLine + 1;
  const timeLine = block[1];
  if (timeLine === undefined || !timeLine.includes('-->')) {
    throw new SubtitleParseError('MalformedSubtitle', `Cue ${indexLine} is missing its timestamp line`, timingLineNo);
  }

  const arrow = timeLine.indexOf('-->');
  const startPart = timeLine.slice(0, arrow).trim();
  const endPart = timeLine.slice(arrow + 3).trim().split(/\s+/)[0];
  if (!startPart || !endPart) {
    throw new SubtitleParseError('MalformedSubtitle', `Cannot split "${timeLine.trim()}" into start and end`, timingLineNo);
  }

  const cue: Cue = {
    index: position,
    start: parseSrtTime(startPart, timingLineNo),
    end: parseSrtTime(endPart, timingLineNo),
    text: block.slice(2).join('\n')
  };
  validateCue(cue, timingLineNo);
  return cue;
}

// Parse SRT text into a cue document, keeping source order
export function parseSrt(srtContent: string): CueDocument {
  let normalized = srtContent.replace(/\r\n?/g, '\n');
  if (normalized.charCodeAt(0) === 0xfeff) {
    normalized = normalized.slice(1);
  }
  const lines = normalized.split('\n');
  const cues: CueDocument = [];

  let i = 0;
  while (i < lines.length) {
    if (isBlank(lines[i])) {
      i++;
      continue;
    }
    const firstLine = i + 1;
    const block: string[] = [];
    while (i < lines.length && !isBlank(lines[i])) {
      block.push(lines[i]);
      i++;
    }
    cues.push(parseBlock(block, firstLine, cues.length + 1));
  }
  return cues;
}

// A blank line inside cue text would end the block early on the next parse.
function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .filter(line => !isBlank(line))
    .join('\n');
}

// Rebuild SRT content, renumbering cues 1..N
export function buildSrt(cues: CueDocument): string {
  return cues.map((cue, index) => {
    validateCue(cue);
    return `${index + 1}\n${formatSrtTime(cue.start)} --> ${formatSrtTime(cue.end)}\n${normalizeText(cue.text)}\n\n`;
  }).join('');
}

export function toCueView(cue: Cue): CueView {
  return {
    index: cue.index,
    start: formatSrtTime(cue.start),
    end: formatSrtTime(cue.end),
    text: cue.text
  };
}
