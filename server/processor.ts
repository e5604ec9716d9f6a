import fs from 'fs';
import path from 'path';
import { Result, SessionError, fail, ok } from './errors.js';
import { TranslationSession } from './session.js';

export interface SessionEntry {
  id: string;
  session: TranslationSession;
  createdAt: number;
  originalFilename?: string;
  savedFilename?: string;
  message?: string;
  error?: SessionError;
}

export type EntryUpdate = Partial<Omit<SessionEntry, 'id' | 'session'>>;
export type UpdateEntry = (id: string, partial: EntryUpdate) => void;

const sanitize = (name: string) => name.replace(/[^a-zA-Z0-9.-]/g, '_');

// "movie.en.srt" + "DE" -> "movie.en.de.srt"
export function outputFilename(originalFilename: string | undefined, targetLang?: string): string {
  const stem = sanitize(originalFilename || 'subtitles.srt').replace(/\.srt$/i, '') || 'subtitles';
  const suffix = targetLang ? sanitize(targetLang.toLowerCase()).replace(/\.+/g, '_') : '';
  return suffix ? `${stem}.${suffix}.srt` : `${stem}.srt`;
}

// Runs after the route has answered; every outcome ends up on the entry.
export const processTranslate = async (
  entry: SessionEntry,
  sourceLang: string | undefined,
  targetLang: string,
  updateEntry: UpdateEntry
) => {
  const cueCount = entry.session.snapshot().cueCount;
  updateEntry(entry.id, { message: `Translating ${cueCount} cues to ${targetLang}...`, error: undefined });

  const result = await entry.session.translate(sourceLang, targetLang);
  if (!result.ok) {
    console.error(`[Session ${entry.id}] Translation failed: ${result.error.kind}: ${result.error.message}`);
    updateEntry(entry.id, { message: 'Translation failed', error: result.error });
    return;
  }

  updateEntry(entry.id, {
    message: `Translated ${result.value.totalChars} characters`,
    error: undefined
  });
};

export const processSave = async (
  entry: SessionEntry,
  dataDir: string,
  updateEntry: UpdateEntry
): Promise<Result<string>> => {
  const filename = outputFilename(entry.originalFilename, entry.session.snapshot().targetLang);
  const entryDir = path.join(dataDir, entry.id);
  updateEntry(entry.id, { message: 'Saving subtitles...' });

  const result = await entry.session.save(async content => {
    await fs.promises.mkdir(entryDir, { recursive: true });
    await fs.promises.writeFile(path.join(entryDir, filename), content, 'utf-8');
  });

  if (!result.ok) {
    console.error(`[Session ${entry.id}] Save failed: ${result.error.message}`);
    updateEntry(entry.id, { message: 'Save failed', error: result.error });
    return fail(result.error);
  }

  updateEntry(entry.id, { message: `Saved ${filename}`, savedFilename: filename, error: undefined });
  return ok(filename);
};
