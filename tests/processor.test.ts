import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SessionEntry, outputFilename, processSave, processTranslate } from '../server/processor.js';
import { TranslationSession } from '../server/session.js';
import { API_KEY, MemoryConfigStore } from '../server/config.js';
import { TranslationError } from '../server/errors.js';
import type { TranslationClient } from '../server/translator.js';

const SAMPLE = '1\n00:00:01,000 --> 00:00:02,000\nGood morning\n\n';

describe('outputFilename', () => {
  it('should append the target language before the extension', () => {
    expect(outputFilename('movie.srt', 'DE')).toBe('movie.de.srt');
    expect(outputFilename('show.en.srt', 'ja')).toBe('show.en.ja.srt');
  });

  it('should sanitise names and supply defaults', () => {
    expect(outputFilename('My Movie.srt', 'fr')).toBe('My_Movie.fr.srt');
    expect(outputFilename('clip.SRT')).toBe('clip.srt');
    expect(outputFilename(undefined)).toBe('subtitles.srt');
  });

  it('should keep path separators in the target language out of the name', () => {
    expect(outputFilename('movie.srt', 'fr/../../x')).toBe('movie.fr_____x.srt');
    expect(outputFilename('movie.srt', 'pt_BR')).toBe('movie.pt_br.srt');
    expect(outputFilename('movie.srt', '..')).toBe('movie._.srt');
  });
});

describe('processor', () => {
  let dataDir: string;
  let client: TranslationClient;
  let entry: SessionEntry;
  const updateEntry = vi.fn();

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    updateEntry.mockReset();
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'srt-processor-'));
    client = { translateBatch: vi.fn(async () => ['Guten Morgen']) };
    const session = new TranslationSession({ client, config: new MemoryConfigStore({ [API_KEY]: 'test-secret' }) });
    session.load(SAMPLE);
    entry = { id: 'entry-1', session, createdAt: 0, originalFilename: 'morning.srt' };
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should record progress and success of a translation', async () => {
    await processTranslate(entry, 'en', 'de', updateEntry);

    expect(updateEntry).toHaveBeenNthCalledWith(1, 'entry-1', {
      message: 'Translating 1 cues to de...',
      error: undefined
    });
    expect(updateEntry).toHaveBeenNthCalledWith(2, 'entry-1', {
      message: 'Translated 12 characters',
      error: undefined
    });
  });

  it('should record a failed translation on the entry', async () => {
    client.translateBatch = vi.fn(async () => {
      throw new TranslationError('QuotaExceededRemote', 'DeepL character quota exceeded');
    });
    const session = new TranslationSession({ client, config: new MemoryConfigStore({ [API_KEY]: 'test-secret' }) });
    session.load(SAMPLE);
    entry = { ...entry, session };

    await processTranslate(entry, 'en', 'de', updateEntry);

    expect(updateEntry).toHaveBeenLastCalledWith('entry-1', {
      message: 'Translation failed',
      error: { kind: 'QuotaExceededRemote', message: 'DeepL character quota exceeded' }
    });
  });

  it('should write the translated file under the entry directory', async () => {
    await processTranslate(entry, 'en', 'de', updateEntry);

    const result = await processSave(entry, dataDir, updateEntry);

    expect(result).toEqual({ ok: true, value: 'morning.de.srt' });
    expect(fs.readFileSync(path.join(dataDir, 'entry-1', 'morning.de.srt'), 'utf-8')).toBe(
      '1\n00:00:01,000 --> 00:00:02,000\nGuten Morgen\n\n'
    );
    expect(updateEntry).toHaveBeenLastCalledWith('entry-1', {
      message: 'Saved morning.de.srt',
      savedFilename: 'morning.de.srt',
      error: undefined
    });
  });

  it('should keep the saved file inside the entry directory', async () => {
    client.translateBatch = vi.fn(async () => ['Bonjour']);
    const session = new TranslationSession({ client, config: new MemoryConfigStore({ [API_KEY]: 'test-secret' }) });
    session.load(SAMPLE);
    entry = { ...entry, session };
    await processTranslate(entry, 'en', 'fr/../../escaped', updateEntry);

    const result = await processSave(entry, dataDir, updateEntry);

    expect(result).toEqual({ ok: true, value: 'morning.fr_____escaped.srt' });
    expect(fs.readdirSync(path.join(dataDir, 'entry-1'))).toEqual(['morning.fr_____escaped.srt']);
    expect(fs.readdirSync(dataDir)).toEqual(['entry-1']);
  });

  it('should report a save that cannot be written', async () => {
    const blocker = path.join(dataDir, 'blocker');
    fs.writeFileSync(blocker, '');

    const result = await processSave(entry, blocker, updateEntry);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('IOFailure');
    expect(updateEntry).toHaveBeenLastCalledWith('entry-1', expect.objectContaining({ message: 'Save failed' }));
  });
});
