import {
  CueDocument,
  QuotaStatus,
  SessionSnapshot,
  SessionState,
  TranslationRequest
} from './types.js';
import {
  Result,
  SessionError,
  SubtitleParseError,
  TranslationError,
  fail,
  fromSubtitleError,
  fromTranslationError,
  ok
} from './errors.js';
import { API_KEY, ConfigStore } from './config.js';
import { DEFAULT_CHAR_LIMIT, classifyQuota } from './quota.js';
import { TranslationClient } from './translator.js';
import { buildSrt, parseSrt } from './utils.js';
import { cloneCue } from './cue.js';

export interface SessionOptions {
  client: TranslationClient;
  config: ConfigStore;
  charLimit?: number;
}

const codecError = (err: unknown): SessionError => {
  if (err instanceof SubtitleParseError) return fromSubtitleError(err);
  throw err;
};

/**
 * Owns one subtitle document through load, translate and save.
 *
 * idle -> loaded -> translating -> loaded, with saving as a transient
 * sub-state of loaded. Not safe for overlapping calls: translate or save
 * while another is outstanding fails with SessionBusy.
 */
export class TranslationSession {
  private document: CueDocument | null = null;
  private quota: QuotaStatus | null = null;
  private current: SessionState = 'idle';
  private translated = false;
  private sourceLang?: string;
  private targetLang?: string;
  private savedAt?: number;
  private readonly charLimit: number;

  constructor(private readonly options: SessionOptions) {
    this.charLimit = options.charLimit ?? DEFAULT_CHAR_LIMIT;
  }

  get state(): SessionState {
    return this.current;
  }

  getDocument(): CueDocument | null {
    return this.document ? this.document.map(cloneCue) : null;
  }

  getQuota(): QuotaStatus | null {
    return this.quota ? { ...this.quota } : null;
  }

  snapshot(): SessionSnapshot {
    return {
      state: this.current,
      cueCount: this.document?.length ?? 0,
      quota: this.getQuota(),
      translated: this.translated,
      sourceLang: this.sourceLang,
      targetLang: this.targetLang,
      savedAt: this.savedAt
    };
  }

  load(raw: string): Result<QuotaStatus> {
    if (this.isBusy()) return fail(this.busyError());

    let parsed: CueDocument;
    try {
      parsed = parseSrt(raw);
    } catch (err) {
      this.reset();
      return fail(codecError(err));
    }

    this.reset();
    const quota = classifyQuota(parsed, this.charLimit);
    this.document = parsed;
    this.quota = quota;
    this.current = 'loaded';
    return ok(quota);
  }

  /** First precondition translate() would fail on, or null. */
  checkTranslate(sourceLang: string | undefined, targetLang: string): SessionError | null {
    if (this.isBusy()) return this.busyError();
    if (!this.document) {
      return { kind: 'NoDocument', message: 'No subtitle file is loaded' };
    }
    if (!this.credential()) {
      return { kind: 'MissingCredential', message: 'No DeepL API key is configured' };
    }

    // Re-run at call time, not only at load time.
    const quota = classifyQuota(this.document, this.charLimit);
    if (quota.verdict === 'Empty') {
      return { kind: 'EmptyDocument', message: 'The subtitle file has no text to translate' };
    }
    if (quota.verdict === 'Exceeded') {
      return {
        kind: 'QuotaExceeded',
        message: `${quota.totalChars} characters exceeds the limit of ${quota.limit}`,
        totalChars: quota.totalChars,
        limit: quota.limit
      };
    }

    if (!targetLang.trim()) {
      return { kind: 'MissingTargetLanguage', message: 'A target language is required' };
    }
    return null;
  }

  async translate(sourceLang: string | undefined, targetLang: string): Promise<Result<QuotaStatus>> {
    const blocked = this.checkTranslate(sourceLang, targetLang);
    if (blocked) return fail(blocked);

    const document = this.document;
    const authKey = this.credential();
    if (!document) return fail({ kind: 'NoDocument', message: 'No subtitle file is loaded' });
    if (!authKey) return fail({ kind: 'MissingCredential', message: 'No DeepL API key is configured' });

    const source = sourceLang?.trim() || undefined;
    const target = targetLang.trim();
    const request: TranslationRequest = {
      texts: document.map(cue => cue.text),
      sourceLang: source,
      targetLang: target
    };

    this.current = 'translating';
    let texts: string[];
    try {
      texts = await this.options.client.translateBatch(request, { authKey });
    } catch (err) {
      return fail(this.remoteError(err));
    } finally {
      this.current = 'loaded';
    }

    if (texts.length !== request.texts.length) {
      const detail = `expected ${request.texts.length} translations, got ${texts.length}`;
      return fail({ kind: 'ProviderError', message: `Provider returned ${texts.length} texts`, detail });
    }

    texts.forEach((text, i) => {
      document[i].text = text;
    });
    this.translated = true;
    this.sourceLang = source;
    this.targetLang = target;
    const quota = classifyQuota(document, this.charLimit);
    this.quota = quota;
    console.log(`[Session] Translated ${texts.length} cues to ${target}`);
    return ok(quota);
  }

  serialize(): Result<string> {
    if (!this.document) {
      return fail({ kind: 'NoDocument', message: 'No subtitle file is loaded' });
    }
    try {
      return ok(buildSrt(this.document));
    } catch (err) {
      return fail(codecError(err));
    }
  }

  /** Serializes and hands the text to the caller's writer while in the saving state. */
  async save(write: (content: string) => Promise<void>): Promise<Result<string>> {
    if (this.isBusy()) return fail(this.busyError());
    const serialized = this.serialize();
    if (!serialized.ok) return serialized;

    this.current = 'saving';
    try {
      await write(serialized.value);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return fail({ kind: 'IOFailure', message: `Could not write subtitles: ${message}` });
    } finally {
      this.current = 'loaded';
    }
    this.savedAt = Date.now();
    return serialized;
  }

  private credential(): string | undefined {
    return this.options.config.get(API_KEY)?.trim() || undefined;
  }

  private isBusy() {
    return this.current === 'translating' || this.current === 'saving';
  }

  private busyError(): SessionError {
    return { kind: 'SessionBusy', message: `Session is ${this.current}` };
  }

  private remoteError(err: unknown): SessionError {
    if (err instanceof TranslationError) return fromTranslationError(err);
    const detail = err instanceof Error ? err.message : String(err);
    return { kind: 'ProviderError', message: `Translation failed: ${detail}`, detail };
  }

  private reset() {
    this.document = null;
    this.quota = null;
    this.current = 'idle';
    this.translated = false;
    this.sourceLang = undefined;
    this.targetLang = undefined;
    this.savedAt = undefined;
  }
}
