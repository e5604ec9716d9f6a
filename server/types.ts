export interface Timestamp {
  hours: number;
  minutes: number;
  seconds: number;
  milliseconds: number;
}

export interface Cue {
  readonly index: number; // 1-based, positional
  readonly start: Timestamp;
  readonly end: Timestamp;
  text: string;
}

export type CueDocument = Cue[];

export type QuotaVerdict = 'Empty' | 'Ok' | 'Exceeded';

export interface QuotaStatus {
  totalChars: number;
  limit: number;
  verdict: QuotaVerdict;
}

export interface TranslationRequest {
  texts: string[];
  sourceLang?: string;
  targetLang: string;
}

export interface ProviderCredentials {
  authKey: string;
}

export type SessionState = 'idle' | 'loaded' | 'translating' | 'saving';

export interface SessionSnapshot {
  state: SessionState;
  cueCount: number;
  quota: QuotaStatus | null;
  translated: boolean;
  sourceLang?: string;
  targetLang?: string;
  savedAt?: number;
}

export interface CueView {
  index: number;
  start: string; // "00:00:01,000"
  end: string;
  text: string;
}
