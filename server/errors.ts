export type SessionError =
  | { kind: 'MalformedSubtitle'; message: string; line: number }
  | { kind: 'InvalidTimestamp'; message: string; line?: number }
  | { kind: 'NoDocument'; message: string }
  | { kind: 'EmptyDocument'; message: string }
  | { kind: 'MissingCredential'; message: string }
  | { kind: 'MissingTargetLanguage'; message: string }
  | { kind: 'QuotaExceeded'; message: string; totalChars: number; limit: number }
  | { kind: 'QuotaExceededRemote'; message: string }
  | { kind: 'AuthenticationFailed'; message: string }
  | { kind: 'ProviderError'; message: string; detail: string; status?: number }
  | { kind: 'TransportError'; message: string }
  | { kind: 'SessionBusy'; message: string }
  | { kind: 'IOFailure'; message: string };

export type SessionErrorKind = SessionError['kind'];

export type IOFailure = Extract<SessionError, { kind: 'IOFailure' }>;

export type Result<T, E = SessionError> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const fail = <E extends SessionError>(error: E): { ok: false; error: E } => ({ ok: false, error });

export type SubtitleErrorKind = 'MalformedSubtitle' | 'InvalidTimestamp';

// Thrown by the codec and cue validation; the session turns it into a SessionError.
export class SubtitleParseError extends Error {
  constructor(
    public readonly kind: SubtitleErrorKind,
    message: string,
    public readonly line?: number
  ) {
    super(line !== undefined ? `${message} (line ${line})` : message);
    this.name = 'SubtitleParseError';
  }
}

export type TranslationErrorCode =
  | 'QuotaExceededRemote'
  | 'AuthenticationFailed'
  | 'ProviderError'
  | 'TransportError';

export class TranslationError extends Error {
  constructor(
    public readonly code: TranslationErrorCode,
    message: string,
    public readonly detail: string = message,
    public readonly status?: number,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'TranslationError';
  }
}

export const fromSubtitleError = (err: SubtitleParseError): SessionError =>
  err.kind === 'MalformedSubtitle'
    ? { kind: 'MalformedSubtitle', message: err.message, line: err.line ?? 0 }
    : { kind: 'InvalidTimestamp', message: err.message, line: err.line };

export const fromTranslationError = (err: TranslationError): SessionError => {
  switch (err.code) {
    case 'ProviderError':
      return { kind: 'ProviderError', message: err.message, detail: err.detail, status: err.status };
    case 'QuotaExceededRemote':
      return { kind: 'QuotaExceededRemote', message: err.message };
    case 'AuthenticationFailed':
      return { kind: 'AuthenticationFailed', message: err.message };
    case 'TransportError':
      return { kind: 'TransportError', message: err.message };
  }
};

// HTTP status used by the Express layer for each error kind.
export const HTTP_STATUS: Record<SessionErrorKind, number> = {
  MalformedSubtitle: 400,
  InvalidTimestamp: 400,
  NoDocument: 409,
  EmptyDocument: 400,
  MissingCredential: 412,
  MissingTargetLanguage: 400,
  QuotaExceeded: 413,
  QuotaExceededRemote: 429,
  AuthenticationFailed: 401,
  ProviderError: 502,
  TransportError: 504,
  SessionBusy: 409,
  IOFailure: 500
};
