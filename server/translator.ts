import { ProviderCredentials, TranslationRequest } from './types.js';
import { TranslationError } from './errors.js';

/**
 * A remote text translation provider.
 *
 * Resolves with exactly one translated string per input text, in input order,
 * or rejects with a TranslationError. Partial results never reach the caller.
 */
export interface TranslationClient {
  translateBatch(request: TranslationRequest, credentials: ProviderCredentials): Promise<string[]>;
}

export interface DeepLClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

const FREE_API_URL = 'https://api-free.deepl.com';
const PRO_API_URL = 'https://api.deepl.com';

// Provider limit on texts per request
export const MAX_TEXTS_PER_REQUEST = 50;

interface DeepLResponse {
  translations: { text: string; detected_source_language?: string }[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

function isDeepLResponse(value: unknown): value is DeepLResponse {
  if (!isRecord(value) || !Array.isArray(value.translations)) return false;
  return value.translations.every((t: unknown) => isRecord(t) && typeof t.text === 'string');
}

export function endpointFor(authKey: string, baseUrl?: string): string {
  const base = baseUrl ?? (authKey.endsWith(':fx') ? FREE_API_URL : PRO_API_URL);
  return `${base.replace(/\/+$/, '')}/v2/translate`;
}

// DeepL wants upper-case codes; source languages take no regional variant.
export function toDeepLSource(lang?: string): string | undefined {
  const trimmed = lang?.trim();
  if (!trimmed) return undefined;
  return trimmed.split(/[-_]/)[0].toUpperCase();
}

export function toDeepLTarget(lang: string): string {
  return lang.trim().replace('_', '-').toUpperCase();
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

async function readProviderMessage(res: Response): Promise<string> {
  const body = await res.text().catch(() => '');
  const parsed = parseJson(body);
  if (isRecord(parsed) && typeof parsed.message === 'string') return parsed.message;
  return body || res.statusText || `HTTP ${res.status}`;
}

async function classifyResponse(res: Response): Promise<TranslationError> {
  const message = await readProviderMessage(res);
  switch (res.status) {
    case 401:
    case 403:
      return new TranslationError('AuthenticationFailed', 'DeepL rejected the API key', message, res.status);
    case 456:
      return new TranslationError('QuotaExceededRemote', 'DeepL character quota exceeded', message, res.status);
    case 429:
      return new TranslationError('ProviderError', 'DeepL rate limit hit', message, res.status, true);
    default:
      return new TranslationError(
        'ProviderError',
        `DeepL request failed: ${message}`,
        message,
        res.status,
        res.status >= 500
      );
  }
}

export class DeepLClient implements TranslationClient {
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(private readonly options: DeepLClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async translateBatch(request: TranslationRequest, credentials: ProviderCredentials): Promise<string[]> {
    const results: string[] = [];
    for (let offset = 0; offset < request.texts.length; offset += MAX_TEXTS_PER_REQUEST) {
      const chunk = request.texts.slice(offset, offset + MAX_TEXTS_PER_REQUEST);
      results.push(...(await this.submitWithRetry(chunk, request, credentials)));
    }
    return results;
  }

  private async submitWithRetry(
    texts: string[],
    request: TranslationRequest,
    credentials: ProviderCredentials
  ): Promise<string[]> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.submit(texts, request, credentials);
      } catch (err) {
        if (!(err instanceof TranslationError) || !err.retryable || attempt >= this.maxRetries) {
          throw err;
        }
        const delay = this.retryDelayMs * 2 ** attempt;
        console.warn(`[DeepL] ${err.message}; retry ${attempt + 1}/${this.maxRetries} in ${delay}ms`);
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  private async submit(
    texts: string[],
    request: TranslationRequest,
    credentials: ProviderCredentials
  ): Promise<string[]> {
    const sourceLang = toDeepLSource(request.sourceLang);
    const body = {
      text: texts,
      target_lang: toDeepLTarget(request.targetLang),
      ...(sourceLang ? { source_lang: sourceLang } : {})
    };

    let res: Response;
    try {
      res = await fetch(endpointFor(credentials.authKey, this.options.baseUrl), {
        method: 'POST',
        headers: {
          Authorization: `DeepL-Auth-Key ${credentials.authKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new TranslationError('TransportError', `Could not reach DeepL: ${detail}`, detail);
    }

    if (!res.ok) {
      throw await classifyResponse(res);
    }

    // The timeout signal still covers the body, so a stalled or reset stream lands here.
    let raw: string;
    try {
      raw = await res.text();
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new TranslationError('TransportError', `Lost connection to DeepL: ${detail}`, detail);
    }

    const payload = parseJson(raw);
    if (payload === undefined) {
      throw new TranslationError('ProviderError', 'DeepL returned an unreadable response', 'invalid JSON body', res.status);
    }

    if (!isDeepLResponse(payload)) {
      throw new TranslationError('ProviderError', 'DeepL response has no translations', 'unexpected body', res.status);
    }
    if (payload.translations.length !== texts.length) {
      const detail = `expected ${texts.length} translations, got ${payload.translations.length}`;
      throw new TranslationError('ProviderError', `DeepL ${detail}`, detail, res.status);
    }
    return payload.translations.map(t => t.text);
  }
}
