import { CueDocument, QuotaStatus } from './types.js';
import { totalChars } from './cue.js';

// DeepL API Free monthly character allowance
export const DEFAULT_CHAR_LIMIT = 500_000;

export function classifyQuota(document: CueDocument, limit: number = DEFAULT_CHAR_LIMIT): QuotaStatus {
  const count = totalChars(document);
  if (count === 0) return { totalChars: 0, limit, verdict: 'Empty' };
  return { totalChars: count, limit, verdict: count > limit ? 'Exceeded' : 'Ok' };
}
