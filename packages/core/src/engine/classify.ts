// packages/core/src/engine/classify.ts — Remote error classification

import { HTTP_TOO_MANY_REQUESTS } from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';

export type ErrorKind = 'rate-limit' | 'other';

function statusCodeOf(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  if ('code' in error && typeof error.code === 'number') return error.code;
  if ('response' in error && error.response && typeof error.response === 'object') {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') return response.status;
  }
  return undefined;
}

/**
 * Decide whether a failed model call was rate limited.
 *
 * Heuristic: a 429 status on the error, or "429" / "quota" (any case) in its
 * message. Provider messages are not a stable contract, so this is the one
 * place to change when they drift.
 */
export function classifyError(error: unknown): ErrorKind {
  if (statusCodeOf(error) === HTTP_TOO_MANY_REQUESTS) return 'rate-limit';
  const message = errorMessage(error);
  if (message.includes(String(HTTP_TOO_MANY_REQUESTS)) || /quota/i.test(message)) {
    return 'rate-limit';
  }
  return 'other';
}
