// packages/core/src/utils/constants.ts — Shared magic number constants

/** Default cap on document characters sent to the model */
export const DEFAULT_MAX_CHARS = 50_000;

/** Appended to a document cut at the character cap */
export const TRUNCATION_MARKER = '\n\n[Document truncated...]';

/** Default number of remote calls per analysis */
export const DEFAULT_MAX_ATTEMPTS = 3;

/** Upper bound accepted for retry.maxAttempts */
export const MAX_ATTEMPTS_LIMIT = 10;

/** Linear backoff base in seconds */
export const DEFAULT_BACKOFF_BASE_SEC = 60;

/** Default Gemini model */
export const DEFAULT_MODEL = 'gemini-2.0-flash';

/** Environment variable holding the Gemini API key */
export const DEFAULT_API_KEY_ENV = 'GEMINI_API_KEY';

/** USD per 1M tokens used for the cost estimate */
export const DEFAULT_PRICE_PER_MILLION = 0.15;

/** HTTP 429 Too Many Requests status code */
export const HTTP_TOO_MANY_REQUESTS = 429;

/** Width of the `=` rule under report headers and CLI banners */
export const RULE_WIDTH = 60;

/** Shown once rate-limit retries are exhausted */
export const RATE_LIMIT_SUGGESTIONS: readonly string[] = [
  'Wait 2-3 minutes and try again',
  'Try a smaller document',
  'Check your usage at: https://ai.dev/usage',
];
