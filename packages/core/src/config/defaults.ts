// packages/core/src/config/defaults.ts

import type { ProjectConfig } from '../types/config.js';
import {
  DEFAULT_API_KEY_ENV,
  DEFAULT_BACKOFF_BASE_SEC,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_CHARS,
  DEFAULT_MODEL,
  DEFAULT_PRICE_PER_MILLION,
  TRUNCATION_MARKER,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: ProjectConfig = {
  model: {
    name: DEFAULT_MODEL,
    apiKeyEnv: DEFAULT_API_KEY_ENV,
    pricePerMillion: DEFAULT_PRICE_PER_MILLION,
  },
  analysis: {
    maxChars: DEFAULT_MAX_CHARS,
    truncationMarker: TRUNCATION_MARKER,
  },
  retry: {
    maxAttempts: DEFAULT_MAX_ATTEMPTS,
    backoffBaseSeconds: DEFAULT_BACKOFF_BASE_SEC,
  },
  output: {
    dir: '.',
    save: true,
  },
  advanced: {
    logLevel: 'info',
  },
};
