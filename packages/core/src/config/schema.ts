// packages/core/src/config/schema.ts

import { z } from 'zod';
import {
  DEFAULT_API_KEY_ENV,
  DEFAULT_BACKOFF_BASE_SEC,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_CHARS,
  DEFAULT_MODEL,
  DEFAULT_PRICE_PER_MILLION,
  MAX_ATTEMPTS_LIMIT,
  TRUNCATION_MARKER,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const modelConfigSchema = z.object({
  name: z.string().min(1).default(DEFAULT_MODEL),
  apiKeyEnv: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid environment variable name')
    .default(DEFAULT_API_KEY_ENV),
  pricePerMillion: z.number().nonnegative().default(DEFAULT_PRICE_PER_MILLION),
});

const analysisConfigSchema = z.object({
  maxChars: z.number().int().positive().default(DEFAULT_MAX_CHARS),
  truncationMarker: z.string().default(TRUNCATION_MARKER),
});

const retryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().max(MAX_ATTEMPTS_LIMIT).default(DEFAULT_MAX_ATTEMPTS),
  backoffBaseSeconds: z.number().int().nonnegative().default(DEFAULT_BACKOFF_BASE_SEC),
});

const outputConfigSchema = z.object({
  dir: z.string().min(1).default('.'),
  save: z.boolean().default(true),
});

const advancedConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const projectConfigSchema = z.object({
  model: modelConfigSchema.default({}),
  analysis: analysisConfigSchema.default({}),
  retry: retryConfigSchema.default({}),
  output: outputConfigSchema.default({}),
  advanced: advancedConfigSchema.default({}),
});

export type ProjectConfigInput = z.input<typeof projectConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): z.output<typeof projectConfigSchema> {
  const result = projectConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
