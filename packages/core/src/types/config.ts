// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export interface ModelConfig {
  name: string;
  /** Name of the environment variable that holds the API key. */
  apiKeyEnv: string;
  /** USD per 1M tokens. */
  pricePerMillion: number;
}

export interface AnalysisConfig {
  maxChars: number;
  truncationMarker: string;
}

export interface RetryConfig {
  maxAttempts: number;
  backoffBaseSeconds: number;
}

export interface OutputConfig {
  dir: string;
  save: boolean;
}

export interface AdvancedConfig {
  logLevel: Exclude<LogLevel, 'silent'>;
}

export interface ProjectConfig {
  model: ModelConfig;
  analysis: AnalysisConfig;
  retry: RetryConfig;
  output: OutputConfig;
  advanced: AdvancedConfig;
}

/** Section-wise partial config, as accepted by loadConfig overrides. */
export type ConfigOverrides = {
  [K in keyof ProjectConfig]?: Partial<ProjectConfig[K]>;
};
