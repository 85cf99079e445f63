// packages/core/src/types/index.ts -- barrel re-export

export type {
  ModelConfig,
  AnalysisConfig,
  RetryConfig,
  OutputConfig,
  AdvancedConfig,
  ProjectConfig,
  ConfigOverrides,
} from './config.js';

export type {
  FormatTag,
  SuccessOutcome,
  BlockedOutcome,
  RateLimitedOutcome,
  TransientErrorOutcome,
  AnalysisOutcome,
  DocumentInfo,
  InvalidInput,
  ExtractionFailed,
  DocumentAnalysis,
} from './analysis.js';

export type {
  AnalysisStartedEvent,
  ExtractionCompletedEvent,
  DocumentTruncatedEvent,
  AttemptStartedEvent,
  AttemptSucceededEvent,
  AttemptBlockedEvent,
  AttemptFailedEvent,
  RetryScheduledEvent,
  RetryTickEvent,
  RetryExhaustedEvent,
  AnalysisEvent,
} from './events.js';

export type { ExtractionResult, DocumentExtractor, FormatExtractor } from './extraction.js';

export type { Candidate, GenerateResponse, RemoteModel } from './models.js';
